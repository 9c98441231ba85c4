import { parseBundle, type AttestationBundle } from "./bundle.js";
import { DEFAULT_LIST_LIMIT, type AttestationStore } from "./store.js";

export class InMemoryAttestationStore implements AttestationStore {
  // bundles are kept serialized so callers never share mutable state with the store
  private rows = new Map<string, string>();
  private order: string[] = [];

  async putBundle(bundle: AttestationBundle): Promise<{ inserted: boolean }> {
    if (this.rows.has(bundle.digest)) return { inserted: false };
    this.rows.set(bundle.digest, JSON.stringify(bundle));
    this.order.push(bundle.digest);
    return { inserted: true };
  }

  async getBundle(digest: string): Promise<AttestationBundle | null> {
    const json = this.rows.get(digest);
    return json ? parseBundle(JSON.parse(json)) : null;
  }

  async listBundles(limit = DEFAULT_LIST_LIMIT): Promise<AttestationBundle[]> {
    const out: AttestationBundle[] = [];
    for (let i = this.order.length - 1; i >= 0 && out.length < limit; i--) {
      const json = this.rows.get(this.order[i]);
      if (json) out.push(parseBundle(JSON.parse(json)));
    }
    return out;
  }

  async listBySubject(subject: string): Promise<AttestationBundle[]> {
    return this.order
      .map((digest, seq) => ({ seq, json: this.rows.get(digest) }))
      .flatMap(({ seq, json }) => (json ? [{ seq, bundle: parseBundle(JSON.parse(json)) }] : []))
      .filter((r) => r.bundle.decision.subject === subject)
      .sort((a, b) => a.bundle.decision.produced_at - b.bundle.decision.produced_at || a.seq - b.seq)
      .map((r) => r.bundle);
  }
}
