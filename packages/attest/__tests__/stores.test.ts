import { describe, it, expect, afterEach } from "vitest";

import { reviseDecisionRecord } from "../../verdict/src/index.js";
import { createAttestor } from "../src/attestor.js";
import type { AttestationBundle } from "../src/bundle.js";
import { InMemoryAttestationStore } from "../src/in-memory-store.js";
import { SqliteAttestationStore } from "../src/sqlite-store.js";
import type { AttestationStore } from "../src/store.js";
import { createVerifier } from "../src/verifier.js";
import { FIXED_NOW, sample42, testKeys } from "./_helpers/fixtures.js";

async function threeBundles(): Promise<AttestationBundle[]> {
  const attestor = createAttestor({ keys: testKeys(), now: FIXED_NOW });
  const d1 = sample42();
  const d2 = reviseDecisionRecord(d1, { produced_at: 1700000100 });
  const d3 = reviseDecisionRecord(d1, { subject: "sample-43" });
  return Promise.all([d1, d2, d3].map((d) => attestor.attest(d)));
}

const stores: Array<[string, () => AttestationStore]> = [
  ["InMemoryAttestationStore", () => new InMemoryAttestationStore()],
  ["SqliteAttestationStore", () => new SqliteAttestationStore(":memory:")],
];

describe.each(stores)("%s", (_name, create) => {
  let store: AttestationStore;

  afterEach(() => {
    store.close?.();
  });

  it("round-trips a bundle unchanged and still verifiable", async () => {
    store = create();
    const [bundle] = await threeBundles();

    expect(await store.putBundle(bundle)).toEqual({ inserted: true });
    const loaded = await store.getBundle(bundle.digest);

    expect(loaded).toEqual(bundle);
    expect(createVerifier().verify(loaded).code).toBe("VALID");
  });

  it("keeps the first bundle for a digest", async () => {
    store = create();
    const [bundle] = await threeBundles();
    const reissued: AttestationBundle = { ...bundle, issued_at: "2027-01-01T00:00:00.000Z" };

    await store.putBundle(bundle);
    expect(await store.putBundle(reissued)).toEqual({ inserted: false });

    const loaded = await store.getBundle(bundle.digest);
    expect(loaded?.issued_at).toBe("2026-01-19T00:00:00.000Z");
  });

  it("returns null for unknown digests", async () => {
    store = create();
    expect(await store.getBundle("0".repeat(64))).toBeNull();
  });

  it("lists newest first, up to the limit", async () => {
    store = create();
    const [a, b, c] = await threeBundles();
    for (const x of [a, b, c]) await store.putBundle(x);

    expect((await store.listBundles()).map((x) => x.digest)).toEqual([c.digest, b.digest, a.digest]);
    expect((await store.listBundles(2)).map((x) => x.digest)).toEqual([c.digest, b.digest]);
  });

  it("lists one subject's bundles, oldest decision first", async () => {
    store = create();
    const [a, b, c] = await threeBundles();
    for (const x of [b, c, a]) await store.putBundle(x);

    const rows = await store.listBySubject("sample-42");
    expect(rows.map((x) => x.decision.produced_at)).toEqual([1700000000, 1700000100]);
    expect((await store.listBySubject("sample-43")).map((x) => x.digest)).toEqual([c.digest]);
    expect(await store.listBySubject("nope")).toEqual([]);
  });
});
