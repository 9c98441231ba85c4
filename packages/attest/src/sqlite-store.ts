// packages/attest/src/sqlite-store.ts
import Database from "better-sqlite3";
import { parseBundle, type AttestationBundle } from "./bundle.js";
import { DEFAULT_LIST_LIMIT, type AttestationStore } from "./store.js";

type BundleRow = { bundle_json: string };

export class SqliteAttestationStore implements AttestationStore {
  private db: Database.Database;

  constructor(filename = "waterseal.sqlite") {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS attestations (
        digest        TEXT PRIMARY KEY,
        scheme_id     TEXT NOT NULL,
        subject       TEXT NOT NULL,
        signer        TEXT NOT NULL, -- signer address
        produced_at   INTEGER NOT NULL,
        issued_at     TEXT NOT NULL,
        bundle_json   TEXT NOT NULL,
        seq           INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_attestations_seq
        ON attestations(seq);

      CREATE INDEX IF NOT EXISTS idx_attestations_subject
        ON attestations(subject, produced_at);
    `);
  }

  async putBundle(bundle: AttestationBundle): Promise<{ inserted: boolean }> {
    // ✅ first write wins: an issued bundle is never overwritten
    const info = this.db
      .prepare(
        `
        INSERT OR IGNORE INTO attestations(
          digest, scheme_id, subject, signer, produced_at, issued_at, bundle_json, seq
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM attestations))
      `
      )
      .run(
        bundle.digest,
        bundle.scheme_id,
        bundle.decision.subject,
        bundle.signer.address,
        bundle.decision.produced_at,
        bundle.issued_at,
        JSON.stringify(bundle)
      );

    return { inserted: info.changes > 0 };
  }

  async getBundle(digest: string): Promise<AttestationBundle | null> {
    const row = this.db
      .prepare(
        `SELECT bundle_json
         FROM attestations
         WHERE digest = ?
         LIMIT 1`
      )
      .get(digest) as BundleRow | undefined;

    return row ? parseBundle(JSON.parse(row.bundle_json)) : null;
  }

  async listBundles(limit = DEFAULT_LIST_LIMIT): Promise<AttestationBundle[]> {
    const rows = this.db
      .prepare(
        `SELECT bundle_json
         FROM attestations
         ORDER BY seq DESC
         LIMIT ?`
      )
      .all(limit) as BundleRow[];

    return rows.map((r) => parseBundle(JSON.parse(r.bundle_json)));
  }

  /** Bundles issued for one subject, oldest first. */
  async listBySubject(subject: string): Promise<AttestationBundle[]> {
    const rows = this.db
      .prepare(
        `SELECT bundle_json
         FROM attestations
         WHERE subject = ?
         ORDER BY produced_at ASC, seq ASC`
      )
      .all(subject) as BundleRow[];

    return rows.map((r) => parseBundle(JSON.parse(r.bundle_json)));
  }

  close(): void {
    this.db.close();
  }
}
