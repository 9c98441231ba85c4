// packages/attest/src/store.ts
import type { AttestationBundle } from "./bundle.js";

/**
 * AttestationStore
 * - Bundles are immutable once stored; keyed by digest (sha256 of canonical bytes).
 * - putBundle is idempotent: storing the same digest again keeps the first bundle.
 * - Stored bundles come back exactly as they went in.
 */
export type AttestationStore = {
  putBundle(bundle: AttestationBundle): Promise<{ inserted: boolean }>;
  getBundle(digest: string): Promise<AttestationBundle | null>;
  listBundles(limit?: number): Promise<AttestationBundle[]>; // newest first
  listBySubject(subject: string): Promise<AttestationBundle[]>; // oldest decision first

  close?(): void;
};

export const DEFAULT_LIST_LIMIT = 50;
