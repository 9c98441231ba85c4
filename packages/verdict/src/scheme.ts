import type { DecisionRecord } from "./schema.js";
import { encodeDecisionTlv } from "./canonicalize.js";
import { UnknownSchemeError } from "./errors.js";

export type SignatureAlg = "ed25519";

/**
 * A scheme id binds one canonicalization rule to one signature algorithm.
 * Ids are never reused for a different rule.
 */
export type CanonicalScheme = {
  id: string;
  signature_alg: SignatureAlg;
  canonicalize(decision: DecisionRecord): Uint8Array;
};

export type SchemeRegistry = {
  ids(): string[];
  has(id: string): boolean;
  get(id: string): CanonicalScheme | null;
};

/** v1: TLV encoding (see canonicalize.ts) + Ed25519 (RFC 8032). */
export const SCHEME_V1: CanonicalScheme = {
  id: "v1",
  signature_alg: "ed25519",
  canonicalize: (decision: DecisionRecord) => encodeDecisionTlv(decision, "v1"),
};

export const CURRENT_SCHEME_ID = SCHEME_V1.id;

export function createSchemeRegistry(schemes: readonly CanonicalScheme[]): SchemeRegistry {
  const byId = new Map<string, CanonicalScheme>();
  for (const s of schemes) {
    if (byId.has(s.id)) throw new Error(`Duplicate scheme id: ${s.id}`);
    byId.set(s.id, s);
  }

  return {
    ids: () => [...byId.keys()],
    // Map lookup only: no prototype keys like "constructor" can match
    has: (id) => byId.has(id),
    get: (id) => byId.get(id) ?? null,
  };
}

export const SUPPORTED_SCHEMES: SchemeRegistry = createSchemeRegistry([SCHEME_V1]);

/**
 * CanonicalBytes(decision) under `schemeId`. Pure; the decision must already
 * have passed validation.
 */
export function canonicalizeDecision(
  decision: DecisionRecord,
  schemeId: string = CURRENT_SCHEME_ID,
  registry: SchemeRegistry = SUPPORTED_SCHEMES
): Uint8Array {
  const scheme = registry.get(schemeId);
  if (!scheme) throw new UnknownSchemeError(schemeId);
  return scheme.canonicalize(decision);
}

export function getScheme(schemeId: string, registry: SchemeRegistry = SUPPORTED_SCHEMES): CanonicalScheme | null {
  return registry.get(schemeId);
}

export function isKnownScheme(schemeId: string, registry: SchemeRegistry = SUPPORTED_SCHEMES): boolean {
  return registry.has(schemeId);
}
