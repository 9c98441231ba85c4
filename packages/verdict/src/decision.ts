import { SCORE_DECIMALS, type DecisionRecord, type RiskFinding } from "./schema.js";
import { STRUCTURAL_ONLY_POLICY } from "./invariants.js";
import { parseDecision } from "./validate.js";

export type DecisionRecordInput = {
  subject: string;
  verdict: {
    score: number;
    flags: Record<string, boolean>;
    risks: RiskFinding[];
    remediation: string[];
  };
  produced_at: number;
};

export type DecisionRevision = {
  subject?: string;
  verdict?: Partial<DecisionRecordInput["verdict"]>;
  produced_at?: number;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/** Deep-freezes a (validated) record in place and returns it. */
export function freezeDecision(decision: DecisionRecord): DecisionRecord {
  return deepFreeze(decision);
}

/** Round to the fixed score precision of the v1 encoding. */
export function quantizeScore(score: number): number {
  const f = 10 ** SCORE_DECIMALS;
  return Math.round(score * f) / f;
}

/**
 * Build an immutable DecisionRecord. Throws InvalidDecisionError on structural
 * problems; issuance policy is left to the attestor.
 */
export function createDecisionRecord(input: DecisionRecordInput): DecisionRecord {
  return deepFreeze(parseDecision(input, STRUCTURAL_ONLY_POLICY));
}

/**
 * Corrections never touch an issued record: this returns a new one and leaves
 * `prev` (and any attestation over it) intact.
 */
export function reviseDecisionRecord(prev: DecisionRecord, changes: DecisionRevision): DecisionRecord {
  return createDecisionRecord({
    subject: changes.subject ?? prev.subject,
    verdict: {
      score: changes.verdict?.score ?? prev.verdict.score,
      flags: { ...(changes.verdict?.flags ?? prev.verdict.flags) },
      risks: (changes.verdict?.risks ?? prev.verdict.risks).map((r) => ({ ...r })),
      remediation: [...(changes.verdict?.remediation ?? prev.verdict.remediation)],
    },
    produced_at: changes.produced_at ?? prev.produced_at,
  });
}
