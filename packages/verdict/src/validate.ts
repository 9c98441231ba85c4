import type { ZodIssue } from "zod";
import { DecisionRecordSchema, type DecisionRecord } from "./schema.js";
import { checkDecisionPolicy, DEFAULT_DECISION_POLICY, type DecisionPolicy } from "./invariants.js";
import { InvalidDecisionError, type DecisionIssue } from "./errors.js";

export type DecisionValidation =
  | { ok: true; decision: DecisionRecord }
  | { ok: false; issues: DecisionIssue[] };

function toIssue(i: ZodIssue): DecisionIssue {
  return {
    code: "SCHEMA",
    message: i.message,
    path: i.path.length ? "/" + i.path.map(String).join("/") : "",
  };
}

/**
 * Structural + range + policy validation. Runs before canonicalization, so the
 * encoder only ever sees records it can represent exactly.
 *
 * NOTE: the returned decision is the parsed copy, not the caller's object.
 */
export function validateDecision(
  input: unknown,
  policy: DecisionPolicy = DEFAULT_DECISION_POLICY
): DecisionValidation {
  const parsed = DecisionRecordSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues.map(toIssue) };
  }

  const violations = checkDecisionPolicy(parsed.data, policy);
  if (violations.length) return { ok: false, issues: violations };

  return { ok: true, decision: parsed.data };
}

export function parseDecision(
  input: unknown,
  policy: DecisionPolicy = DEFAULT_DECISION_POLICY
): DecisionRecord {
  const r = validateDecision(input, policy);
  if (!r.ok) throw new InvalidDecisionError(r.issues);
  return r.decision;
}
