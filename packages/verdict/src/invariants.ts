import type { DecisionIssue } from "./errors.js";
import type { DecisionRecord } from "./schema.js";

/**
 * Issuance policy applied on top of the structural schema.
 * Both the attestor and the verifier run the same policy.
 */
export type DecisionPolicy = {
  // any risk finding must come with at least one remediation step
  requireRemediationForRisks: boolean;
  // score strictly below this needs at least one risk finding (null = off)
  requireRisksBelowScore: number | null;
};

export const DEFAULT_DECISION_POLICY: DecisionPolicy = Object.freeze({
  requireRemediationForRisks: true,
  requireRisksBelowScore: null,
});

export const STRUCTURAL_ONLY_POLICY: DecisionPolicy = Object.freeze({
  requireRemediationForRisks: false,
  requireRisksBelowScore: null,
});

export function checkDecisionPolicy(d: DecisionRecord, policy: DecisionPolicy): DecisionIssue[] {
  const v: DecisionIssue[] = [];

  if (policy.requireRemediationForRisks && d.verdict.risks.length > 0 && d.verdict.remediation.length === 0) {
    v.push({
      code: "REMEDIATION_REQUIRED",
      message: `${d.verdict.risks.length} risk finding(s) reported without any remediation step`,
      path: "/verdict/remediation",
    });
  }

  if (
    policy.requireRisksBelowScore !== null &&
    d.verdict.score < policy.requireRisksBelowScore &&
    d.verdict.risks.length === 0
  ) {
    v.push({
      code: "RISKS_REQUIRED",
      message: `Score ${d.verdict.score} is below ${policy.requireRisksBelowScore} but no risk finding explains it`,
      path: "/verdict/risks",
    });
  }

  return v;
}
