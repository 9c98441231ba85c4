export type { DecisionRecord, Verdict, RiskFinding, Severity } from "./schema.js";
export {
  DecisionRecordSchema,
  VerdictSchema,
  RiskFindingSchema,
  SeveritySchema,
  SEVERITIES,
  SCORE_DECIMALS,
  MAX_TEXT_LENGTH,
  MAX_FLAGS,
  MAX_RISKS,
  MAX_REMEDIATION_STEPS,
  isWellFormedText,
  hasFixedScorePrecision,
} from "./schema.js";

export type { DecisionRecordInput, DecisionRevision } from "./decision.js";
export { createDecisionRecord, reviseDecisionRecord, freezeDecision, quantizeScore } from "./decision.js";

export type { DecisionPolicy } from "./invariants.js";
export { DEFAULT_DECISION_POLICY, STRUCTURAL_ONLY_POLICY, checkDecisionPolicy } from "./invariants.js";

export type { DecisionValidation } from "./validate.js";
export { validateDecision, parseDecision } from "./validate.js";

export { CanonicalWriter, CANONICAL_MAGIC, encodeDecisionTlv, canonicalDigest, compareUtf8 } from "./canonicalize.js";

export type { CanonicalScheme, SchemeRegistry, SignatureAlg } from "./scheme.js";
export {
  SCHEME_V1,
  CURRENT_SCHEME_ID,
  SUPPORTED_SCHEMES,
  createSchemeRegistry,
  canonicalizeDecision,
  getScheme,
  isKnownScheme,
} from "./scheme.js";

export type { WatersealErrorCode, DecisionIssue, DecisionIssueCode } from "./errors.js";
export { WatersealError, InvalidDecisionError, UnknownSchemeError } from "./errors.js";

export { canonicalJson, sha256Hex } from "./hash.js";
