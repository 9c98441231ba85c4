import { z } from "zod";

/* ------------------------------------------------------------------ */
/*                              Limits                                */
/* ------------------------------------------------------------------ */

export const MAX_TEXT_LENGTH = 4096;
export const MAX_FLAGS = 64;
export const MAX_RISKS = 64;
export const MAX_REMEDIATION_STEPS = 64;

// 6 decimal places; part of the v1 encoding (fixed6)
export const SCORE_DECIMALS = 6;

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Lone surrogates all become U+FFFD in UTF-8, so two distinct strings would share bytes.
export function isWellFormedText(s: string): boolean {
  return !LONE_SURROGATE.test(s);
}

export function hasFixedScorePrecision(v: number): boolean {
  return Number(v.toFixed(SCORE_DECIMALS)) === v;
}

const Text = z
  .string()
  .max(MAX_TEXT_LENGTH)
  .refine(isWellFormedText, "Must be well-formed UTF-16 (no lone surrogates)");

const NonEmptyText = Text.refine((v) => v.length > 0, "Must be non-empty");

const FlagKey = NonEmptyText.refine((k) => k !== "__proto__", "Reserved flag key");

const Score = z
  .number()
  .refine(Number.isFinite, "Must be a finite number")
  .refine((v) => v >= 0 && v <= 1, "Score must be within [0,1]")
  .refine(hasFixedScorePrecision, `Score must have at most ${SCORE_DECIMALS} decimal places`);

const EpochSeconds = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

/* ------------------------------------------------------------------ */
/*                              Verdict                               */
/* ------------------------------------------------------------------ */

export const SEVERITIES = ["low", "medium", "high", "critical"] as const;
export const SeveritySchema = z.enum(SEVERITIES);

export const RiskFindingSchema = z
  .object({
    category: NonEmptyText,
    severity: SeveritySchema,
    explanation: Text,
  })
  .strict();

export const VerdictSchema = z
  .object({
    score: Score,
    flags: z
      .record(FlagKey, z.boolean())
      .refine((f) => Object.keys(f).length <= MAX_FLAGS, `At most ${MAX_FLAGS} flags`),
    risks: z.array(RiskFindingSchema).max(MAX_RISKS),
    remediation: z.array(Text).max(MAX_REMEDIATION_STEPS),
  })
  .strict();

/* ------------------------------------------------------------------ */
/*                           DecisionRecord                           */
/* ------------------------------------------------------------------ */

export const DecisionRecordSchema = z
  .object({
    subject: NonEmptyText,
    verdict: VerdictSchema,
    produced_at: EpochSeconds,
  })
  .strict();

export type Severity = (typeof SEVERITIES)[number];

export type RiskFinding = {
  readonly category: string;
  readonly severity: Severity;
  readonly explanation: string;
};

export type Verdict = {
  readonly score: number;
  readonly flags: Readonly<Record<string, boolean>>;
  readonly risks: readonly RiskFinding[];
  readonly remediation: readonly string[];
};

/**
 * The assessment that gets attested. Values handed out by this package are
 * deep-frozen; a correction is always a new record.
 */
export type DecisionRecord = {
  readonly subject: string;
  readonly verdict: Verdict;
  readonly produced_at: number; // seconds since epoch
};
