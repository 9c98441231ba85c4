import { z } from "zod";
import {
  RiskFindingSchema,
  canonicalJson,
  createDecisionRecord,
  quantizeScore,
  sha256Hex,
  type DecisionRecord,
  type RiskFinding,
  type Severity,
} from "../../../verdict/src/index.js";
import { logger as rootLogger, type Logger } from "../log.js";
import { USE_CASES, type DecisionProducer, type UseCase, type WaterSample } from "./producer.js";
import rawTable from "./reference-ranges.json";

/* ------------------------------------------------------------------ */
/*                          Reference table                           */
/* ------------------------------------------------------------------ */

const AnalyteSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  category: z.string().min(1),
  unit: z.string(),
  min: z.number().min(0),
  max: z.number().min(0),
  remediation: z.string().min(1),
});

const UseCaseRuleSchema = z.object({
  tolerance: z.number().positive(),
  treatment: z.string().min(1),
});

export const ReferenceTableSchema = z.object({
  version: z.number().int(),
  analytes: z.array(AnalyteSchema),
  use_cases: z.object({
    drinking: UseCaseRuleSchema,
    bathing: UseCaseRuleSchema,
    irrigation: UseCaseRuleSchema,
    livestock: UseCaseRuleSchema,
  }),
  fallback: z.object({
    score: z.number().min(0).max(1),
    risk: RiskFindingSchema,
    remediation: z.array(z.string()).min(1),
  }),
});

export type ReferenceTable = z.infer<typeof ReferenceTableSchema>;
export type Analyte = z.infer<typeof AnalyteSchema>;

export const DEFAULT_REFERENCE_TABLE: ReferenceTable = ReferenceTableSchema.parse(rawTable);

/* ------------------------------------------------------------------ */
/*                              Scoring                               */
/* ------------------------------------------------------------------ */

const PENALTY: Record<Severity, number> = { low: 0.05, medium: 0.15, high: 0.3, critical: 0.5 };
const RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2, critical: 3 };

function severityForRatio(r: number): Severity {
  if (r <= 1.5) return "low";
  if (r <= 3) return "medium";
  if (r <= 10) return "high";
  return "critical";
}

/** null = within the reference range. */
export function assessReading(a: Analyte, value: number): Severity | null {
  if (value >= a.min && value <= a.max) return null;
  if (value > a.max) return a.max === 0 ? "medium" : severityForRatio(value / a.max);
  return value === 0 ? "critical" : severityForRatio(a.min / value);
}

function normalizeAnalyteKey(k: string): string {
  return k.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function describe(a: Analyte, value: number): string {
  const side = value > a.max ? "above" : "below";
  return `${a.label} at ${value} ${a.unit} is ${side} the ${a.min}-${a.max} ${a.unit} reference range`;
}

export function sampleSubject(sample: WaterSample): string {
  return sample.sample_id ?? "sha256:" + sha256Hex(canonicalJson(sample));
}

/* ------------------------------------------------------------------ */
/*                              Producer                              */
/* ------------------------------------------------------------------ */

export type ReferenceRangeProducerOptions = {
  table?: ReferenceTable;
  now?: () => number; // seconds since epoch
  logger?: Logger;
};

/**
 * Rule-based producer over the strip-test reference ranges.
 * Falls back to a conservative verdict when no known analyte was measured.
 */
export function createReferenceRangeProducer(opts: ReferenceRangeProducerOptions = {}): DecisionProducer {
  const table = opts.table ?? DEFAULT_REFERENCE_TABLE;
  const now = opts.now ?? (() => Math.floor(Date.now() / 1000));
  const log = (opts.logger ?? rootLogger).child({ component: "producer" });

  function readings(sample: WaterSample): Array<{ analyte: Analyte; value: number }> {
    const byKey = new Map<string, number>();
    for (const [k, v] of Object.entries(sample.strip_values)) {
      const key = normalizeAnalyteKey(k);
      if (!byKey.has(key)) byKey.set(key, v);
    }

    const out: Array<{ analyte: Analyte; value: number }> = [];
    for (const analyte of table.analytes) {
      const value = byKey.get(analyte.key);
      if (value !== undefined) out.push({ analyte, value });
      byKey.delete(analyte.key);
    }

    if (byKey.size) log.debug("ignoring unknown analytes", { analytes: [...byKey.keys()] });
    return out;
  }

  function fallback(sample: WaterSample, produced_at: number): DecisionRecord {
    return createDecisionRecord({
      subject: sampleSubject(sample),
      verdict: {
        score: quantizeScore(table.fallback.score),
        flags: Object.fromEntries(USE_CASES.map((u) => [u, false])),
        risks: [{ ...table.fallback.risk }],
        remediation: [...table.fallback.remediation],
      },
      produced_at,
    });
  }

  return {
    async produce(sample: WaterSample): Promise<DecisionRecord> {
      const produced_at = now();
      const measured = readings(sample);
      if (measured.length === 0) return fallback(sample, produced_at);

      const findings: Array<{ risk: RiskFinding; analyte: Analyte }> = [];
      for (const { analyte, value } of measured) {
        const severity = assessReading(analyte, value);
        if (severity) {
          findings.push({
            analyte,
            risk: { category: analyte.category, severity, explanation: describe(analyte, value) },
          });
        }
      }
      // most severe first; table order breaks ties (sort is stable)
      findings.sort((a, b) => RANK[b.risk.severity] - RANK[a.risk.severity]);

      const flags: Record<string, boolean> = {};
      for (const u of USE_CASES) {
        const tolerance = table.use_cases[u].tolerance;
        flags[u] = measured.every(({ analyte, value }) => value >= analyte.min && value <= analyte.max * tolerance);
      }

      const remediation: string[] = [];
      for (const f of findings) {
        if (!remediation.includes(f.analyte.remediation)) remediation.push(f.analyte.remediation);
      }
      const selected: UseCase = sample.use_case;
      if (!flags[selected]) remediation.push(table.use_cases[selected].treatment);

      const penalty = findings.reduce((s, f) => s + PENALTY[f.risk.severity], 0);

      return createDecisionRecord({
        subject: sampleSubject(sample),
        verdict: {
          score: quantizeScore(Math.min(1, Math.max(0, 1 - penalty))),
          flags,
          risks: findings.map((f) => f.risk),
          remediation,
        },
        produced_at,
      });
    },
  };
}
