import { describe, it, expect } from "vitest";

import { createAttestor } from "../src/attestor.js";
import { WaterSampleSchema } from "../src/producer/producer.js";
import {
  DEFAULT_REFERENCE_TABLE,
  assessReading,
  createReferenceRangeProducer,
  type Analyte,
} from "../src/producer/reference-range.js";
import { createVerifier } from "../src/verifier.js";
import { testKeys } from "./_helpers/fixtures.js";

const producer = createReferenceRangeProducer({ now: () => 1700000000 });

const unitAnalyte: Analyte = {
  key: "x",
  label: "X",
  category: "x",
  unit: "mg/L",
  min: 0,
  max: 1,
  remediation: "treat x",
};

describe("assessReading", () => {
  it("grades readings above the range by ratio", () => {
    expect(assessReading(unitAnalyte, 1)).toBeNull();
    expect(assessReading(unitAnalyte, 1.5)).toBe("low");
    expect(assessReading(unitAnalyte, 1.6)).toBe("medium");
    expect(assessReading(unitAnalyte, 3)).toBe("medium");
    expect(assessReading(unitAnalyte, 3.1)).toBe("high");
    expect(assessReading(unitAnalyte, 10)).toBe("high");
    expect(assessReading(unitAnalyte, 10.5)).toBe("critical");
  });

  it("grades readings below the range by inverse ratio", () => {
    const ph: Analyte = { ...unitAnalyte, min: 6, max: 9 };
    expect(assessReading(ph, 5)).toBe("low"); // 1.2
    expect(assessReading(ph, 2)).toBe("medium"); // 3
    expect(assessReading(ph, 1)).toBe("high"); // 6
    expect(assessReading(ph, 0)).toBe("critical");
  });

  it("treats any reading of a zero-tolerance analyte as medium", () => {
    expect(assessReading({ ...unitAnalyte, max: 0 }, 0)).toBeNull();
    expect(assessReading({ ...unitAnalyte, max: 0 }, 0.5)).toBe("medium");
  });
});

describe("reference-range producer", () => {
  it("turns out-of-range readings into risks, flags and remediation", async () => {
    const sample = WaterSampleSchema.parse({
      sample_id: "well-7",
      strip_values: { nitrate: 25, Copper: 1.2, ph: 7.2 },
    });

    const d = await producer.produce(sample);

    expect(d).toEqual({
      subject: "well-7",
      verdict: {
        score: 0.8,
        flags: { drinking: false, bathing: true, irrigation: false, livestock: false },
        risks: [
          {
            category: "nitrate",
            severity: "medium",
            explanation: "Nitrate at 25 mg/L is above the 0-10 mg/L reference range",
          },
          {
            category: "copper",
            severity: "low",
            explanation: "Copper at 1.2 mg/L is above the 0-1 mg/L reference range",
          },
        ],
        remediation: [
          "use reverse osmosis or ion exchange; do not boil",
          "flush plumbing and use a reverse osmosis filter",
          "retest after treatment before drinking",
        ],
      },
      produced_at: 1700000000,
    });
    expect(Object.isFrozen(d.verdict)).toBe(true);
  });

  it("orders risks by severity and hashes anonymous samples", async () => {
    const sample = WaterSampleSchema.parse({
      use_case: "bathing",
      strip_values: { ph: 2, hydrogen_sulfide: 0.5, lead: 200 },
    });

    const d = await producer.produce(sample);

    expect(d.subject).toBe("sha256:8c214d9d8d3b22b3907cbf10e372432fb0962b187ba3903b8027bd7c25be8789");
    expect(d.verdict.score).toBe(0.05);
    expect(d.verdict.risks.map((r) => [r.category, r.severity])).toEqual([
      ["lead", "critical"],
      ["ph", "high"],
      ["hydrogen_sulfide", "medium"],
    ]);
    expect(d.verdict.risks[1].explanation).toBe("pH at 2 pH is below the 6.8-8.4 pH reference range");
    expect(d.verdict.flags).toEqual({ drinking: false, bathing: false, irrigation: false, livestock: false });
    expect(d.verdict.remediation).toEqual([
      "use a certified lead-removal filter or an alternative source",
      "correct pH with a neutralizing filter or dosing",
      "aerate and pass through an activated carbon filter",
      "filter and disinfect before bathing",
    ]);
  });

  it("reports clean water as suitable for every use", async () => {
    const d = await producer.produce(WaterSampleSchema.parse({ sample_id: "tap", strip_values: { iron: 0.1, ph: 7 } }));

    expect(d.verdict).toEqual({
      score: 1,
      flags: { drinking: true, bathing: true, irrigation: true, livestock: true },
      risks: [],
      remediation: [],
    });
  });

  it("clamps the score at zero", async () => {
    const d = await producer.produce(
      WaterSampleSchema.parse({ sample_id: "bad", strip_values: { lead: 200, copper: 20, iron: 30 } })
    );
    expect(d.verdict.score).toBe(0);
    expect(d.verdict.risks.every((r) => r.severity === "critical")).toBe(true);
  });

  it("falls back to a conservative decision when nothing known was measured", async () => {
    const d = await producer.produce(WaterSampleSchema.parse({ sample_id: "pond", strip_values: { glitter: 3 } }));

    expect(d.verdict).toEqual({
      score: 0.45,
      flags: { drinking: false, bathing: false, irrigation: false, livestock: false },
      risks: [DEFAULT_REFERENCE_TABLE.fallback.risk],
      remediation: DEFAULT_REFERENCE_TABLE.fallback.remediation,
    });
    expect(d.verdict.risks[0].category).toBe("unassessed");
  });

  it("produces decisions the attestor accepts and the verifier confirms", async () => {
    const d = await producer.produce(WaterSampleSchema.parse({ sample_id: "well-7", strip_values: { nitrate: 25 } }));
    const bundle = await createAttestor({ keys: testKeys() }).attest(d);
    expect(createVerifier().verify(bundle).code).toBe("VALID");
  });
});

describe("WaterSampleSchema", () => {
  it("defaults the use case and readings", () => {
    expect(WaterSampleSchema.parse({})).toEqual({ use_case: "drinking", strip_values: {} });
  });

  it("rejects negative readings and unknown use cases", () => {
    expect(WaterSampleSchema.safeParse({ strip_values: { iron: -1 } }).success).toBe(false);
    expect(WaterSampleSchema.safeParse({ use_case: "swimming" }).success).toBe(false);
  });
});
