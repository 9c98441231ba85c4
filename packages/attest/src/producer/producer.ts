import { z } from "zod";
import type { DecisionRecord } from "../../../verdict/src/index.js";

export const USE_CASES = ["drinking", "bathing", "irrigation", "livestock"] as const;
export type UseCase = (typeof USE_CASES)[number];

const Reading = z
  .number()
  .refine(Number.isFinite, "Must be a finite number")
  .refine((v) => v >= 0, "Readings cannot be negative");

export const WaterSampleSchema = z.object({
  sample_id: z.string().min(1).max(256).optional(),
  use_case: z.enum(USE_CASES).default("drinking"),
  strip_values: z.record(z.string().min(1).max(64), Reading).default({}),
  location: z
    .object({
      hint: z.string().max(512).optional(),
    })
    .optional(),
  scene_description: z.string().max(4096).optional(),
});

export type WaterSample = z.infer<typeof WaterSampleSchema>;

/**
 * Supplies the decision to attest. Failures pass through to the caller
 * unchanged; retry policy belongs to the transport.
 */
export interface DecisionProducer {
  produce(sample: WaterSample): Promise<DecisionRecord>;
}
