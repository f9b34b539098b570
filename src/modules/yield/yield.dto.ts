import { z } from "zod";

const text = (max: number) => z.string().max(max).nullable().optional();

// Values the estimator cannot read are defaulted there, not rejected here.
export const predictYieldSchema = z.object({
  crop: z.string().max(120),
  area: z.union([z.number(), z.string().max(50)]).nullable().optional(),
  sowDate: text(40),
  harvestDate: text(40),
  fertilizer: text(200),
  province: text(120),
});

export type PredictYieldInput = z.infer<typeof predictYieldSchema>;
