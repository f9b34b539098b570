import { z } from "zod";
import { parseIsoDate } from "../yield/yield.parse";

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date")
  .refine((value) => parseIsoDate(value) !== null, "Invalid calendar date");

const seasonFieldsSchema = z.object({
  crop: z.string().trim().min(1).max(120),
  area: z.number().positive().max(1_000_000),
  sowDate: isoDateSchema.nullable().optional(),
  harvestDate: isoDateSchema.nullable().optional(),
  fertilizer: z.string().trim().max(200).optional(),
  province: z.string().trim().max(120).optional(),
  notes: z.string().max(10_000).nullable().optional(),
  actualYield: z.number().nonnegative().nullable().optional(),
});

export const createSeasonSchema = seasonFieldsSchema;

export const updateSeasonSchema = seasonFieldsSchema.partial().strict();

export type CreateSeasonInput = z.infer<typeof createSeasonSchema>;
export type UpdateSeasonInput = z.infer<typeof updateSeasonSchema>;
