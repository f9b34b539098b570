import { z } from "zod";

export const yieldSourceSchema = z.enum(["manual", "auto-computed"]);

export const storedUserSchema = z.object({
  id: z.string().min(1),
  email: z.string(),
  passwordHash: z.string(),
  displayName: z.string(),
  createdAt: z.string(),
});

export const storedSeasonSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  crop: z.string(),
  area: z.number(),
  sowDate: z.string().nullable(),
  harvestDate: z.string().nullable(),
  fertilizer: z.string(),
  province: z.string(),
  notes: z.string().nullable(),
  actualYield: z.number().nullable(),
  yieldComputedAt: z.string().nullable(),
  yieldSource: yieldSourceSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type YieldSource = z.infer<typeof yieldSourceSchema>;
export type UserRecord = z.infer<typeof storedUserSchema>;
export type SeasonRecord = z.infer<typeof storedSeasonSchema>;

export type NewUser = Omit<UserRecord, "id" | "createdAt">;
export type NewSeason = Omit<SeasonRecord, "id" | "createdAt" | "updatedAt">;
export type SeasonPatch = Partial<Omit<SeasonRecord, "id" | "userId" | "createdAt" | "updatedAt">>;

export class DuplicateEmailError extends Error {
  constructor(readonly email: string) {
    super(`Email ${email} is already registered`);
    this.name = "DuplicateEmailError";
  }
}

export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(id: string): Promise<UserRecord | null>;
  /** Rejects with `DuplicateEmailError` when the email (case-insensitive) is taken. */
  create(input: NewUser): Promise<UserRecord>;
  list(): Promise<UserRecord[]>;
}

export interface SeasonRepository {
  list(userId: string): Promise<SeasonRecord[]>;
  get(userId: string, seasonId: string): Promise<SeasonRecord | null>;
  create(input: NewSeason): Promise<SeasonRecord>;
  update(userId: string, seasonId: string, patch: SeasonPatch): Promise<SeasonRecord | null>;
  remove(userId: string, seasonId: string): Promise<boolean>;
}

export interface Storage {
  users: UserRepository;
  seasons: SeasonRepository;
}
