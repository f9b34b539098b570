import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_ACCESS_SECRET: z.string().min(16),
  JWT_ACCESS_TTL: z.string().min(1).default("1h"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  STORAGE_BACKEND: z.enum(["file", "firestore"]).default("file"),
  DATA_DIR: z.string().min(1).default("./data"),
  FIREBASE_CREDENTIALS_PATH: z.string().min(1).optional(),
  FIREBASE_PROJECT_ID: z.string().min(1).optional(),
  STORAGE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
