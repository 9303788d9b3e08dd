import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  CORS_ORIGINS: z
    .string()
    .default("http://localhost:3000,http://localhost:5173,http://127.0.0.1:5173")
    .transform((value) => value.split(",").map((item) => item.trim()).filter(Boolean)),
  DEFAULT_RULESET_IRS: z.string().default("IRS-2024.1"),
  BONUS_RATE: z.coerce.number().min(0).max(1).default(0.6),
  STATE_BONUS_RATE: z.coerce.number().min(0).max(1).default(0),
  SECTION179_SOFT_LIMIT: z.coerce.number().positive().default(1_000_000)
});

export const env = envSchema.parse(process.env);
