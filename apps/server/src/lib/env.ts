// ---------------------------------------------------------------------------
// Environment configuration for apps/server
// ---------------------------------------------------------------------------

import { DEFAULT_DATABASE_URL } from "@wayfarer/db";
import { z } from "zod";

export const EnvSchema = z.object({
  DATABASE_URL: z.string().default(DEFAULT_DATABASE_URL),
  /** `memory` keeps the world in process; `postgres` uses DATABASE_URL */
  STORE: z.enum(["memory", "postgres"]).default("postgres"),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  /** Signs dice rolls with HMAC-SHA256 when set */
  DICE_SIGNING_SECRET: z.string().min(1).optional(),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return EnvSchema.parse(source);
}
