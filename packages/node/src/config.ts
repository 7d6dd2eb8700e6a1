/**
 * @daybook/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  JWT_SECRET: z.string().min(16).optional(),
  JWT_ISSUER: z.string().default("daybook"),
  TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).default(43200),

  // Storage (in-memory when MONGODB_URI is unset)
  MONGODB_URI: z.string().url().optional(),
  MONGODB_DB: z.string().min(1).default("daybook"),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * Empty strings count as unset. A JWT secret is mandatory in production.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  return ConfigSchema.superRefine((config, ctx) => {
    if (config.NODE_ENV === "production" && config.JWT_SECRET === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "JWT_SECRET is required in production",
        path: ["JWT_SECRET"],
      });
    }
  }).parse(present);
}
