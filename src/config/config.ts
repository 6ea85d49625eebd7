// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "staging", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  OAI_REPOSITORY_FILE: z.string().min(1).default("config/repository.yaml"),
  OAI_BASE_URL: z.string().url().optional(),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the service can start with zero
 * configuration for local development. `NODE_ENV=test` runs as development.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV === "test" ? "development" : parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    repositoryFile: parsed.OAI_REPOSITORY_FILE,
    baseUrl: parsed.OAI_BASE_URL ?? null,
  };
}
