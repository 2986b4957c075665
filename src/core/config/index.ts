/**
 * Process Configuration
 *
 * Reads the environment once at startup and hands typed values to the cache
 * store and the inference service. Nothing below this module touches
 * `process.env`.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { getCacheDbPath } from "../../utils/index.js";
import { formatZodError } from "../../utils/validation.js";

// =============================================================================
// Schema
// =============================================================================

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

/**
 * Environment variables understood by cfg-lens
 */
export const EnvSchema = z.object({
  CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
  CACHE_DB_PATH: z.string().min(1).optional(),
  GOOGLE_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type EnvInput = z.input<typeof EnvSchema>;

export interface CacheConfig {
  /** SQLite file backing the response cache */
  dbPath: string;
  /** Lifetime of a cache entry in milliseconds */
  ttlMs: number;
}

export interface InferenceConfig {
  apiKey?: string;
  modelId: string;
  requestTimeoutMs: number;
}

export interface AppConfig {
  cache: CacheConfig;
  inference: InferenceConfig;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Build the application configuration from an environment map.
 *
 * @throws {ConfigurationError} when a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }

  const values = parsed.data;
  return {
    cache: {
      dbPath: values.CACHE_DB_PATH ?? getCacheDbPath(),
      ttlMs: values.CACHE_TTL_HOURS * HOUR_MS,
    },
    inference: {
      apiKey: values.GOOGLE_API_KEY,
      modelId: values.GEMINI_MODEL,
      requestTimeoutMs: values.LLM_TIMEOUT_MS,
    },
  };
}
