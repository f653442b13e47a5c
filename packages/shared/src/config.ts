// =============================================================================
// @feedsieve/shared: Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. API_KEYS is validated as JSON.
//
// Pipeline tuning that operators change at run time (max_posts,
// feed_concurrency, update_interval) lives in storage settings, not here.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"test-key": "ops-console"}'
 */
const apiKeysSchema = z.string().transform((val, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(val);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "API_KEYS must be valid JSON",
    });
    return z.NEVER;
  }

  const result = z.record(z.string()).safeParse(parsed);
  if (!result.success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "API_KEYS must be a JSON object mapping key strings to client ID strings",
    });
    return z.NEVER;
  }
  return result.data;
});

/** "true"/"false"/"1"/"0" env flags; z.coerce.boolean treats "false" as true. */
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((val) => val === "true" || val === "1");

const configSchema = z.object({
  // Required
  NEO4J_URI: z.string().min(1, "NEO4J_URI is required"),
  NEO4J_USER: z.string().min(1, "NEO4J_USER is required"),
  NEO4J_PASSWORD: z.string().min(1, "NEO4J_PASSWORD is required"),
  API_KEYS: apiKeysSchema,

  // Optional with defaults
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  CORS_ORIGINS: z.string().default("*"),
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(100),

  // Cycle timer
  CRON_ENABLED: booleanFlag.default("true"),
  CRON_TICK: z.string().min(1).default("* * * * *"),
  UPDATE_ON_START: booleanFlag.default("true"),

  // Fetching & filtering
  USER_AGENT: z.string().min(1).default("FeedSieve/0.1"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  FILTER_CACHE_TTL_MS: z.coerce.number().int().min(0).default(300_000),
  FAVICON_BASE_PATH: z.string().default("/static/favicons/"),
});

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}
