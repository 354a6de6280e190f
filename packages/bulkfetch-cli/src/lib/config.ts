import { z } from "zod";
import { LOG_LEVEL_NAMES } from "./logger.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  concurrency: 100,
  retries: 5,
  backoffFactor: 0.5,
  timeoutMs: 30_000,
  logLevel: "info",
} as const;

/** Environment variables read for each option */
export const ENV_VARS = {
  concurrency: "BULKFETCH_CONCURRENCY",
  retries: "BULKFETCH_RETRIES",
  backoffFactor: "BULKFETCH_BACKOFF",
  timeoutMs: "BULKFETCH_TIMEOUT",
  logLevel: "BULKFETCH_LOG_LEVEL",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/**
 * Option values arrive as strings from commander and the environment,
 * so numeric fields are coerced before range checks.
 */
export const ConfigSchema = z.object({
  concurrency: z.coerce.number().int().min(1).max(1000),
  retries: z.coerce.number().int().min(0).max(20),
  backoffFactor: z.coerce.number().min(0).max(60),
  timeoutMs: z.coerce.number().int().min(100).max(600_000),
  logLevel: z.enum(LOG_LEVEL_NAMES),
});

/** Resolved configuration with all defaults applied */
export type ResolvedConfig = z.infer<typeof ConfigSchema>;

/** Raw values as given on the command line */
export interface ConfigOverrides {
  concurrency?: string;
  retries?: string;
  backoff?: string;
  timeout?: string;
  logLevel?: string;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Merge configuration sources with precedence:
 * CLI options > environment > defaults.
 * Throws a CLIError listing every invalid value.
 */
export function resolveConfig(
  cliOptions: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const raw = {
    concurrency:
      cliOptions.concurrency ?? fromEnv(env, ENV_VARS.concurrency) ?? CONFIG_DEFAULTS.concurrency,
    retries:
      cliOptions.retries ?? fromEnv(env, ENV_VARS.retries) ?? CONFIG_DEFAULTS.retries,
    backoffFactor:
      cliOptions.backoff ?? fromEnv(env, ENV_VARS.backoffFactor) ?? CONFIG_DEFAULTS.backoffFactor,
    timeoutMs:
      cliOptions.timeout ?? fromEnv(env, ENV_VARS.timeoutMs) ?? CONFIG_DEFAULTS.timeoutMs,
    logLevel:
      cliOptions.logLevel ?? fromEnv(env, ENV_VARS.logLevel) ?? CONFIG_DEFAULTS.logLevel,
  };

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw invalidConfig(
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}
