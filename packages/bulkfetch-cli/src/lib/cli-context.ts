/**
 * Output flags shared by the whole run.
 * Built once from the parsed options and the environment, then passed
 * around as a value.
 */

export interface CLIContext {
  /** Emit NDJSON events instead of human-readable text */
  json: boolean;
  /** Suppress progress markers */
  quiet: boolean;
}

export interface CLIContextFlags {
  json?: boolean;
  quiet?: boolean;
}

export const DEFAULT_CONTEXT: Readonly<CLIContext> = {
  json: false,
  quiet: false,
};

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Build the CLI context from command line flags and environment.
 * BULKFETCH_JSON and BULKFETCH_QUIET can switch a mode on, never off.
 */
export function createCliContext(
  flags: CLIContextFlags = {},
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  const context: CLIContext = { ...DEFAULT_CONTEXT };

  if (flags.json || isTruthyFlag(env.BULKFETCH_JSON)) {
    context.json = true;
    context.quiet = true; // JSON mode implies quiet
  }

  if (flags.quiet || isTruthyFlag(env.BULKFETCH_QUIET)) {
    context.quiet = true;
  }

  return context;
}
