/**
 * Output mode detection for deciding how to render progress and errors.
 */

import type { CLIContext } from "../cli-context.js";

export type OutputMode = "tui" | "static" | "json";

/** The parts of a stream that mode detection looks at */
export interface OutputStream {
  isTTY?: boolean;
}

/**
 * Detect the appropriate output mode based on flags and environment.
 *
 * - `tui`: interactive terminal, spinner progress
 * - `static`: plain text output (CI, pipes, dumb terminals)
 * - `json`: NDJSON events for scripting
 */
export function getOutputMode(
  context: CLIContext,
  stream: OutputStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): OutputMode {
  if (context.json) {
    return "json";
  }

  if (env.CI) {
    return "static";
  }

  if (!stream.isTTY) {
    return "static";
  }

  if (env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}
