import type { Outcome, OutcomeKind } from "./classifier.js";
import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadSummary {
  /** URLs in the input list */
  total: number;
  /** Outcomes produced (fewer than total after cancellation) */
  processed: number;
  succeeded: number;
  failed: number;
  /** URLs never started because the run was interrupted */
  notStarted: number;
  bytesWritten: number;
  byKind: Record<OutcomeKind, number>;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * One human-readable line naming the URL and what went wrong.
 * Returns undefined for successes, which are not reported as lines.
 */
export function describeOutcome(outcome: Outcome): string | undefined {
  switch (outcome.kind) {
    case "success":
      return undefined;
    case "invalid-url":
      return `Not a valid URL: ${outcome.url}`;
    case "connection-error":
      return `Connection error for ${outcome.url}: ${outcome.reason}`;
    case "terminal-http-error":
      return `HTTP ${outcome.status} for ${outcome.url}`;
    case "retries-exhausted":
      return `HTTP ${outcome.status} for ${outcome.url} after ${outcome.attempts} attempts`;
    case "filesystem-error":
      return `Could not save ${outcome.url}: ${outcome.reason}`;
  }
}

/**
 * Log a non-success outcome as an error line; successes go to debug.
 */
export function logOutcome(logger: Logger, outcome: Outcome): void {
  const line = describeOutcome(outcome);
  if (line === undefined) {
    logger.debug("Downloaded", {
      url: outcome.url,
      ...(outcome.kind === "success" && { path: outcome.path, bytes: outcome.bytesWritten }),
    });
    return;
  }
  logger.error(line, { kind: outcome.kind });
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function emptyKindCounts(): Record<OutcomeKind, number> {
  return {
    "success": 0,
    "invalid-url": 0,
    "connection-error": 0,
    "terminal-http-error": 0,
    "retries-exhausted": 0,
    "filesystem-error": 0,
  };
}

/**
 * Tally the outcomes of a run against the number of input URLs.
 */
export function summarizeOutcomes(outcomes: readonly Outcome[], total: number): DownloadSummary {
  const byKind = emptyKindCounts();
  let bytesWritten = 0;

  for (const outcome of outcomes) {
    byKind[outcome.kind]++;
    if (outcome.kind === "success") bytesWritten += outcome.bytesWritten;
  }

  return {
    total,
    processed: outcomes.length,
    succeeded: byKind.success,
    failed: outcomes.length - byKind.success,
    notStarted: Math.max(total - outcomes.length, 0),
    bytesWritten,
    byKind,
  };
}
