/**
 * NDJSON events for machine-readable runs (`--json`).
 * One line per outcome, then one summary line.
 */

import type { Outcome } from "./classifier.js";
import type { DownloadSummary } from "./report.js";

// ============================================================================
// Event Schemas
// ============================================================================

export interface OutcomeEventJson {
  type: "outcome";
  timestamp: string;
  data: Outcome;
}

export interface SummaryEventJson {
  type: "summary";
  timestamp: string;
  data: DownloadSummary & { cancelled: boolean };
}

export type DownloadEventJson = OutcomeEventJson | SummaryEventJson;

// ============================================================================
// Output Functions
// ============================================================================

export type NdjsonWriter = (line: string) => void;

const stdoutWriter: NdjsonWriter = (line) => console.log(line);

/**
 * Output an NDJSON event.
 */
export function outputNdjson(event: DownloadEventJson, write: NdjsonWriter = stdoutWriter): void {
  write(JSON.stringify(event));
}

export function outcomeEvent(outcome: Outcome, now: Date = new Date()): OutcomeEventJson {
  return { type: "outcome", timestamp: now.toISOString(), data: outcome };
}

export function summaryEvent(
  summary: DownloadSummary,
  cancelled: boolean,
  now: Date = new Date()
): SummaryEventJson {
  return { type: "summary", timestamp: now.toISOString(), data: { ...summary, cancelled } };
}
