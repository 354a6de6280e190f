import type { FetchResult } from "./fetcher.js";
import { isRetryableStatus, TERMINAL_STATUS_CODES, type RetryPolicy } from "./retry-policy.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The single result reported for each URL */
export type Outcome =
  | {
      kind: "success";
      url: string;
      filename: string;
      path: string;
      bytesWritten: number;
      attempts: number;
    }
  | { kind: "invalid-url"; url: string }
  | { kind: "connection-error"; url: string; reason: string; code?: string; attempts: number }
  | { kind: "terminal-http-error"; url: string; status: number; attempts: number }
  | { kind: "retries-exhausted"; url: string; status: number; attempts: number }
  | { kind: "filesystem-error"; url: string; filename: string; reason: string };

export type OutcomeKind = Outcome["kind"];

export type FailedOutcome = Exclude<Outcome, { kind: "success" }>;

export type Verdict =
  | { action: "write"; body: Uint8Array; attempts: number }
  | { action: "reject"; outcome: FailedOutcome };

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Decide what to do with the final fetch result for a URL.
 * Pure; the fetcher has already spent whatever retries applied.
 */
export function classify(url: string, result: FetchResult, policy: RetryPolicy): Verdict {
  if (result.kind === "transport-error") {
    return {
      action: "reject",
      outcome: {
        kind: "connection-error",
        url,
        reason: result.reason,
        code: result.code,
        attempts: result.attempts,
      },
    };
  }

  const { status, attempts } = result;

  if (TERMINAL_STATUS_CODES.has(status)) {
    return { action: "reject", outcome: { kind: "terminal-http-error", url, status, attempts } };
  }

  if (status >= 400) {
    const kind = isRetryableStatus(policy, status) ? "retries-exhausted" : "terminal-http-error";
    return { action: "reject", outcome: { kind, url, status, attempts } };
  }

  return { action: "write", body: result.body, attempts };
}

export function isSuccess(outcome: Outcome): outcome is Extract<Outcome, { kind: "success" }> {
  return outcome.kind === "success";
}
