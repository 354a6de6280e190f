import type { HttpClient } from "./ports/http.js";
import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import {
  isRetryableStatus,
  retryWaitMs,
  RETRY_AFTER_STATUS_CODES,
  type RetryPolicy,
} from "./retry-policy.js";
import { errorMessage, isTransportError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the last attempt for a URL produced */
export type FetchResult =
  | { kind: "response"; status: number; body: Uint8Array; attempts: number }
  | { kind: "transport-error"; reason: string; code?: string; attempts: number };

export interface FetchDeps {
  http: HttpClient;
  delay: DelayFn;
  logger: Logger;
}

type AttemptResult =
  | { kind: "done"; result: FetchResult }
  | { kind: "retry"; result: FetchResult; reason: string; retryAfterMs?: number };

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

async function attempt(
  url: string,
  policy: RetryPolicy,
  http: HttpClient,
  attemptNumber: number
): Promise<AttemptResult> {
  try {
    const response = await http.get(url);
    const result: FetchResult = {
      kind: "response",
      status: response.status,
      body: response.body,
      attempts: attemptNumber,
    };
    if (isRetryableStatus(policy, response.status)) {
      const retryAfterMs = RETRY_AFTER_STATUS_CODES.has(response.status)
        ? response.retryAfterMs
        : undefined;
      return { kind: "retry", result, reason: `HTTP ${response.status}`, retryAfterMs };
    }
    return { kind: "done", result };
  } catch (error) {
    const result: FetchResult = {
      kind: "transport-error",
      reason: errorMessage(error),
      code: isTransportError(error) ? error.code : undefined,
      attempts: attemptNumber,
    };
    // Anything that is not a TransportError is a bug in the client; don't repeat it
    if (isTransportError(error) && error.retryable) {
      return { kind: "retry", result, reason: result.code ?? result.reason };
    }
    return { kind: "done", result };
  }
}

/**
 * GET a URL, retrying transient failures with exponential backoff.
 * A Retry-After hint on 413/429/503 can lengthen a wait, never shorten it.
 * Never rejects: the result describes whatever the final attempt produced.
 */
export async function fetchWithRetry(
  url: string,
  policy: RetryPolicy,
  deps: FetchDeps
): Promise<FetchResult> {
  const { http, delay, logger } = deps;
  let previousWaitMs = 0;

  for (let attemptNumber = 1; ; attemptNumber++) {
    const outcome = await attempt(url, policy, http, attemptNumber);

    if (outcome.kind === "done" || attemptNumber >= policy.maxAttempts) {
      return outcome.result;
    }

    const waitMs = retryWaitMs(policy, attemptNumber, {
      previousMs: previousWaitMs,
      retryAfterMs: outcome.retryAfterMs,
    });
    previousWaitMs = waitMs;
    logger.debug("Retrying request", {
      url,
      attempt: attemptNumber + 1,
      maxAttempts: policy.maxAttempts,
      delayMs: waitMs,
      reason: outcome.reason,
    });
    await delay(waitMs);
  }
}
