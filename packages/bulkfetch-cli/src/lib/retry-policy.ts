import { STATUS_CODES } from "http";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Total attempts per URL, the first request included */
  readonly maxAttempts: number;
  /** Seconds; the wait after attempt k is backoffFactor * 2^(k-1) */
  readonly backoffFactor: number;
  /** Longest single wait between attempts */
  readonly maxBackoffMs: number;
  /** Statuses worth another attempt. Never contains a terminal status */
  readonly retryableStatusCodes: ReadonlySet<number>;
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoffFactor: number;
  maxBackoffMs?: number;
  retryableStatusCodes?: Iterable<number>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Forbidden and Not Found: asking again gives the same answer */
export const TERMINAL_STATUS_CODES: ReadonlySet<number> = new Set([403, 404]);

export const DEFAULT_MAX_BACKOFF_MS = 120_000;

/** Statuses whose Retry-After header is honoured */
export const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([413, 429, 503]);

/** Every registered status of 400 and above */
export const DEFAULT_ERROR_STATUS_CODES: readonly number[] = Object.keys(STATUS_CODES)
  .map(Number)
  .filter((code) => code >= 400);

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build an immutable retry policy.
 * Terminal statuses are dropped from the retryable set here, once,
 * so nothing downstream has to filter them per attempt.
 */
export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  const { maxAttempts, backoffFactor } = options;
  const maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
  }
  if (!Number.isFinite(backoffFactor) || backoffFactor < 0) {
    throw new RangeError(`backoffFactor must be >= 0, got ${backoffFactor}`);
  }
  if (!Number.isFinite(maxBackoffMs) || maxBackoffMs < 0) {
    throw new RangeError(`maxBackoffMs must be >= 0, got ${maxBackoffMs}`);
  }

  const retryable = new Set<number>();
  for (const code of options.retryableStatusCodes ?? DEFAULT_ERROR_STATUS_CODES) {
    if (!TERMINAL_STATUS_CODES.has(code)) retryable.add(code);
  }

  return Object.freeze({
    maxAttempts,
    backoffFactor,
    maxBackoffMs,
    retryableStatusCodes: retryable,
  });
}

/**
 * Milliseconds to wait after the given failed attempt (1-based).
 * Non-decreasing in `attempt`.
 */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  const delay = policy.backoffFactor * 1000 * Math.pow(2, attempt - 1);
  return Math.min(delay, policy.maxBackoffMs);
}

/**
 * Wait before the next attempt: the backoff for `attempt`, raised to the
 * server's Retry-After hint and to the previous wait, never past the cap.
 */
export function retryWaitMs(
  policy: RetryPolicy,
  attempt: number,
  options: { previousMs?: number; retryAfterMs?: number } = {}
): number {
  const hinted = Math.min(options.retryAfterMs ?? 0, policy.maxBackoffMs);
  return Math.max(backoffDelayMs(policy, attempt), hinted, options.previousMs ?? 0);
}

export function isRetryableStatus(policy: RetryPolicy, status: number): boolean {
  return policy.retryableStatusCodes.has(status);
}
