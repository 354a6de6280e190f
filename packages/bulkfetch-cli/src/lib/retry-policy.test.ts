import { describe, it, expect } from "vitest";
import {
  backoffDelayMs,
  createRetryPolicy,
  DEFAULT_ERROR_STATUS_CODES,
  isRetryableStatus,
  retryWaitMs,
  TERMINAL_STATUS_CODES,
} from "./retry-policy.js";

describe("retry-policy", () => {
  describe("createRetryPolicy", () => {
    it("retries every registered error status except 403 and 404 by default", () => {
      const policy = createRetryPolicy({ maxAttempts: 6, backoffFactor: 0.5 });

      expect(isRetryableStatus(policy, 500)).toBe(true);
      expect(isRetryableStatus(policy, 502)).toBe(true);
      expect(isRetryableStatus(policy, 503)).toBe(true);
      expect(isRetryableStatus(policy, 429)).toBe(true);
      expect(isRetryableStatus(policy, 400)).toBe(true);
      expect(isRetryableStatus(policy, 403)).toBe(false);
      expect(isRetryableStatus(policy, 404)).toBe(false);
      expect(isRetryableStatus(policy, 200)).toBe(false);
      expect(policy.retryableStatusCodes.size).toBe(DEFAULT_ERROR_STATUS_CODES.length - 2);
    });

    it("drops terminal statuses from a custom retryable set", () => {
      const policy = createRetryPolicy({
        maxAttempts: 3,
        backoffFactor: 1,
        retryableStatusCodes: [403, 404, 500, 503],
      });

      expect([...policy.retryableStatusCodes].sort()).toEqual([500, 503]);
      for (const code of TERMINAL_STATUS_CODES) {
        expect(policy.retryableStatusCodes.has(code)).toBe(false);
      }
    });

    it("returns a frozen policy", () => {
      const policy = createRetryPolicy({ maxAttempts: 2, backoffFactor: 0 });

      expect(Object.isFrozen(policy)).toBe(true);
    });

    it.each([0, -1, 1.5, Number.NaN])("rejects maxAttempts %s", (maxAttempts) => {
      expect(() => createRetryPolicy({ maxAttempts, backoffFactor: 0.5 })).toThrow(RangeError);
    });

    it("rejects a negative backoff factor", () => {
      expect(() => createRetryPolicy({ maxAttempts: 2, backoffFactor: -0.1 })).toThrow(RangeError);
    });
  });

  describe("backoffDelayMs", () => {
    it("doubles from backoffFactor seconds", () => {
      const policy = createRetryPolicy({ maxAttempts: 6, backoffFactor: 0.5 });

      expect([1, 2, 3, 4, 5].map((k) => backoffDelayMs(policy, k))).toEqual([
        500, 1000, 2000, 4000, 8000,
      ]);
    });

    it("caps each wait at maxBackoffMs", () => {
      const policy = createRetryPolicy({ maxAttempts: 10, backoffFactor: 10, maxBackoffMs: 30_000 });

      expect([1, 2, 3, 4].map((k) => backoffDelayMs(policy, k))).toEqual([
        10_000, 20_000, 30_000, 30_000,
      ]);
    });

    it("is zero throughout with a zero factor", () => {
      const policy = createRetryPolicy({ maxAttempts: 4, backoffFactor: 0 });

      expect([1, 2, 3].map((k) => backoffDelayMs(policy, k))).toEqual([0, 0, 0]);
    });
  });

  describe("retryWaitMs", () => {
    const policy = createRetryPolicy({ maxAttempts: 6, backoffFactor: 0.5, maxBackoffMs: 60_000 });

    it("is the backoff when nothing else applies", () => {
      expect(retryWaitMs(policy, 2)).toBe(1000);
    });

    it("stretches to a longer Retry-After hint", () => {
      expect(retryWaitMs(policy, 1, { retryAfterMs: 7000 })).toBe(7000);
    });

    it("ignores a hint shorter than the backoff", () => {
      expect(retryWaitMs(policy, 3, { retryAfterMs: 100 })).toBe(2000);
    });

    it("never drops below the previous wait", () => {
      expect(retryWaitMs(policy, 2, { previousMs: 7000 })).toBe(7000);
    });

    it("caps a hint at maxBackoffMs", () => {
      expect(retryWaitMs(policy, 1, { retryAfterMs: 3_600_000 })).toBe(60_000);
    });
  });
});
