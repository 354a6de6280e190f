import { describe, it, expect, vi } from "vitest";
import { fetchWithRetry } from "./fetcher.js";
import { createRetryPolicy } from "./retry-policy.js";
import { createNoopLogger } from "./logger.js";
import { TransportError } from "./errors/types.js";
import type { HttpClient, HttpResponse } from "./ports/http.js";

const body = (text: string) => new TextEncoder().encode(text);

/** HttpClient that plays back one scripted step per request */
function createScriptedHttp(steps: Array<HttpResponse | Error>) {
  let calls = 0;
  const get = vi.fn(async (_url: string): Promise<HttpResponse> => {
    const step = steps[Math.min(calls, steps.length - 1)];
    calls++;
    if (step instanceof Error) throw step;
    return step;
  });
  const http: HttpClient = { get, close: vi.fn() };
  return { http, get };
}

function createRecordingDelay() {
  const waits: number[] = [];
  const delay = vi.fn(async (ms: number) => {
    waits.push(ms);
  });
  return { delay, waits };
}

const policy = createRetryPolicy({ maxAttempts: 4, backoffFactor: 0.5 });
const logger = createNoopLogger();

describe("fetchWithRetry", () => {
  it("returns the first successful response without waiting", async () => {
    const { http, get } = createScriptedHttp([{ status: 200, body: body("png") }]);
    const { delay } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/a.png", policy, { http, delay, logger });

    expect(result).toEqual({ kind: "response", status: 200, body: body("png"), attempts: 1 });
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith("http://x/a.png");
    expect(delay).not.toHaveBeenCalled();
  });

  it.each([403, 404])("makes exactly one attempt for %i", async (status) => {
    const { http, get } = createScriptedHttp([{ status, body: body("") }]);
    const { delay } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/b.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalled();
    expect(result).toMatchObject({ kind: "response", status, attempts: 1 });
  });

  it.each([500, 502, 503, 429])(
    "uses the whole budget when every attempt returns %i",
    async (status) => {
      const { http, get } = createScriptedHttp([{ status, body: body("busy") }]);
      const { delay, waits } = createRecordingDelay();

      const result = await fetchWithRetry("http://x/c.png", policy, { http, delay, logger });

      expect(get).toHaveBeenCalledTimes(4);
      expect(waits).toEqual([500, 1000, 2000]);
      expect(result).toMatchObject({ kind: "response", status, attempts: 4 });
    }
  );

  it("stops as soon as a retry succeeds", async () => {
    const { http, get } = createScriptedHttp([
      { status: 503, body: body("") },
      { status: 502, body: body("") },
      { status: 200, body: body("finally") },
      { status: 500, body: body("never requested") },
    ]);
    const { delay, waits } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/d.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([500, 1000]);
    expect(result).toEqual({ kind: "response", status: 200, body: body("finally"), attempts: 3 });
  });

  it("retries retryable transport errors and reports the last one", async () => {
    const { http, get } = createScriptedHttp([
      new TransportError("connect ECONNREFUSED 127.0.0.1:80", { code: "ECONNREFUSED", retryable: true }),
    ]);
    const { delay, waits } = createRecordingDelay();

    const result = await fetchWithRetry("http://127.0.0.1/e.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(4);
    expect(waits).toEqual([500, 1000, 2000]);
    expect(result).toEqual({
      kind: "transport-error",
      reason: "connect ECONNREFUSED 127.0.0.1:80",
      code: "ECONNREFUSED",
      attempts: 4,
    });
  });

  it("recovers from a reset followed by a success", async () => {
    const { http, get } = createScriptedHttp([
      new TransportError("socket hang up", { code: "ECONNRESET", retryable: true }),
      { status: 200, body: body("ok") },
    ]);
    const { delay } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/f.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({ kind: "response", status: 200, attempts: 2 });
  });

  it("does not retry a non-retryable transport error", async () => {
    const { http, get } = createScriptedHttp([
      new TransportError("maximum redirect reached", { code: undefined, retryable: false }),
    ]);
    const { delay } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/g.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      kind: "transport-error",
      reason: "maximum redirect reached",
      code: undefined,
      attempts: 1,
    });
  });

  it("turns an unexpected exception into a transport error without retrying", async () => {
    const { http, get } = createScriptedHttp([new TypeError("boom")]);
    const { delay } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/h.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ kind: "transport-error", reason: "boom", code: undefined, attempts: 1 });
  });

  it("makes a single attempt when maxAttempts is 1", async () => {
    const single = createRetryPolicy({ maxAttempts: 1, backoffFactor: 0.5 });
    const { http, get } = createScriptedHttp([{ status: 500, body: body("") }]);
    const { delay } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/i.png", single, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 500, attempts: 1 });
  });

  it("waits a non-decreasing amount between attempts", async () => {
    const long = createRetryPolicy({ maxAttempts: 8, backoffFactor: 2, maxBackoffMs: 10_000 });
    const { http } = createScriptedHttp([{ status: 503, body: body("") }]);
    const { delay, waits } = createRecordingDelay();

    await fetchWithRetry("http://x/j.png", long, { http, delay, logger });

    expect(waits).toEqual([2000, 4000, 8000, 10_000, 10_000, 10_000, 10_000]);
    for (let i = 1; i < waits.length; i++) {
      expect(waits[i]).toBeGreaterThanOrEqual(waits[i - 1]);
    }
  });

  it("waits at least as long as Retry-After asks on 429", async () => {
    const { http, get } = createScriptedHttp([
      { status: 429, body: body(""), retryAfterMs: 5000 },
      { status: 429, body: body(""), retryAfterMs: 5000 },
      { status: 200, body: body("ok") },
    ]);
    const { delay, waits } = createRecordingDelay();

    const result = await fetchWithRetry("http://x/k.png", policy, { http, delay, logger });

    expect(get).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([5000, 5000]);
    expect(result).toMatchObject({ status: 200, attempts: 3 });
  });

  it("keeps waits non-decreasing after a Retry-After hint on 503", async () => {
    const { http } = createScriptedHttp([
      { status: 503, body: body(""), retryAfterMs: 3000 },
      { status: 503, body: body("") },
    ]);
    const { delay, waits } = createRecordingDelay();

    await fetchWithRetry("http://x/l.png", policy, { http, delay, logger });

    expect(waits).toEqual([3000, 3000, 3000]);
  });

  it("ignores Retry-After on statuses that do not carry it", async () => {
    const { http } = createScriptedHttp([{ status: 500, body: body(""), retryAfterMs: 9000 }]);
    const { delay, waits } = createRecordingDelay();

    await fetchWithRetry("http://x/m.png", policy, { http, delay, logger });

    expect(waits).toEqual([500, 1000, 2000]);
  });
});
