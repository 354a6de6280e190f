import fetch, { AbortError, FetchError } from "node-fetch";
import { Agent as HttpAgent } from "http";
import { Agent as HttpsAgent } from "https";
import type { HttpClient, HttpResponse } from "../ports/http.js";
import { TransportError } from "../errors/types.js";

export interface NodeFetchClientOptions {
  /** Abort an attempt (request and body) after this many milliseconds */
  timeoutMs: number;
  /** Upper bound on open sockets per host */
  maxSockets?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Convert whatever node-fetch threw into a TransportError.
 * System errors (refused, reset, DNS, socket timeouts) and our own
 * per-attempt timeout are worth retrying; redirect and protocol
 * errors are not.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;

  if (error instanceof AbortError) {
    return new TransportError("Request timed out", {
      code: "ETIMEDOUT",
      retryable: true,
      cause: error,
    });
  }

  if (error instanceof FetchError) {
    return new TransportError(error.message, {
      code: error.code,
      retryable: error.type === "system",
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, { retryable: false, cause: error });
}

/**
 * Read a Retry-After header: delta seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;

  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? undefined : Math.max(date - now, 0);
}

/**
 * HTTP client backed by node-fetch with one keep-alive agent per
 * protocol, shared by every concurrent download.
 */
export function createNodeFetchClient(options: NodeFetchClientOptions): HttpClient {
  const { timeoutMs, maxSockets = 100, userAgent, fetchImpl = fetch } = options;

  const httpAgent = new HttpAgent({ keepAlive: true, maxSockets });
  const httpsAgent = new HttpsAgent({ keepAlive: true, maxSockets });

  return {
    async get(url: string): Promise<HttpResponse> {
      try {
        const response = await fetchImpl(url, {
          method: "GET",
          headers: userAgent ? { "User-Agent": userAgent } : undefined,
          agent: (parsedUrl) => (parsedUrl.protocol === "http:" ? httpAgent : httpsAgent),
          signal: AbortSignal.timeout(timeoutMs),
        });
        const body = new Uint8Array(await response.arrayBuffer());
        return {
          status: response.status,
          body,
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        };
      } catch (error) {
        throw toTransportError(error);
      }
    },
    close() {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
