/**
 * Abstraction for issuing GET requests.
 * Lets the fetcher and scheduler run against in-process fakes.
 */
export interface HttpResponse {
  status: number;
  body: Uint8Array;
  /** Delay the server asked for in a Retry-After header */
  retryAfterMs?: number;
}

export interface HttpClient {
  /**
   * Perform one GET request and read the whole body.
   * Rejects with a TransportError when no complete response arrives.
   */
  get(url: string): Promise<HttpResponse>;
  /** Release pooled connections */
  close(): void;
}
