import { z } from "zod";

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:"]);

/** The parser forgives "http:x" and backslashes; the raw text must not */
const EXPLICIT_AUTHORITY = /^https?:\/\//i;

/**
 * An absolute http(s) URL with a host. `z.string().url()` accepts any
 * scheme the WHATWG parser does, so the protocol is narrowed after.
 * The refinement also runs when `.url()` already failed, hence the parse guard.
 */
export const FetchableUrlSchema = z
  .string()
  .url()
  .refine((value) => {
    if (!EXPLICIT_AUTHORITY.test(value) || value.includes("\\")) return false;
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      return false;
    }
    return FETCHABLE_PROTOCOLS.has(parsed.protocol) && parsed.hostname.length > 0;
  }, "Only http and https URLs with a host can be fetched");

/**
 * Check whether a string is worth spending a request on.
 */
export function isFetchableUrl(value: string): boolean {
  return FetchableUrlSchema.safeParse(value).success;
}
