import type { DelayFn } from "../ports/timer.js";

/**
 * Real delay function using setTimeout.
 */
export const realDelay: DelayFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
