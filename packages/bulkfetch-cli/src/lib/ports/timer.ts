/**
 * Promise-based delay function type.
 * Injected into the retry loop so tests can record waits instead of sleeping.
 */
export type DelayFn = (ms: number) => Promise<void>;
