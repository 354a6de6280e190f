/**
 * Abstraction for process interrupt handling.
 * Allows testing drain cancellation without sending real signals.
 */
export interface SignalHandler {
  /** Register a callback for the first interrupt (SIGINT, SIGTERM) */
  onInterrupt(callback: (signal: string) => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
