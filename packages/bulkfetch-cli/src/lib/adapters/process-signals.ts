import type { SignalHandler } from "../ports/signal-handler.js";

/** Exit status for a run ended by a second interrupt */
export const FORCED_EXIT_CODE = 130;

/** The parts of `process` the handler touches */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code: number): void;
}

/**
 * Create a signal handler for SIGINT/SIGTERM.
 * The first signal runs the registered callbacks (drain); a second one
 * exits immediately.
 */
export function createProcessSignalHandler(
  proc: SignalSource = process
): SignalHandler {
  const handlers: Array<(signal: string) => void> = [];
  let interrupted = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (interrupted) {
      proc.exit(FORCED_EXIT_CODE);
      return;
    }
    interrupted = true;
    for (const handler of handlers) handler(signal);
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        proc.on("SIGTERM", handleSignal);
        proc.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      proc.off("SIGTERM", handleSignal);
      proc.off("SIGINT", handleSignal);
    },
  };
}
