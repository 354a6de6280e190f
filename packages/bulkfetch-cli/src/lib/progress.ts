/**
 * Per-completion progress markers that respect the output mode.
 */

import ora, { type Ora } from "ora";
import type { Outcome } from "./classifier.js";
import type { OutputMode } from "./output/mode.js";

export interface Progress {
  /** Record one finished URL */
  tick(outcome: Outcome): void;
  /** End the progress display */
  stop(cancelled: boolean): void;
}

/** Minimal writable the dot marker needs */
export interface MarkerStream {
  write(chunk: string): unknown;
}

/**
 * No-op progress for quiet/JSON mode.
 */
class SilentProgress implements Progress {
  tick(_outcome: Outcome): void {}

  stop(_cancelled: boolean): void {}
}

/**
 * One "." per finished URL, for pipes and CI logs.
 */
class DotProgress implements Progress {
  private written = 0;

  constructor(private readonly stream: MarkerStream) {}

  tick(_outcome: Outcome): void {
    this.stream.write(".");
    this.written++;
  }

  stop(cancelled: boolean): void {
    if (cancelled) this.stream.write(" stopped");
    if (this.written > 0 || cancelled) this.stream.write("\n");
  }
}

/**
 * Spinner with a running counter for interactive terminals.
 */
class OraProgress implements Progress {
  private readonly ora: Ora;
  private done = 0;
  private failed = 0;

  constructor(private readonly total: number) {
    this.ora = ora(this.label()).start();
  }

  private label(): string {
    const failures = this.failed > 0 ? ` (${this.failed} failed)` : "";
    return `Downloading ${this.done}/${this.total}${failures}`;
  }

  tick(outcome: Outcome): void {
    this.done++;
    if (outcome.kind !== "success") this.failed++;
    this.ora.text = this.label();
  }

  stop(cancelled: boolean): void {
    const text = `${this.label()}${cancelled ? ", stopped early" : ""}`;
    if (cancelled || this.failed > 0) {
      this.ora.warn(text);
    } else {
      this.ora.succeed(text);
    }
  }
}

/**
 * Pick the progress display for an output mode.
 */
export function createProgress(
  mode: OutputMode,
  options: { total: number; quiet: boolean; stream?: MarkerStream }
): Progress {
  if (options.quiet || mode === "json") {
    return new SilentProgress();
  }
  if (mode === "tui") {
    return new OraProgress(options.total);
  }
  return new DotProgress(options.stream ?? process.stdout);
}
