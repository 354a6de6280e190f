import { z } from "zod";
import type { FileWriter } from "./ports/file-writer.js";
import type { HttpClient } from "./ports/http.js";
import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import type { RetryPolicy } from "./retry-policy.js";
import type { Outcome } from "./classifier.js";
import { createQueue } from "./queue.js";
import { runDownloadTask, type StateChangeListener } from "./download-task.js";
import { fsFileWriter } from "./file-writer.js";
import { realDelay } from "./adapters/real-timers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Default bound on simultaneously running downloads */
export const DEFAULT_CONCURRENCY = 100;

const DownloadJobInputSchema = z.object({
  urls: z.array(z.string()),
  directory: z.string().min(1),
  concurrency: z.number().int().min(1),
});

export interface DownloadJob {
  /** In input order; duplicates are downloaded independently */
  readonly urls: readonly string[];
  readonly policy: RetryPolicy;
  readonly directory: string;
  readonly concurrency: number;
}

export interface DownloadJobInput {
  urls: string[];
  policy: RetryPolicy;
  directory: string;
  concurrency?: number;
}

/**
 * Collaborators shared by every task in a run.
 * One HttpClient serves all workers so connections are reused.
 */
export interface SchedulerDeps {
  http: HttpClient;
  logger: Logger;
  writer?: FileWriter;
  delay?: DelayFn;
  onStateChange?: StateChangeListener;
}

interface OutcomeStream {
  ready: Outcome[];
  drained: boolean;
  failure?: { error: unknown };
  wake?: () => void;
}

export interface RunOptions {
  /** Aborting stops admission; running downloads finish */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Validate inputs once and freeze them into a job.
 */
export function createDownloadJob(input: DownloadJobInput): DownloadJob {
  const parsed = DownloadJobInputSchema.parse({
    urls: input.urls,
    directory: input.directory,
    concurrency: input.concurrency ?? DEFAULT_CONCURRENCY,
  });

  return Object.freeze({
    urls: Object.freeze([...parsed.urls]),
    policy: input.policy,
    directory: parsed.directory,
    concurrency: parsed.concurrency,
  });
}

/**
 * Run every URL of the job through a bounded pool and yield each
 * outcome as soon as its download finishes.
 *
 * Cancellation drains rather than kills: after `signal` aborts no
 * further URL is started, and the generator ends once the downloads
 * already in flight have produced their outcomes.
 */
export async function* runDownloadJob(
  job: DownloadJob,
  deps: SchedulerDeps,
  options: RunOptions = {}
): AsyncGenerator<Outcome, void, undefined> {
  const { signal } = options;
  const logger = deps.logger.child({ component: "scheduler" });
  const taskDeps = {
    http: deps.http,
    writer: deps.writer ?? fsFileWriter,
    delay: deps.delay ?? realDelay,
    logger: deps.logger,
    policy: job.policy,
    directory: job.directory,
    onStateChange: deps.onStateChange,
  };

  // Written from queue callbacks, read by the loop below
  const stream: OutcomeStream = { ready: [], drained: false };

  const notify = () => {
    const resolve = stream.wake;
    stream.wake = undefined;
    resolve?.();
  };

  const queue = createQueue<Outcome>({
    concurrency: job.concurrency,
    logger,
    onResult: (outcome) => {
      stream.ready.push(outcome);
      notify();
    },
    onError: (error) => {
      if (!stream.failure) stream.failure = { error };
      notify();
    },
  });

  const onAbort = () => {
    const stats = queue.getStats();
    logger.warn("Stopping queued downloads", {
      inFlight: stats.active,
      notStarted: stats.pending,
    });
    queue.stop();
  };

  if (signal?.aborted) {
    queue.stop();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  logger.debug("Starting download job", {
    urls: job.urls.length,
    concurrency: job.concurrency,
    directory: job.directory,
  });

  job.urls.forEach((url, index) => {
    queue.enqueue({ id: `${index}:${url}`, execute: () => runDownloadTask(url, taskDeps) });
  });

  void queue.drain().then(() => {
    stream.drained = true;
    notify();
  });

  try {
    while (true) {
      const next = stream.ready.shift();
      if (next) {
        yield next;
        continue;
      }
      if (stream.failure) throw stream.failure.error;
      if (stream.drained) break;
      await new Promise<void>((resolve) => {
        stream.wake = resolve;
      });
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    // A consumer that stops iterating early still lets running downloads finish
    if (!stream.drained) queue.stop();
    const stats = queue.getStats();
    logger.debug("Download job finished", {
      completed: stats.completed,
      notStarted: stats.discarded,
      averageLatencyMs: stats.averageLatencyMs,
    });
  }
}
