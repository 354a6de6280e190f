import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Unique identifier for this task */
  id: string;
  /** Function that performs the actual work */
  execute: () => Promise<T>;
}

export interface QueueOptions<T> {
  /** Maximum number of concurrent tasks */
  concurrency: number;
  /** Logger instance for queue operations */
  logger: Logger;
  /** Called with each task's value as soon as it resolves */
  onResult?: (result: T, task: QueueTask<T>) => void;
  /** Called when a task rejects */
  onError?: (error: unknown, task: QueueTask<T>) => void;
}

export interface QueueStats {
  /** Number of tasks waiting to be processed */
  pending: number;
  /** Number of tasks currently being processed */
  active: number;
  /** Number of tasks that resolved */
  completed: number;
  /** Number of tasks that rejected */
  failed: number;
  /** Number of tasks dropped by stop() before they started */
  discarded: number;
  /** Total number of tasks processed (completed + failed) */
  totalProcessed: number;
  /** Average processing time in milliseconds */
  averageLatencyMs: number;
}

export interface ProcessingQueue<T> {
  /** Add a task to the queue; ignored once stopped */
  enqueue(task: QueueTask<T>): void;
  /** Get current queue statistics */
  getStats(): QueueStats;
  /** Wait for all pending and active tasks to complete */
  drain(): Promise<void>;
  /** Discard pending tasks and refuse new ones; active tasks run to completion */
  stop(): void;
  /** Check if queue is stopped */
  isStopped(): boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Maximum number of latency samples to keep for rolling average */
const MAX_LATENCY_SAMPLES = 100;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded worker pool.
 * Tasks start in FIFO order with at most `concurrency` running at once;
 * completion order is whatever the tasks make it.
 */
export function createQueue<T>(options: QueueOptions<T>): ProcessingQueue<T> {
  const { concurrency, logger, onResult, onError } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be an integer >= 1, got ${concurrency}`);
  }

  const pending: QueueTask<T>[] = [];
  const active = new Set<QueueTask<T>>();
  const latencies: number[] = [];
  const drainWaiters: Array<() => void> = [];

  let completed = 0;
  let failed = 0;
  let discarded = 0;
  let stopped = false;

  function getStats(): QueueStats {
    const avgLatency =
      latencies.length > 0
        ? latencies.reduce((a, b) => a + b, 0) / latencies.length
        : 0;

    return {
      pending: pending.length,
      active: active.size,
      completed,
      failed,
      discarded,
      totalProcessed: completed + failed,
      averageLatencyMs: Math.round(avgLatency),
    };
  }

  function checkDrainComplete(): void {
    if (drainWaiters.length > 0 && pending.length === 0 && active.size === 0) {
      for (const resolve of drainWaiters.splice(0)) resolve();
    }
  }

  function processNext(): void {
    checkDrainComplete();

    if (stopped) return;

    while (active.size < concurrency && pending.length > 0) {
      const task = pending.shift();
      if (task) {
        void processTask(task);
      }
    }
  }

  async function processTask(task: QueueTask<T>): Promise<void> {
    const startTime = Date.now();

    active.add(task);
    logger.debug("Task started", { taskId: task.id, active: active.size });

    try {
      const result = await task.execute();
      const latency = Date.now() - startTime;
      latencies.push(latency);
      if (latencies.length > MAX_LATENCY_SAMPLES) latencies.shift();

      completed++;
      logger.debug("Task completed", { taskId: task.id, latencyMs: latency });
      onResult?.(result, task);
    } catch (error) {
      failed++;
      logger.error("Task failed", {
        taskId: task.id,
        error: error instanceof Error ? error.message : String(error),
      });
      onError?.(error, task);
    } finally {
      active.delete(task);
      processNext();
    }
  }

  function enqueue(task: QueueTask<T>): void {
    if (stopped) {
      discarded++;
      logger.debug("Queue stopped, task not admitted", { taskId: task.id });
      return;
    }
    pending.push(task);
    logger.debug("Task enqueued", {
      taskId: task.id,
      pendingCount: pending.length,
    });
    processNext();
  }

  function drain(): Promise<void> {
    if (pending.length === 0 && active.size === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      drainWaiters.push(resolve);
    });
  }

  function stop(): void {
    if (stopped) return;
    stopped = true;
    discarded += pending.length;
    logger.info("Queue stopped, waiting for active tasks", {
      discarded: pending.length,
      active: active.size,
    });
    pending.length = 0;
  }

  return {
    enqueue,
    getStats,
    drain,
    stop,
    isStopped: () => stopped,
  };
}
