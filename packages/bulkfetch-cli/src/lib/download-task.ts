import type { FileWriter } from "./ports/file-writer.js";
import type { HttpClient } from "./ports/http.js";
import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import type { RetryPolicy } from "./retry-policy.js";
import { isFetchableUrl } from "./url-validator.js";
import { fetchWithRetry } from "./fetcher.js";
import { classify, type Outcome } from "./classifier.js";
import { deriveFilename } from "./file-writer.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Lifecycle of one URL. Each state is entered at most once, in order:
 * pending → validating → fetching → classifying → (writing | rejected) → done.
 * An invalid URL goes from validating straight to rejected.
 */
export type TaskState =
  | "pending"
  | "validating"
  | "fetching"
  | "classifying"
  | "writing"
  | "rejected"
  | "done";

export type StateChangeListener = (url: string, state: TaskState) => void;

export interface DownloadTaskDeps {
  http: HttpClient;
  writer: FileWriter;
  delay: DelayFn;
  logger: Logger;
  policy: RetryPolicy;
  directory: string;
  onStateChange?: StateChangeListener;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Run one URL through validate → fetch → classify → write.
 * Always resolves with exactly one outcome.
 */
export async function runDownloadTask(url: string, deps: DownloadTaskDeps): Promise<Outcome> {
  const { http, writer, delay, logger, policy, directory, onStateChange } = deps;
  const enter = (state: TaskState) => onStateChange?.(url, state);

  const finish = (outcome: Outcome): Outcome => {
    enter("done");
    return outcome;
  };

  enter("pending");
  enter("validating");

  if (!isFetchableUrl(url)) {
    enter("rejected");
    return finish({ kind: "invalid-url", url });
  }

  enter("fetching");
  const result = await fetchWithRetry(url, policy, { http, delay, logger });

  enter("classifying");
  const verdict = classify(url, result, policy);

  if (verdict.action === "reject") {
    enter("rejected");
    return finish(verdict.outcome);
  }

  enter("writing");
  try {
    const written = await writer.write(directory, url, verdict.body);
    return finish({
      kind: "success",
      url,
      filename: written.filename,
      path: written.path,
      bytesWritten: written.bytesWritten,
      attempts: verdict.attempts,
    });
  } catch (error) {
    return finish({
      kind: "filesystem-error",
      url,
      filename: deriveFilename(url),
      reason: errorMessage(error),
    });
  }
}
