import { Command } from "commander";
import chalk from "chalk";
import { resolveConfig, type ResolvedConfig } from "../lib/config.js";
import { createCliContext } from "../lib/cli-context.js";
import { getOutputMode, type OutputStream } from "../lib/output/mode.js";
import { createLogger, LOG_LEVEL_NAMES, type LogSink } from "../lib/logger.js";
import { createRetryPolicy } from "../lib/retry-policy.js";
import { createDownloadJob, runDownloadJob } from "../lib/scheduler.js";
import { checkDirectory, checkInputFile, readUrlList } from "../lib/preflight.js";
import { logOutcome, summarizeOutcomes, type DownloadSummary } from "../lib/report.js";
import { createProgress, type MarkerStream } from "../lib/progress.js";
import { outcomeEvent, outputNdjson, summaryEvent, type NdjsonWriter } from "../lib/json-output.js";
import { missingArgument } from "../lib/errors/catalog.js";
import { renderUnknownError, type LineWriter } from "../lib/errors/renderer.js";
import { createNodeFetchClient } from "../lib/adapters/node-fetch-client.js";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import type { Outcome } from "../lib/classifier.js";
import type { HttpClient } from "../lib/ports/http.js";
import type { DelayFn } from "../lib/ports/timer.js";
import type { FileWriter } from "../lib/ports/file-writer.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  input?: string;
  directory?: string;
  concurrency?: string;
  retries?: string;
  backoff?: string;
  timeout?: string;
  logLevel?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Dependencies for a download run.
 * All have defaults for production use.
 */
export interface DownloadDeps {
  createHttpClient?: (config: ResolvedConfig) => HttpClient;
  signalHandler?: SignalHandler;
  delay?: DelayFn;
  writer?: FileWriter;
  env?: NodeJS.ProcessEnv;
  userAgent?: string;
  logSink?: LogSink;
  progressStream?: MarkerStream & OutputStream;
  writeNdjson?: NdjsonWriter;
  writeError?: LineWriter;
}

export interface DownloadRunResult {
  /** Undefined when the run stopped before scheduling */
  summary?: DownloadSummary;
  cancelled: boolean;
  exitCode: number;
}

/** Exit status when an interrupt ended the batch early */
export const CANCELLED_EXIT_CODE = 130;

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

/**
 * Validate the command line, then download every URL in the list.
 * Per-URL failures are logged and counted; only bad input stops the run
 * before it starts.
 */
export async function runDownloadCommand(
  options: DownloadOptions,
  deps: DownloadDeps = {}
): Promise<DownloadRunResult> {
  const env = deps.env ?? process.env;
  const progressStream = deps.progressStream ?? process.stdout;
  const context = createCliContext({ json: options.json, quiet: options.quiet }, env);
  const mode = getOutputMode(context, progressStream, env);

  let config: ResolvedConfig;
  let directory: string;
  let urls: string[];
  try {
    if (!options.input) throw missingArgument("the URL list (-i, --input <file>)");
    if (!options.directory) throw missingArgument("the download directory (-d, --directory <dir>)");

    config = resolveConfig(options, env);
    const inputPath = await checkInputFile(options.input);
    directory = await checkDirectory(options.directory);
    urls = await readUrlList(inputPath);
  } catch (error) {
    renderUnknownError(error, mode, deps.writeError);
    return { cancelled: false, exitCode: 1 };
  }

  const logger = createLogger({ level: config.logLevel, json: context.json, sink: deps.logSink });
  const policy = createRetryPolicy({
    maxAttempts: config.retries + 1,
    backoffFactor: config.backoffFactor,
  });
  const job = createDownloadJob({ urls, policy, directory, concurrency: config.concurrency });

  const http = deps.createHttpClient
    ? deps.createHttpClient(config)
    : createNodeFetchClient({
        timeoutMs: config.timeoutMs,
        maxSockets: config.concurrency,
        userAgent: deps.userAgent,
      });

  const controller = new AbortController();
  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  signalHandler.onInterrupt((signal) => {
    logger.warn("Received signal, finishing downloads already in progress", { signal });
    controller.abort();
  });

  logger.debug("Download run configured", {
    urls: urls.length,
    directory,
    concurrency: config.concurrency,
    maxAttempts: policy.maxAttempts,
    backoffFactor: policy.backoffFactor,
    timeoutMs: config.timeoutMs,
  });

  const progress = createProgress(mode, {
    total: urls.length,
    quiet: context.quiet,
    stream: progressStream,
  });
  const outcomes: Outcome[] = [];

  try {
    const stream = runDownloadJob(
      job,
      { http, logger, delay: deps.delay, writer: deps.writer },
      { signal: controller.signal }
    );
    for await (const outcome of stream) {
      outcomes.push(outcome);
      progress.tick(outcome);
      logOutcome(logger, outcome);
      if (context.json) outputNdjson(outcomeEvent(outcome), deps.writeNdjson);
    }
  } finally {
    progress.stop(controller.signal.aborted);
    signalHandler.removeAll();
    http.close();
  }

  const cancelled = controller.signal.aborted;
  const summary = summarizeOutcomes(outcomes, urls.length);

  if (context.json) {
    outputNdjson(summaryEvent(summary, cancelled), deps.writeNdjson);
  } else {
    logger.info("Download finished", {
      succeeded: summary.succeeded,
      failed: summary.failed,
      notStarted: summary.notStarted,
      bytesWritten: summary.bytesWritten,
    });
  }

  const exitCode = cancelled ? CANCELLED_EXIT_CODE : summary.failed > 0 ? 1 : 0;
  return { summary, cancelled, exitCode };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, deps: DownloadDeps = {}): void {
  program
    .command("download", { isDefault: true })
    .description("Download every URL listed in a text file into a directory")
    .option("-i, --input <file>", "Text file with one URL per line (required)")
    .option("-d, --directory <dir>", "Existing directory to save files into (required)")
    .option("--concurrency <n>", "Maximum parallel downloads (default: 100)")
    .option("--retries <n>", "Retries after the first attempt (default: 5)")
    .option("--backoff <seconds>", "Backoff factor; waits are factor * 2^(attempt-1) (default: 0.5)")
    .option("--timeout <ms>", "Per-attempt timeout in milliseconds (default: 30000)")
    .option("--log-level <level>", `Log level: ${LOG_LEVEL_NAMES.join(", ")} (default: info)`)
    .option("--json", "Emit NDJSON events instead of text")
    .option("-q, --quiet", "Hide progress markers")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("How It Works:")}
  1. Reads one URL per line from the input file (blank lines are skipped)
  2. Downloads up to --concurrency URLs at once
  3. Retries connection errors and error statuses with exponential backoff
  4. Never retries 403 and 404
  5. Saves each file under the last path segment of its URL (overwrites)

${chalk.bold.cyan("Environment:")}
  BULKFETCH_CONCURRENCY, BULKFETCH_RETRIES, BULKFETCH_BACKOFF,
  BULKFETCH_TIMEOUT, BULKFETCH_LOG_LEVEL, BULKFETCH_JSON, BULKFETCH_QUIET

${chalk.bold.cyan("Examples:")}
  bulkfetch -i urls.txt -d ./downloads
      ${chalk.gray("Download everything in urls.txt")}

  bulkfetch -i urls.txt -d ./downloads --concurrency 10 --retries 2
      ${chalk.gray("Be gentler with the servers")}

  bulkfetch -i urls.txt -d ./downloads --json > events.ndjson
      ${chalk.gray("One JSON event per URL for scripting")}

${chalk.bold.cyan("Tips:")}
  • Press ${chalk.yellow("Ctrl+C")} once to stop starting new downloads (running ones finish)
  • Press ${chalk.yellow("Ctrl+C")} again to quit immediately
`
    )
    .action(async (options: DownloadOptions) => {
      const result = await runDownloadCommand(options, deps);
      process.exitCode = result.exitCode;
    });
}
