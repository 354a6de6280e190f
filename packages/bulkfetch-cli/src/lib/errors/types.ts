/**
 * Error codes for batch-fatal CLI errors.
 * Per-URL failures are never CLIErrors; they become outcomes.
 */
export type ErrorCode =
  // Input errors
  | "INPUT_NOT_FOUND"
  | "INPUT_NOT_READABLE"
  | "INPUT_IS_DIRECTORY"
  | "INPUT_EMPTY"
  // Destination errors
  | "DIRECTORY_NOT_FOUND"
  | "DIRECTORY_NOT_A_DIRECTORY"
  | "DIRECTORY_NOT_WRITABLE"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Error raised before any download is scheduled, carrying enough
 * context for the renderer to tell the operator what to fix.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      examples?: string[];
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * A network-level failure for a single request: nothing came back,
 * or the body could not be read to the end.
 */
export class TransportError extends Error {
  /** System error code such as ECONNREFUSED, when known */
  readonly code?: string;
  /** Whether another attempt might succeed */
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { code?: string; retryable: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.code = options.code;
    this.retryable = options.retryable;
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Writing a downloaded body to the destination directory failed.
 */
export class FileWriteError extends Error {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "FileWriteError";
    this.path = path;
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
