import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for the batch-fatal errors raised
 * while checking the command line, before any download starts.
 */

const USAGE_EXAMPLE = "bulkfetch -i urls.txt -d ./downloads";

// ============================================================================
// Input List Errors
// ============================================================================

export function inputNotFound(path: string): CLIError {
  return new CLIError("INPUT_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Check the URL list path exists and try again",
    example: USAGE_EXAMPLE,
  });
}

export function inputNotReadable(path: string, reason?: string): CLIError {
  return new CLIError("INPUT_NOT_READABLE", `Can't read "${path}"`, {
    suggestion: "Check the file permissions of the URL list",
    details: reason,
  });
}

export function inputIsDirectory(path: string): CLIError {
  return new CLIError("INPUT_IS_DIRECTORY", `"${path}" is a directory, not a file`, {
    suggestion: "Pass the text file that holds one URL per line",
  });
}

export function inputEmpty(path: string): CLIError {
  return new CLIError("INPUT_EMPTY", `"${path}" has no URLs in it`, {
    suggestion: "Put one URL per line in the input file",
  });
}

// ============================================================================
// Destination Errors
// ============================================================================

export function directoryNotFound(path: string): CLIError {
  return new CLIError("DIRECTORY_NOT_FOUND", `Can't find directory "${path}"`, {
    suggestion: "Create the download directory first",
    example: `mkdir -p ${path}`,
  });
}

export function notADirectory(path: string): CLIError {
  return new CLIError("DIRECTORY_NOT_A_DIRECTORY", `"${path}" is not a directory`, {
    suggestion: "Pass a directory to -d/--directory",
  });
}

export function directoryNotWritable(path: string, reason?: string): CLIError {
  return new CLIError("DIRECTORY_NOT_WRITABLE", `Can't write to "${path}"`, {
    suggestion: "Check the directory permissions or pick another directory",
    details: reason,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingArgument(argName: string): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: "Both the URL list and the download directory are required",
    examples: [USAGE_EXAMPLE, "bulkfetch --help"],
  });
}

export function invalidConfig(issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", "Configuration has errors", {
    suggestion: "Fix the options or BULKFETCH_* variables below and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}
