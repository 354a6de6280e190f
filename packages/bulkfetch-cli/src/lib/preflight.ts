import { constants } from "fs";
import { access, readFile, stat } from "fs/promises";
import { resolve } from "path";
import {
  directoryNotFound,
  directoryNotWritable,
  inputEmpty,
  inputIsDirectory,
  inputNotFound,
  inputNotReadable,
  notADirectory,
} from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Checks run before any download is scheduled
// ---------------------------------------------------------------------------

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Ensure the URL list exists, is a file and can be read.
 * Returns the absolute path.
 */
export async function checkInputFile(path: string): Promise<string> {
  const resolved = resolve(path);

  let stats;
  try {
    stats = await stat(resolved);
  } catch (error) {
    throw isMissing(error) ? inputNotFound(path) : inputNotReadable(path, errorMessage(error));
  }

  if (stats.isDirectory()) {
    throw inputIsDirectory(path);
  }

  try {
    await access(resolved, constants.R_OK);
  } catch (error) {
    throw inputNotReadable(path, errorMessage(error));
  }

  return resolved;
}

/**
 * Ensure the destination exists, is a directory and is writable.
 * The directory is never created here.
 */
export async function checkDirectory(path: string): Promise<string> {
  const resolved = resolve(path);

  let stats;
  try {
    stats = await stat(resolved);
  } catch (error) {
    throw isMissing(error) ? directoryNotFound(path) : directoryNotWritable(path, errorMessage(error));
  }

  if (!stats.isDirectory()) {
    throw notADirectory(path);
  }

  try {
    await access(resolved, constants.W_OK);
  } catch (error) {
    throw directoryNotWritable(path, errorMessage(error));
  }

  return resolved;
}

// ---------------------------------------------------------------------------
// URL list
// ---------------------------------------------------------------------------

/**
 * Split list text into URLs: one per line, trimmed, blank lines skipped.
 * Anything else on a line is kept as-is and left for the validator.
 */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Read the URL list file. Throws when it holds no URLs at all.
 */
export async function readUrlList(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw inputNotReadable(path, errorMessage(error));
  }

  const urls = parseUrlList(content);
  if (urls.length === 0) {
    throw inputEmpty(path);
  }
  return urls;
}
