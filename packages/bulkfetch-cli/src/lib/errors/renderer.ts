import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import type { OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/** Receives rendered lines; stderr by default */
export type LineWriter = (line: string) => void;

const stderrWriter: LineWriter = (line) => console.error(line);

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

function renderStaticError(error: CLIError, write: LineWriter): void {
  const termWidth = Math.min(process.stderr.columns || 80, 80);
  const output: string[] = [""];

  const errorLines = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];
  if (examples.length === 1) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    output.push("");
    output.push(`  ${chalk.dim("Examples:")}`);
    for (const ex of examples.slice(0, 3)) {
      output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
    }
  }

  output.push("");

  for (const line of output) {
    write(line);
  }
}

function renderJSONError(error: CLIError, write: LineWriter): void {
  const output = {
    type: "error",
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  write(JSON.stringify(cleaned));
}

/**
 * Render an error for the given output mode.
 */
export function renderError(
  error: CLIError,
  mode: OutputMode,
  write: LineWriter = stderrWriter
): void {
  switch (mode) {
    case "json":
      renderJSONError(error, write);
      break;
    case "static":
    case "tui":
      renderStaticError(error, write);
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(
  error: unknown,
  mode: OutputMode,
  write: LineWriter = stderrWriter
): void {
  if (isCLIError(error)) {
    renderError(error, mode, write);
    return;
  }
  renderError(unknownError(error), mode, write);
}
