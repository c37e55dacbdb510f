import chalk from "chalk";
import { HttpcError, isHttpcError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Wrap text to fit within a given width, indenting continuation lines.
 */
function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
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

function renderStaticError(error: HttpcError): void {
  const width = Math.min(process.stderr.columns || 80, 80) - 4;
  const output: string[] = [];

  const [first = "", ...rest] = wrapText(error.message, width, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push(`  ${chalk.dim(error.details)}`);
  }

  if (error.suggestion) {
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  for (const line of output) {
    console.error(line);
  }
}

function renderJSONError(error: HttpcError): void {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    status: error.response?.status,
    suggestion: error.suggestion,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  console.error(JSON.stringify(cleaned, null, 2));
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: HttpcError, mode?: OutputMode): void {
  switch (mode ?? getOutputMode()) {
    case "json":
      renderJSONError(error);
      break;
    case "static":
      renderStaticError(error);
      break;
  }
}

/**
 * Convert an unknown error to an HttpcError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isHttpcError(error)) {
    renderError(error, mode);
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  renderError(new HttpcError("UNKNOWN_ERROR", message, { cause: error }), mode);
}
