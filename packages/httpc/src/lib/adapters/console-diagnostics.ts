import chalk from "chalk";
import type { DiagnosticBody, Diagnostics, RequestDiagnostic } from "../ports/diagnostics.js";
import type { Logger } from "../logger.js";

const BORDER = "-".repeat(67);

function formatBody(body: DiagnosticBody): string {
  switch (body.mode) {
    case "url":
      return JSON.stringify(body.fields);
    case "json":
      return body.text;
    case "multipart":
      return JSON.stringify(body.parts);
  }
}

/**
 * Render a diagnostic record as the lines of a bordered block.
 */
export function formatDiagnostic(record: RequestDiagnostic): string[] {
  const cookies = record.cookies.map((c) => `${c.name}=${c.value}`).join("; ");
  return [
    chalk.dim(BORDER),
    `Request: ${record.method} ${record.url}`,
    `Header: ${JSON.stringify(record.headers)}`,
    `Cookies: ${cookies}`,
    `Body: ${formatBody(record.body)}`,
    chalk.dim(BORDER),
  ];
}

/**
 * Create a diagnostics sink that prints a bordered block per request.
 */
export function createConsoleDiagnostics(
  write: (line: string) => void = (line) => console.log(line)
): Diagnostics {
  return {
    report(record) {
      for (const line of formatDiagnostic(record)) {
        write(line);
      }
    },
  };
}

/**
 * Create a diagnostics sink that forwards records to a logger.
 */
export function createLoggerDiagnostics(logger: Logger): Diagnostics {
  return {
    report(record) {
      logger.info(`${record.method} ${record.url}`, { ...record });
    },
  };
}
