import { HttpcError } from "./types.js";
import type { WireResponse } from "../ports/transport.js";

/**
 * Error catalog - factory functions for every HttpcError a request produces.
 * Messages of the dispatch and response errors are part of the wire contract.
 */

// ============================================================================
// Dispatch Errors
// ============================================================================

export function invalidRequest(message: string, cause?: unknown): HttpcError {
  return new HttpcError("REQUEST_INVALID", message, {
    suggestion: "Check the method and URL of the request",
    cause,
  });
}

export function fileNotReadable(path: string, cause: unknown): HttpcError {
  return new HttpcError("FILE_NOT_READABLE", messageOf(cause), {
    suggestion: `Check that "${path}" exists and is readable`,
    details: path,
    cause,
  });
}

export function transportFailed(cause: unknown): HttpcError {
  return new HttpcError("TRANSPORT_FAILED", messageOf(cause), {
    suggestion: "Check your network connection and the target host",
    cause,
  });
}

/**
 * Re-raise a recorded dispatch error with its message unchanged.
 */
export function rethrown(error: HttpcError): HttpcError {
  return new HttpcError(error.code, error.message, {
    suggestion: error.suggestion,
    details: error.details,
    cause: error,
  });
}

// ============================================================================
// Response Errors
// ============================================================================

export function httpStatus(response: WireResponse): HttpcError {
  return new HttpcError("HTTP_STATUS", statusLine(response), { response });
}

export function notWritten(): HttpcError {
  return new HttpcError("NOT_WRITTEN", "Not written");
}

export function decodeFailed(cause: unknown, response: WireResponse): HttpcError {
  return new HttpcError("DECODE_FAILED", messageOf(cause), { response, cause });
}

export function writeFailed(path: string, cause: unknown): HttpcError {
  return new HttpcError("WRITE_FAILED", messageOf(cause), {
    suggestion: "Check the destination directory exists and is writable",
    details: path,
    cause,
  });
}

// ============================================================================
// Misuse
// ============================================================================

export function notSent(): HttpcError {
  return new HttpcError("NOT_SENT", "Request has not been sent", {
    suggestion: "Call send() before reading the response",
  });
}

export function bodyConsumed(): HttpcError {
  return new HttpcError("BODY_CONSUMED", "Response body has already been read", {
    suggestion: "Call only one of end(), endBytes() or endFile() per request",
  });
}

// ============================================================================
// Command Line
// ============================================================================

export function invalidOption(option: string, value: string, expected: string): HttpcError {
  return new HttpcError("INVALID_OPTION", `Invalid ${option} "${value}"`, {
    suggestion: `Expected ${expected}`,
  });
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Status line as servers send it, e.g. "404 Not Found".
 */
export function statusLine(response: WireResponse): string {
  return response.statusText ? `${response.status} ${response.statusText}` : String(response.status);
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
