import type { WireResponse } from "../ports/transport.js";

/**
 * Error codes for every failure a request can end in.
 * Each code maps to one stage of the request lifecycle.
 */
export type ErrorCode =
  // Dispatch errors (recorded on the request, rethrown by terminal operations)
  | "REQUEST_INVALID"
  | "FILE_NOT_READABLE"
  | "TRANSPORT_FAILED"
  // Response errors
  | "HTTP_STATUS"
  | "NOT_WRITTEN"
  | "DECODE_FAILED"
  | "WRITE_FAILED"
  // Misuse
  | "NOT_SENT"
  | "BODY_CONSUMED"
  // Command line
  | "INVALID_OPTION"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Error raised by requests and the CLI, with optional context for rendering.
 */
export class HttpcError extends Error {
  readonly code: ErrorCode;
  readonly response?: WireResponse;
  readonly suggestion?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      response?: WireResponse;
      suggestion?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "HttpcError";
    this.code = code;
    this.response = options?.response;
    this.suggestion = options?.suggestion;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is an HttpcError.
 */
export function isHttpcError(error: unknown): error is HttpcError {
  return error instanceof HttpcError;
}
