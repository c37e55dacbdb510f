import type { FilePart } from "../body.js";

/** Body of a request as shown in verbose output, by encoding mode */
export type DiagnosticBody =
  | { mode: "url"; fields: Record<string, string> }
  | { mode: "json"; text: string }
  | { mode: "multipart"; parts: FilePart[] };

/**
 * Structured record of a dispatched request.
 */
export interface RequestDiagnostic {
  method: string;
  url: string;
  headers: Record<string, string>;
  cookies: Array<{ name: string; value: string }>;
  body: DiagnosticBody;
}

/**
 * Sink for verbose request diagnostics.
 * Allows testing without console output.
 */
export interface Diagnostics {
  report(record: RequestDiagnostic): void;
}
