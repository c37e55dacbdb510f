import { Headers } from "node-fetch";
import { writeFile } from "fs/promises";
import {
  encodeForm,
  encodeJson,
  encodeMultipart,
  FORM_CONTENT_TYPE,
  type EncodedBody,
  type EncodingMode,
  type FilePart,
} from "./body.js";
import { decodeBody, drain } from "./decode.js";
import {
  bodyConsumed,
  httpStatus,
  invalidRequest,
  notSent,
  notWritten,
  rethrown,
  transportFailed,
  writeFailed,
} from "./errors/catalog.js";
import { createConsoleDiagnostics } from "./adapters/console-diagnostics.js";
import { isHttpcError, type HttpcError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { DiagnosticBody, Diagnostics } from "./ports/diagnostics.js";
import type { Transport, WireRequest, WireResponse } from "./ports/transport.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Cookie {
  name: string;
  value: string;
}

export interface HttpRequestOptions {
  transport: Transport;
  /** Receives the verbose record; defaults to a bordered block on stdout */
  diagnostics?: Diagnostics;
  logger?: Logger;
  /** Headers every request starts with; setHeader overrides them */
  headers?: Record<string, string>;
}

export interface TextResult {
  response: WireResponse;
  body: string;
}

export interface BytesResult {
  response: WireResponse;
  body: Buffer;
}

type DispatchOutcome =
  | { kind: "pending" }
  | { kind: "sent"; response: WireResponse }
  | { kind: "failed"; error: HttpcError };

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** RFC 7230 token characters */
const METHOD_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/**
 * Single-shot HTTP request.
 *
 * Setters accumulate state and never fail. `send()` performs the one round
 * trip and records its outcome; it never rejects. Exactly one of `end()`,
 * `endBytes()` or `endFile()` then consumes the response, and any failure
 * recorded by `send()` surfaces there.
 *
 * @example
 * ```typescript
 * const request = await client
 *   .request()
 *   .setMethod("post")
 *   .setUrl("https://example.com/login")
 *   .setData("user", "alice")
 *   .send();
 * const { body } = await request.end();
 * ```
 */
export class HttpRequest {
  private method = "GET";
  private url = "";
  private readonly headers = new Map<string, string>();
  private cookies: Cookie[] = [];
  private readonly formFields = new Map<string, string>();
  private jsonBody = "";
  private fileParts: FilePart[] = [];
  private verbose = false;
  private outcome: DispatchOutcome = { kind: "pending" };
  private consumed = false;
  private readonly transport: Transport;
  private readonly diagnostics: Diagnostics;
  private readonly logger: Logger;

  constructor(options: HttpRequestOptions) {
    this.transport = options.transport;
    this.diagnostics = options.diagnostics ?? createConsoleDiagnostics();
    this.logger = options.logger ?? createNoopLogger();
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      this.headers.set(name, value);
    }
  }

  setMethod(name: string): this {
    this.method = name.toUpperCase();
    return this;
  }

  setUrl(url: string): this {
    this.url = url;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  /** Replace the cookie list sent with the request */
  setCookies(cookies: readonly Cookie[]): this {
    this.cookies = [...cookies];
    return this;
  }

  setVerbose(verbose: boolean): this {
    this.verbose = verbose;
    return this;
  }

  /** Set a url-encoded form field, replacing any earlier value */
  setData(name: string, value: string): this {
    this.formFields.set(name, value);
    return this;
  }

  /** Set the pre-serialized JSON body */
  setJsonData(text: string): this {
    this.jsonBody = text;
    return this;
  }

  /**
   * Set a multipart entry. Only one file entry and one plain entry are kept:
   * a later call with the same `isFile` flag replaces the earlier entry.
   * Use `addFileData` to send several entries of one kind.
   */
  setFileData(fieldName: string, value: string, isFile: boolean): this {
    this.fileParts = [
      ...this.fileParts.filter((part) => part.isFile !== isFile),
      { fieldName, value, isFile },
    ];
    return this;
  }

  /** Append a multipart entry without replacing earlier ones */
  addFileData(fieldName: string, value: string, isFile: boolean): this {
    this.fileParts = [...this.fileParts, { fieldName, value, isFile }];
    return this;
  }

  /**
   * Build the wire request for the given encoding and dispatch it.
   * Failures are recorded, not thrown. Calling send() again is a no-op.
   */
  async send(mode: EncodingMode = "url"): Promise<this> {
    if (this.outcome.kind !== "pending") {
      this.logger.warn("Request already sent; ignoring send()", { url: this.url });
      return this;
    }

    try {
      const wire = await this.build(mode);
      if (this.verbose) this.report(mode, wire);
      const response = await this.dispatch(wire);
      this.outcome = { kind: "sent", response };
    } catch (err) {
      const error = isHttpcError(err) ? err : invalidRequest(messageOf(err), err);
      this.logger.debug("Request failed", { code: error.code, message: error.message });
      this.outcome = { kind: "failed", error };
    }

    return this;
  }

  /**
   * Read the response as UTF-8 text.
   */
  async end(): Promise<TextResult> {
    const { response, body } = await this.endBytes();
    return { response, body: body.toString("utf-8") };
  }

  /**
   * Read the response body, undoing a gzip or brotli Content-Encoding.
   * Any status other than 200 rejects with the status line; the error
   * carries the response.
   */
  async endBytes(): Promise<BytesResult> {
    const response = this.takeResponse();
    if (response.status !== 200) throw httpStatus(response);

    this.claimBody();
    return { response, body: await decodeBody(response) };
  }

  /**
   * Write the raw response body to `savePath + fileName`. Without a file name
   * the last path segment of the URL is used. No separator is inserted.
   */
  async endFile(savePath: string, fileName = ""): Promise<WireResponse> {
    const response = this.takeResponse();
    if (response.status !== 200) throw notWritten();

    this.claimBody();
    const destination = savePath + (fileName || fileNameFromUrl(this.url));

    // Read failures are ignored; whatever arrived is written.
    const { bytes } = await drain(response.body);

    try {
      await writeFile(destination, bytes, { mode: 0o777 });
    } catch (err) {
      throw writeFailed(destination, err);
    }

    this.logger.debug("Response written", { path: destination, bytes: bytes.length });
    return response;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async build(mode: EncodingMode): Promise<WireRequest> {
    const { body, contentType } = await this.encode(mode);

    const method = this.method || "GET";
    if (!METHOD_PATTERN.test(method)) {
      throw invalidRequest(`invalid method "${method}"`);
    }

    let url: URL;
    try {
      url = new URL(this.url);
    } catch (err) {
      throw invalidRequest(`invalid URL "${this.url}"`, err);
    }

    const headers = new Headers();
    if (contentType) headers.set("Content-Type", contentType);

    for (const [name, value] of this.headers) {
      headers.set(name, value);
    }

    for (const cookie of this.cookies) {
      const pair = `${cookie.name}=${cookie.value}`;
      const existing = headers.get("Cookie");
      headers.set("Cookie", existing ? `${existing}; ${pair}` : pair);
    }

    return { method, url, headers, body };
  }

  private async encode(mode: EncodingMode): Promise<EncodedBody> {
    switch (mode) {
      case "url":
        return {
          body: encodeForm(this.formFields),
          contentType: this.method === "POST" ? FORM_CONTENT_TYPE : undefined,
        };
      case "json":
        return { body: encodeJson(this.jsonBody) };
      case "multipart":
        return encodeMultipart(this.fileParts);
    }
  }

  private async dispatch(wire: WireRequest): Promise<WireResponse> {
    this.logger.debug("Dispatching request", { method: wire.method, url: wire.url.href });
    try {
      return await this.transport.do(wire);
    } catch (err) {
      throw transportFailed(err);
    }
  }

  private report(mode: EncodingMode, wire: WireRequest): void {
    this.diagnostics.report({
      method: wire.method,
      url: this.url,
      headers: Object.fromEntries(wire.headers.entries()),
      cookies: parseCookieHeader(wire.headers.get("Cookie")),
      body: this.diagnosticBody(mode),
    });
  }

  private diagnosticBody(mode: EncodingMode): DiagnosticBody {
    switch (mode) {
      case "url":
        return { mode, fields: Object.fromEntries(this.formFields) };
      case "json":
        return { mode, text: this.jsonBody };
      case "multipart":
        return { mode, parts: this.fileParts.map((part) => ({ ...part })) };
    }
  }

  private takeResponse(): WireResponse {
    const outcome = this.outcome;
    switch (outcome.kind) {
      case "pending":
        throw notSent();
      case "failed":
        throw rethrown(outcome.error);
      case "sent":
        return outcome.response;
    }
  }

  private claimBody(): void {
    if (this.consumed) throw bodyConsumed();
    this.consumed = true;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Last "/"-separated segment of a URL, or "" when it has no separator.
 */
export function fileNameFromUrl(url: string): string {
  const segments = url.split("/");
  return segments.length > 1 ? segments[segments.length - 1] : "";
}

/**
 * Split a Cookie header value into name/value pairs.
 */
export function parseCookieHeader(value: string | null): Cookie[] {
  if (!value) return [];
  return value
    .split(";")
    .map((pair) => pair.trim())
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const index = pair.indexOf("=");
      return index === -1
        ? { name: pair, value: "" }
        : { name: pair.slice(0, index), value: pair.slice(index + 1) };
    });
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
