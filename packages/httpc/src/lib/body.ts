import FormData from "form-data";
import { readFile } from "fs/promises";
import { basename } from "path";
import { fileNotReadable } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** How the request body is serialized */
export type EncodingMode = "url" | "json" | "multipart";

/** One multipart entry: a file path to upload, or a plain field value */
export interface FilePart {
  fieldName: string;
  value: string;
  isFile: boolean;
}

export interface EncodedBody {
  body: Buffer;
  /** Content-Type the encoder requires, if any */
  contentType?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded; charset=UTF-8";

const FILE_CONTENT_TYPE = "application/octet-stream";

// ---------------------------------------------------------------------------
// Encoders
// ---------------------------------------------------------------------------

/**
 * Map free-form mode text onto an encoding mode.
 * Absent or "url" selects url-encoding, "json" selects JSON,
 * and any other value selects multipart.
 */
export function parseEncodingMode(value?: string): EncodingMode {
  if (value === undefined || value === "url") return "url";
  if (value === "json") return "json";
  return "multipart";
}

/**
 * URL-encode form fields, sorted by key. Only `A-Za-z0-9-_.~` stay literal:
 * URLSearchParams keeps `*` and escapes `~`, so both are swapped back.
 */
export function encodeForm(fields: ReadonlyMap<string, string>): Buffer {
  const sorted = [...fields.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const encoded = new URLSearchParams(sorted).toString().replace(/\*/g, "%2A").replace(/%7E/g, "~");
  return Buffer.from(encoded, "utf-8");
}

export function encodeJson(text: string): Buffer {
  return Buffer.from(text, "utf-8");
}

/**
 * Build a multipart/form-data body. File entries are read fully into memory;
 * a file that cannot be read fails the whole body.
 */
export async function encodeMultipart(parts: readonly FilePart[]): Promise<EncodedBody> {
  const form = new FormData();

  for (const part of parts) {
    if (!part.isFile) {
      form.append(part.fieldName, part.value);
      continue;
    }

    let content: Buffer;
    try {
      content = await readFile(part.value);
    } catch (err) {
      throw fileNotReadable(part.value, err);
    }

    form.append(part.fieldName, content, {
      filename: basename(part.value),
      contentType: FILE_CONTENT_TYPE,
    });
  }

  return {
    body: form.getBuffer(),
    contentType: `multipart/form-data; boundary=${form.getBoundary()}`,
  };
}
