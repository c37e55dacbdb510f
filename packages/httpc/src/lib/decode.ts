import type { Readable } from "stream";
import { brotliDecompressSync, constants, gunzipSync } from "zlib";
import { decodeFailed } from "./errors/catalog.js";
import type { WireResponse } from "./ports/transport.js";

export interface DrainResult {
  bytes: Buffer;
  /** Set when the stream failed part way; `bytes` then holds what was read */
  error?: Error;
}

/**
 * Read a body stream to its end and close it.
 */
export async function drain(body: Readable): Promise<DrainResult> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return { bytes: Buffer.concat(chunks) };
  } catch (err) {
    return {
      bytes: Buffer.concat(chunks),
      error: err instanceof Error ? err : new Error(String(err)),
    };
  } finally {
    body.destroy();
  }
}

/**
 * True when the buffer starts with a gzip member header using deflate.
 */
export function hasGzipHeader(bytes: Buffer): boolean {
  return bytes.length >= 10 && bytes[0] === 0x1f && bytes[1] === 0x8b && bytes[2] === 0x08;
}

/**
 * Undo a Content-Encoding. Only "gzip" and "br" are recognized; any other
 * value passes the bytes through.
 *
 * Gzip never fails: a body without a readable header decodes to an empty
 * buffer, a truncated one to what its complete blocks hold, and a corrupt
 * one to an empty buffer. Brotli failures throw.
 */
export function decompress(bytes: Buffer, contentEncoding: string | null): Buffer {
  switch (contentEncoding) {
    case "gzip":
      return gunzipLenient(bytes);
    case "br":
      return brotliDecompressSync(bytes);
    default:
      return bytes;
  }
}

function gunzipLenient(bytes: Buffer): Buffer {
  if (!hasGzipHeader(bytes)) return Buffer.alloc(0);
  try {
    return gunzipSync(bytes, { finishFlush: constants.Z_SYNC_FLUSH });
  } catch {
    return Buffer.alloc(0);
  }
}

/**
 * Read and decode a response body in full. A read failure on a gzip body
 * decodes whatever arrived.
 */
export async function decodeBody(response: WireResponse): Promise<Buffer> {
  const encoding = response.headers.get("Content-Encoding");
  const { bytes, error } = await drain(response.body);
  if (error && encoding !== "gzip") throw decodeFailed(error, response);

  try {
    return decompress(bytes, encoding);
  } catch (err) {
    throw decodeFailed(err, response);
  }
}
