import fetch, { type RequestInit, type Response } from "node-fetch";
import { Readable } from "stream";
import type { Transport } from "../ports/transport.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Methods fetch refuses to send a body with */
const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

/** Body is read on first consumption; read errors surface from the stream. */
async function* readBody(response: Response): AsyncGenerator<Buffer> {
  yield Buffer.from(await response.arrayBuffer());
}

/**
 * Create a transport backed by node-fetch.
 * Decompression is left to the caller, so bodies arrive still encoded.
 */
export function createFetchTransport(fetchImpl: FetchLike = fetch): Transport {
  return {
    async do(request) {
      const init: RequestInit = {
        method: request.method,
        headers: request.headers,
        compress: false,
      };
      if (!BODYLESS_METHODS.has(request.method)) {
        init.body = request.body;
      }

      const response = await fetchImpl(request.url.href, init);

      return {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body: Readable.from(readBody(response)),
      };
    },
  };
}

/**
 * Default transport instance.
 */
export const fetchTransport = createFetchTransport();
