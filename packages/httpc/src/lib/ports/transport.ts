import type { Readable } from "stream";
import type { Headers } from "node-fetch";

/**
 * A fully built request, ready to go on the wire.
 */
export interface WireRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: Buffer;
}

/**
 * A received response. The body is a single-use stream of the raw
 * (still content-encoded) bytes.
 */
export interface WireResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: Readable;
}

/**
 * Abstraction for performing one HTTP round trip.
 * Connection reuse, TLS and timeouts are the implementation's concern.
 */
export interface Transport {
  do(request: WireRequest): Promise<WireResponse>;
}
