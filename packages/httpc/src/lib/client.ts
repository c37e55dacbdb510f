import { createConsoleDiagnostics } from "./adapters/console-diagnostics.js";
import { fetchTransport } from "./adapters/fetch-transport.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Diagnostics } from "./ports/diagnostics.js";
import type { Transport } from "./ports/transport.js";
import { HttpRequest } from "./request.js";

export interface HttpClientOptions {
  transport?: Transport;
  diagnostics?: Diagnostics;
  logger?: Logger;
  /** Headers applied to every request before its own */
  headers?: Record<string, string>;
  /** Initial verbose flag of every request */
  verbose?: boolean;
}

export interface HttpClient {
  /** Start a new request bound to this client */
  request(): HttpRequest;
}

export function createHttpClient({
  transport = fetchTransport,
  diagnostics = createConsoleDiagnostics(),
  logger = createNoopLogger(),
  headers = {},
  verbose = false
}: HttpClientOptions = {}): HttpClient {
  return {
    request() {
      return new HttpRequest({
        transport,
        diagnostics,
        logger: logger.child({ component: "request" }),
        headers
      }).setVerbose(verbose);
    }
  };
}
