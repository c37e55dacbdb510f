export { createHttpClient, type HttpClient, type HttpClientOptions } from "./client.js";
export {
  HttpRequest,
  fileNameFromUrl,
  parseCookieHeader,
  type BytesResult,
  type Cookie,
  type HttpRequestOptions,
  type TextResult,
} from "./request.js";
export { parseEncodingMode, type EncodingMode, type FilePart } from "./body.js";
export { HttpcError, isHttpcError, type ErrorCode } from "./errors/types.js";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./logger.js";
export * from "./adapters/index.js";
export type * from "./ports/index.js";
