export { createFetchTransport, fetchTransport, type FetchLike } from "./fetch-transport.js";
export {
  createConsoleDiagnostics,
  createLoggerDiagnostics,
  formatDiagnostic,
} from "./console-diagnostics.js";
