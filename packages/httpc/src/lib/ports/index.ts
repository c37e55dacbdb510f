export type { Transport, WireRequest, WireResponse } from "./transport.js";
export type { Diagnostics, RequestDiagnostic, DiagnosticBody } from "./diagnostics.js";
