/**
 * Output mode detection for rendering errors.
 */

export type OutputMode = "static" | "json";

/**
 * `json` when requested by flag or HTTPC_JSON, otherwise `static`.
 */
export function getOutputMode(argv: string[] = process.argv): OutputMode {
  if (argv.includes("--json")) {
    return "json";
  }

  if (process.env.HTTPC_JSON === "1" || process.env.HTTPC_JSON === "true") {
    return "json";
  }

  return "static";
}
