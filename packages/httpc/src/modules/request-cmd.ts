import { Command } from "commander";
import chalk from "chalk";
import type { EncodingMode, FilePart } from "../lib/body.js";
import type { HttpClient } from "../lib/client.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { fileNameFromUrl, type Cookie, type HttpRequest } from "../lib/request.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RequestCommandOptions {
  method: string;
  header: string[];
  cookie: string[];
  data: string[];
  jsonBody?: string;
  form: string[];
  output?: string;
  name?: string;
  verbose?: boolean;
  config?: string;
}

/** Builds the client for one invocation, from an optional config file path */
export type ClientFactory = (configPath?: string) => HttpClient;

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitAt(value: string, separator: string): [string, string] | undefined {
  const index = value.indexOf(separator);
  if (index <= 0) return undefined;
  return [value.slice(0, index), value.slice(index + separator.length)];
}

/** "Name: value" */
export function parseHeader(value: string): [string, string] {
  const pair = splitAt(value, ":");
  if (!pair) throw invalidOption("--header", value, '"Name: value"');
  return [pair[0].trim(), pair[1].trim()];
}

/** "name=value" */
export function parseCookie(value: string): Cookie {
  const pair = splitAt(value, "=");
  if (!pair) throw invalidOption("--cookie", value, '"name=value"');
  return { name: pair[0], value: pair[1] };
}

/** "key=value" */
export function parseData(value: string): [string, string] {
  const pair = splitAt(value, "=");
  if (!pair) throw invalidOption("--data", value, '"key=value"');
  return pair;
}

/** "field=value", or "field=@path" to upload a file */
export function parseFormEntry(value: string): FilePart {
  const pair = splitAt(value, "=");
  if (!pair) throw invalidOption("--form", value, '"field=value" or "field=@path"');
  const [fieldName, raw] = pair;
  return raw.startsWith("@")
    ? { fieldName, value: raw.slice(1), isFile: true }
    : { fieldName, value: raw, isFile: false };
}

export function selectMode(options: RequestCommandOptions): EncodingMode {
  if (options.form.length > 0) return "multipart";
  if (options.jsonBody !== undefined) return "json";
  return "url";
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

export function buildRequest(
  client: HttpClient,
  url: string,
  options: RequestCommandOptions
): { request: HttpRequest; mode: EncodingMode } {
  const request = client.request().setMethod(options.method).setUrl(url);

  for (const header of options.header) {
    const [name, value] = parseHeader(header);
    request.setHeader(name, value);
  }

  if (options.cookie.length > 0) {
    request.setCookies(options.cookie.map(parseCookie));
  }

  for (const entry of options.data) {
    const [name, value] = parseData(entry);
    request.setData(name, value);
  }

  if (options.jsonBody !== undefined) {
    request.setJsonData(options.jsonBody);
  }

  for (const entry of options.form) {
    const part = parseFormEntry(entry);
    request.addFileData(part.fieldName, part.value, part.isFile);
  }

  if (options.verbose) {
    request.setVerbose(true);
  }

  return { request, mode: selectMode(options) };
}

/**
 * Send one request and print its body, or save it under `--output`.
 */
export async function runRequest(
  client: HttpClient,
  url: string,
  options: RequestCommandOptions,
  write: (text: string) => void = (text) => {
    process.stdout.write(text);
  }
): Promise<void> {
  const { request, mode } = buildRequest(client, url, options);
  await request.send(mode);

  if (options.output === undefined) {
    const { body } = await request.end();
    write(body);
    return;
  }

  await request.endFile(options.output, options.name ?? "");
  const saved = options.output + (options.name || fileNameFromUrl(url));
  console.error(chalk.green(`Saved ${saved}`));
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRequestCommand(program: Command, createClient: ClientFactory): void {
  program
    .command("request", { isDefault: true })
    .description("Send an HTTP request and print the response body")
    .argument("<url>", "Target URL")
    .option("-X, --method <method>", "HTTP method", "GET")
    .option("-H, --header <header>", 'Request header, "Name: value"', collect, [])
    .option("-b, --cookie <cookie>", 'Cookie, "name=value"', collect, [])
    .option("-d, --data <pair>", 'Url-encoded form field, "key=value"', collect, [])
    .option("--json-body <text>", "Send text verbatim as a JSON body")
    .option("-F, --form <entry>", 'Multipart field, "field=value" or "field=@path"', collect, [])
    .option("-o, --output <dir>", "Save the body under this path prefix instead of printing it")
    .option("--name <file>", "File name for --output (default: last URL segment)")
    .option("-v, --verbose", "Print the request before sending it")
    .option("-c, --config <path>", "Config file to use")
    .option("--json", "Print errors as JSON")
    .action(async (url: string, options: RequestCommandOptions) => {
      try {
        await runRequest(createClient(options.config), url, options);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
