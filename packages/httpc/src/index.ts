#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { createConsoleDiagnostics } from "./lib/adapters/console-diagnostics.js";
import { createHttpClient } from "./lib/client.js";
import { loadConfig } from "./lib/config.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { createLogger } from "./lib/logger.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerRequestCommand } from "./modules/request-cmd.js";

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageSchema.parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  const program = new Command()
    .name("httpc")
    .description("Send one HTTP request and print or save the response")
    .version(readVersion());

  registerRequestCommand(program, (configPath) => {
    const { config } = loadConfig(configPath);
    const logger = createLogger({ level: config.logLevel, json: config.logJson });
    return createHttpClient({
      headers: config.headers,
      verbose: config.verbose,
      diagnostics: createConsoleDiagnostics((line) => console.error(line)),
      logger,
    });
  });
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
