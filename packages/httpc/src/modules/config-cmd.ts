import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# httpc configuration
# Place at ~/.config/httpc/config.yaml (user) or /etc/httpc/config.yaml (system)
#
# Precedence (highest to lowest):
# 1. CLI flags
# 2. User config
# 3. System config
# 4. Built-in defaults

request:
  # Headers sent with every request; -H flags override them per name
  headers:
    User-Agent: httpc

  # Print a diagnostic block for every request (same as -v)
  verbose: false

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON log lines
  json: false
`;

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage httpc configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${messageOf(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        try {
          loadConfigFile(path);
          console.log(chalk.green(`✓ ${path}`));
        } catch (error) {
          console.error(chalk.red(`✗ Invalid: ${messageOf(error)}`));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'httpc config init' to create one."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));
        console.log(chalk.bold("Request:"));
        console.log(`  verbose: ${resolved.verbose}`);
        for (const [name, value] of Object.entries(resolved.headers)) {
          console.log(`  header:  ${name}: ${value}`);
        }
        console.log(chalk.bold("Logging:"));
        console.log(`  level:   ${resolved.logLevel}`);
        console.log(`  json:    ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${messageOf(error)}`));
        process.exitCode = 1;
      }
    });
}
