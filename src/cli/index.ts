#!/usr/bin/env node

/**
 * Schemawright CLI - compile entity-relationship diagram analyses into backend projects
 */

import { Command, Option } from "commander";
import { createParseCommand } from "./commands/parse.js";
import { createValidateCommand } from "./commands/validate.js";
import { createGenerateCommand } from "./commands/generate.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";
import { TOOL_NAME, TOOL_VERSION } from "../lib/reporter/index.js";

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description("Compile entity-relationship diagram analyses into Express + Sequelize projects")
    .version(TOOL_VERSION)
    .addOption(
      new Option("--log-level <level>", "Logging verbosity").choices(LOG_LEVELS).default("info"),
    )
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createParseCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createGenerateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
