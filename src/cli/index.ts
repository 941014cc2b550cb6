#!/usr/bin/env node

/**
 * miabis-synth CLI - synthetic MIABIS on FHIR bundle generation
 */

import { Command, Option } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { LOG_LEVELS, logger, type LogLevel } from "../utils/logger.js";

const pkg = {
  name: "miabis-synth",
  version: "0.1.0",
  description:
    "Seeded generator of MIABIS on FHIR transaction bundles for validation pipeline testing",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .addOption(
      new Option("--log-level <level>", "Logging verbosity")
        .choices(LOG_LEVELS)
        .default(logger.getLevel()),
    )
    .hook("preAction", (thisCommand) => {
      const { logLevel } = thisCommand.opts<{ logLevel: LogLevel }>();
      logger.setLevel(logLevel);
    });

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
      { status: "error", error: { code: "UNEXPECTED_ERROR", message } },
      null,
      2,
    ),
  );
  process.exit(1);
});
