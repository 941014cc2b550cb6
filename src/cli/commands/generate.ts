import { Command, InvalidArgumentError } from "commander";
import type { GeneratorConfigInput } from "../../types/config.js";
import { runGeneration } from "../../lib/generator/bundle-generator.js";
import { STDOUT } from "../../utils/config-loader.js";
import { isSynthError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { loadGenerateSection } from "../config/parser.js";
import type { GenerateCommandOptions } from "../config/types.js";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseProbability(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

/**
 * Map command options onto config field names
 */
export function toConfigInput(options: GenerateCommandOptions): GeneratorConfigInput {
  return {
    donors: options.donors,
    biobanks: options.biobanks,
    collections: options.collections,
    output: options.output,
    seed: options.seed,
    minSpecimensPerDonor: options.minSpecimens,
    maxSpecimensPerDonor: options.maxSpecimens,
    observationProbability: options.observationProbability,
    deceasedProbability: options.deceasedProbability,
  };
}

/**
 * Create the generate command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate a MIABIS on FHIR transaction bundle")
    .option("--donors <number>", "Number of sample donors", parseInteger)
    .option("--biobanks <number>", "Number of biobanks (default: 1)", parseInteger)
    .option("--collections <number>", "Number of collections (default: 1)", parseInteger)
    .option(
      "--output <path>",
      'Output file, or "stdout" (default: bundles/miabis-bundle-<N>donors.json)',
    )
    .option("--seed <number>", "Random seed", parseInteger)
    .option("--min-specimens <number>", "Fewest specimens per donor (default: 1)", parseInteger)
    .option("--max-specimens <number>", "Most specimens per donor (default: 3)", parseInteger)
    .option(
      "--observation-probability <p>",
      "Chance a specimen gets a diagnosis observation (default: 1)",
      parseProbability,
    )
    .option(
      "--deceased-probability <p>",
      "Chance a donor is deceased (default: 0.1)",
      parseProbability,
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action((opts: GenerateCommandOptions) => {
      try {
        const configFile = opts.config ? loadGenerateSection(opts.config) : undefined;
        const report = runGeneration(toConfigInput(opts), configFile);

        const summary = JSON.stringify(report, null, 2);
        if (report.output.path === STDOUT) {
          process.stderr.write(`${summary}\n`);
        } else {
          console.log(summary);
        }
        process.exit(0);
      } catch (error) {
        if (isSynthError(error)) {
          console.error(JSON.stringify(error.toResponse("generation"), null, 2));
        } else {
          logger.error("Generate command error", error);
        }
        process.exit(1);
      }
    });
}
