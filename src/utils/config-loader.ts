/**
 * Generation config: defaults, precedence (CLI > config file > defaults) and
 * validation. Everything here runs before any record is built.
 */

import fs from "fs";
import path from "path";
import _Ajv, { type ErrorObject, type JSONSchemaType } from "ajv";
import type { GeneratorConfig, GeneratorConfigInput } from "../types/config.js";
import { InvalidConfigurationError } from "./errors.js";
import { logger } from "./logger.js";

// ajv is CommonJS; under ESM its default import is module.exports
const Ajv = _Ajv.default;

export const STDOUT = "stdout";

export const DEFAULT_GENERATOR_CONFIG = {
  biobanks: 1,
  collections: 1,
  minSpecimensPerDonor: 1,
  maxSpecimensPerDonor: 3,
  observationProbability: 1,
  deceasedProbability: 0.1,
} as const satisfies Omit<GeneratorConfigInput, "donors" | "output" | "seed">;

export function defaultOutputPath(donors: number): string {
  return path.join("bundles", `miabis-bundle-${donors}donors.json`);
}

const configSchema: JSONSchemaType<GeneratorConfig> = {
  type: "object",
  properties: {
    donors: { type: "integer", minimum: 1 },
    biobanks: { type: "integer", minimum: 1 },
    collections: { type: "integer", minimum: 1 },
    output: { type: "string", minLength: 1 },
    seed: { type: "integer", nullable: true },
    minSpecimensPerDonor: { type: "integer", minimum: 1 },
    maxSpecimensPerDonor: { type: "integer", minimum: 1 },
    observationProbability: { type: "number", minimum: 0, maximum: 1 },
    deceasedProbability: { type: "number", minimum: 0, maximum: 1 },
  },
  required: [
    "donors",
    "biobanks",
    "collections",
    "output",
    "minSpecimensPerDonor",
    "maxSpecimensPerDonor",
    "observationProbability",
    "deceasedProbability",
  ],
  additionalProperties: false,
};

// Same fields, all optional: what a config file section may hold
const configInputSchema: JSONSchemaType<GeneratorConfigInput> = {
  type: "object",
  properties: {
    donors: { type: "integer", nullable: true },
    biobanks: { type: "integer", nullable: true },
    collections: { type: "integer", nullable: true },
    output: { type: "string", nullable: true },
    seed: { type: "integer", nullable: true },
    minSpecimensPerDonor: { type: "integer", nullable: true },
    maxSpecimensPerDonor: { type: "integer", nullable: true },
    observationProbability: { type: "number", nullable: true },
    deceasedProbability: { type: "number", nullable: true },
  },
  required: [],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile(configSchema);
const validateInputSchema = ajv.compile(configInputSchema);

function describeErrors(errors: ErrorObject[] | null | undefined) {
  return (errors ?? []).map((error) => {
    const field =
      error.keyword === "required" && "missingProperty" in error.params
        ? `/${String(error.params.missingProperty)}`
        : error.instancePath || "/";
    return { path: field, message: error.message ?? error.keyword };
  });
}

/**
 * Check a fully populated config; throws InvalidConfigurationError
 */
export function validateGeneratorConfig(config: unknown): asserts config is GeneratorConfig {
  if (!validateSchema(config)) {
    const errors = describeErrors(validateSchema.errors);
    const first = errors[0];
    throw new InvalidConfigurationError(
      first ? `Invalid configuration at ${first.path}: ${first.message}` : "Invalid configuration",
      { errors },
    );
  }

  if (config.collections > config.donors) {
    throw new InvalidConfigurationError(
      `Collection count (${config.collections}) exceeds donor count (${config.donors}); every collection needs at least one donor`,
      { collections: config.collections, donors: config.donors },
    );
  }

  if (config.minSpecimensPerDonor > config.maxSpecimensPerDonor) {
    throw new InvalidConfigurationError(
      `Specimen band is empty: min ${config.minSpecimensPerDonor} > max ${config.maxSpecimensPerDonor}`,
      {
        minSpecimensPerDonor: config.minSpecimensPerDonor,
        maxSpecimensPerDonor: config.maxSpecimensPerDonor,
      },
    );
  }
}

/**
 * Check a partial config (e.g. a config file section) for unknown or mistyped fields
 */
export function validateConfigInput(
  input: unknown,
  source: string,
): asserts input is GeneratorConfigInput {
  if (!validateInputSchema(input)) {
    const errors = describeErrors(validateInputSchema.errors);
    const first = errors[0];
    throw new InvalidConfigurationError(
      first
        ? `Invalid configuration in ${source} at ${first.path}: ${first.message}`
        : `Invalid configuration in ${source}`,
      { source, errors },
    );
  }
}

// A blank field (undefined, or null from an empty YAML value) falls back to the default
function definedEntries(input: GeneratorConfigInput): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined && value !== null),
  );
}

/**
 * Merge CLI options over config file values over defaults, then validate
 *
 * @example
 * resolveConfig({ donors: 10 }, { biobanks: 3 });
 * // { donors: 10, biobanks: 3, collections: 1, output: "bundles/miabis-bundle-10donors.json", ... }
 */
export function resolveConfig(
  cliOptions: GeneratorConfigInput = {},
  configFile: GeneratorConfigInput = {},
): GeneratorConfig {
  const merged: Record<string, unknown> = {
    ...DEFAULT_GENERATOR_CONFIG,
    ...definedEntries(configFile),
    ...definedEntries(cliOptions),
  };

  if (merged.output === undefined && typeof merged.donors === "number") {
    merged.output = defaultOutputPath(merged.donors);
  }

  validateGeneratorConfig(merged);

  logger.debug("Generator config resolved", merged);
  return merged;
}

/**
 * Make sure the output location can be written, creating its directory
 */
export function ensureOutputWritable(output: string): void {
  if (output === STDOUT) return;

  const dir = path.dirname(path.resolve(output));
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (error) {
    throw new InvalidConfigurationError(
      `Output path is not writable: ${output}`,
      { output },
      { cause: error },
    );
  }

  if (fs.existsSync(output) && fs.statSync(output).isDirectory()) {
    throw new InvalidConfigurationError(`Output path is a directory: ${output}`, {
      output,
    });
  }
}
