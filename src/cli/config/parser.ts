/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { GeneratorConfigInput } from "../../types/config.js";
import { IOFailureError, InvalidConfigurationError } from "../../utils/errors.js";
import { validateConfigInput } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import type { ConfigFile } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): ConfigFile {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new InvalidConfigurationError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new IOFailureError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new InvalidConfigurationError(
      `Failed to parse config file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  if (!isRecord(parsed)) {
    throw new InvalidConfigurationError(
      `Config file must contain an object: ${filePath}`,
      { filePath },
    );
  }

  logger.debug("Configuration file parsed", {
    hasGenerateConfig: parsed.generate !== undefined,
  });
  return { generate: parsed.generate };
}

/**
 * The generate section of a config file, checked field by field
 */
export function loadGenerateSection(filePath: string): GeneratorConfigInput {
  const section = parseConfigFile(filePath).generate ?? {};
  validateConfigInput(section, filePath);
  return section;
}
