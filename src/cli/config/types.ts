/**
 * CLI configuration types
 */

/**
 * Options of the generate command as commander parses them
 */
export interface GenerateCommandOptions {
  donors?: number;
  biobanks?: number;
  collections?: number;
  output?: string;
  seed?: number;
  minSpecimens?: number;
  maxSpecimens?: number;
  observationProbability?: number;
  deceasedProbability?: number;
  config?: string;
}

/**
 * Top-level shape of a config file; each command reads its own section
 */
export interface ConfigFile {
  generate?: unknown;
}
