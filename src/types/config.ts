/**
 * Generation run configuration
 */

export interface GeneratorConfig {
  /** Number of sample donors; must be positive */
  donors: number;
  biobanks: number;
  collections: number;
  /** Output file, or "stdout" */
  output: string;
  seed?: number;
  minSpecimensPerDonor: number;
  maxSpecimensPerDonor: number;
  /** Chance that a specimen gets a sample-level diagnosis observation */
  observationProbability: number;
  deceasedProbability: number;
}

/**
 * Configuration as supplied by a user, before defaults are applied
 */
export type GeneratorConfigInput = Partial<GeneratorConfig>;
