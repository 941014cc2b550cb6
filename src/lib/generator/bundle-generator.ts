/**
 * One generation run: validate, assemble, emit, write, report
 */

import type { TransactionBundle } from "../../types/bundle.js";
import type { GeneratorConfig, GeneratorConfigInput } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import {
  ensureOutputWritable,
  resolveConfig,
  validateGeneratorConfig,
} from "../../utils/config-loader.js";
import { createFactProvider, type FactProvider } from "../random/fact-provider.js";
import { assembleHierarchy } from "../assembler/hierarchy-assembler.js";
import { emitBundle } from "../emitter/bundle-emitter.js";
import { writeBundle } from "../emitter/json-writer.js";
import { createRunReport, type RunReport } from "../reporter/index.js";

export interface GeneratedBundle {
  bundle: TransactionBundle;
  provider: FactProvider;
}

/**
 * Build a bundle in memory. Nothing is written.
 */
export function generateBundle(config: GeneratorConfig): GeneratedBundle {
  validateGeneratorConfig(config);

  const provider = createFactProvider(config.seed);
  const hierarchy = assembleHierarchy(config, provider);
  return { bundle: emitBundle(hierarchy), provider };
}

/**
 * Full run: the output file is only written once the whole bundle exists
 */
export function runGeneration(
  cliOptions: GeneratorConfigInput,
  configFile?: GeneratorConfigInput,
): RunReport {
  const config = resolveConfig(cliOptions, configFile);
  ensureOutputWritable(config.output);

  logger.info("Generating MIABIS on FHIR transaction bundle", {
    donors: config.donors,
    biobanks: config.biobanks,
    collections: config.collections,
    seed: config.seed ?? "random",
  });

  const { bundle, provider } = generateBundle(config);
  const written = writeBundle(bundle, config.output);

  const report = createRunReport(
    bundle,
    config,
    { seed: provider.seed, source: provider.seedSource },
    written,
  );
  logger.info("Bundle generated", { output: config.output, total: report.total });
  return report;
}
