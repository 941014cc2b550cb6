/**
 * Reporter module - per-run summary for reproducibility disclosure
 */

import type { TransactionBundle } from "../../types/bundle.js";
import type { GeneratorConfig } from "../../types/config.js";
import type { ResourceType } from "../../types/fhir.js";
import type { SeedSource } from "../../utils/seed-manager.js";
import type { EmitterResult } from "../emitter/types.js";
import type { ResourceCounts, RunReport } from "./types.js";

export type * from "./types.js";

/** Order in which resource types are reported */
export const REPORTED_TYPES: readonly ResourceType[] = [
  "Organization",
  "Group",
  "Patient",
  "Condition",
  "Specimen",
  "DiagnosticReport",
  "Observation",
];

export function countResources(bundle: TransactionBundle): ResourceCounts {
  const counts: ResourceCounts = {};
  for (const type of REPORTED_TYPES) {
    const n = bundle.entry.filter((entry) => entry.resource.resourceType === type).length;
    if (n > 0) counts[type] = n;
  }
  return counts;
}

export function createRunReport(
  bundle: TransactionBundle,
  config: GeneratorConfig,
  seed: { seed: number; source: SeedSource },
  output: EmitterResult,
): RunReport {
  return {
    status: "success",
    phase: "generation",
    seed: seed.seed,
    seedSource: seed.source,
    config,
    counts: countResources(bundle),
    total: bundle.entry.length,
    output: {
      path: output.destination,
      bytes: output.bytes,
      sha256: output.sha256,
    },
  };
}
