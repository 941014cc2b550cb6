/**
 * Reporter module types
 */

import type { GeneratorConfig } from "../../types/config.js";
import type { ResourceType } from "../../types/fhir.js";
import type { SeedSource } from "../../utils/seed-manager.js";

export type ResourceCounts = Partial<Record<ResourceType, number>>;

export interface RunReport {
  status: "success";
  phase: "generation";
  seed: number;
  seedSource: SeedSource;
  config: GeneratorConfig;
  counts: ResourceCounts;
  total: number;
  output: {
    path: string;
    bytes: number;
    sha256: string;
  };
}
