/**
 * Wraps assembled records into a FHIR transaction bundle
 */

import { v5 as uuidv5 } from "uuid";
import type { BundleEntry, TransactionBundle } from "../../types/bundle.js";
import type { AnyRecord } from "../../types/records.js";
import type { AssembledHierarchy } from "../assembler/hierarchy-assembler.js";
import { ID_NAMESPACE, fullUrlOf } from "../identity/ids.js";

export function envelope(built: AnyRecord): BundleEntry {
  const { resource } = built;
  return {
    fullUrl: fullUrlOf(resource),
    resource,
    request: { method: "POST", url: resource.resourceType },
  };
}

/**
 * Bundle id derived from the seed and the counts, so reruns match byte for byte
 */
export function bundleIdFor(hierarchy: AssembledHierarchy): string {
  const { config, seed } = hierarchy;
  const name = [
    "Bundle",
    seed,
    config.donors,
    config.biobanks,
    config.collections,
    config.minSpecimensPerDonor,
    config.maxSpecimensPerDonor,
    config.observationProbability,
    config.deceasedProbability,
  ].join("/");
  return uuidv5(name, ID_NAMESPACE);
}

export function emitBundle(hierarchy: AssembledHierarchy): TransactionBundle {
  return {
    resourceType: "Bundle",
    id: bundleIdFor(hierarchy),
    type: "transaction",
    entry: hierarchy.records.map(envelope),
  };
}
