/**
 * Deterministic identifiers: `(kind, ordinal) -> id`, and the urn:uuid
 * full URLs the bundle uses for cross-references
 */

import { v5 as uuidv5 } from "uuid";
import type { RecordKind } from "../../types/records.js";
import type { Reference, ResourceType } from "../../types/fhir.js";

// RFC 4122 DNS namespace
export const ID_NAMESPACE = "6ba7b810-9dad-11d1-80b4-00c04fd430c8";

interface IdScheme {
  prefix: string;
  resourceType: ResourceType;
  /** Digits of the first ordinal component; later components use 2 */
  width: number;
  arity: number;
}

const ID_SCHEMES: Readonly<Record<RecordKind, IdScheme>> = {
  "legal-entity": { prefix: "juristic-person", resourceType: "Organization", width: 3, arity: 1 },
  biobank: { prefix: "biobank", resourceType: "Organization", width: 3, arity: 1 },
  "network-organization": { prefix: "network-org", resourceType: "Organization", width: 3, arity: 1 },
  network: { prefix: "network", resourceType: "Group", width: 3, arity: 1 },
  "collection-organization": { prefix: "col-org", resourceType: "Organization", width: 3, arity: 1 },
  collection: { prefix: "collection", resourceType: "Group", width: 3, arity: 1 },
  donor: { prefix: "donor", resourceType: "Patient", width: 6, arity: 1 },
  diagnosis: { prefix: "condition", resourceType: "Condition", width: 6, arity: 1 },
  specimen: { prefix: "sample", resourceType: "Specimen", width: 6, arity: 2 },
  report: { prefix: "diagreport", resourceType: "DiagnosticReport", width: 6, arity: 1 },
  observation: { prefix: "obs", resourceType: "Observation", width: 6, arity: 2 },
};

export function resourceTypeOf(kind: RecordKind): ResourceType {
  return ID_SCHEMES[kind].resourceType;
}

/**
 * Stable id for the record at the given zero-based ordinal path.
 *
 * @example
 * assignId("specimen", 0, 1) // "sample-000001-02"
 */
export function assignId(kind: RecordKind, ...ordinal: number[]): string {
  const scheme = ID_SCHEMES[kind];
  if (ordinal.length !== scheme.arity) {
    throw new RangeError(
      `${kind} ids take ${scheme.arity} ordinal(s), got ${ordinal.length}`,
    );
  }
  const parts = ordinal.map((value, index) => {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Invalid ordinal ${value} for ${kind}`);
    }
    return String(value + 1).padStart(index === 0 ? scheme.width : 2, "0");
  });
  return [scheme.prefix, ...parts].join("-");
}

/**
 * Anything that names a resource: a built resource or a bare handle
 */
export interface ResourceHandle {
  resourceType: ResourceType;
  id: string;
}

export function fullUrlOf(handle: ResourceHandle): string {
  return `urn:uuid:${uuidv5(`${handle.resourceType}/${handle.id}`, ID_NAMESPACE)}`;
}

export function referenceTo(handle: ResourceHandle): Reference {
  return { reference: fullUrlOf(handle) };
}

export function handleOf(kind: RecordKind, ...ordinal: number[]): ResourceHandle {
  return { resourceType: resourceTypeOf(kind), id: assignId(kind, ...ordinal) };
}

/**
 * Every `reference` string inside a resource, in document order
 */
export function collectReferences(value: unknown): string[] {
  const found: string[] = [];
  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
    } else if (node !== null && typeof node === "object") {
      for (const [key, child] of Object.entries(node)) {
        if (key === "reference" && typeof child === "string") {
          found.push(child);
        } else {
          visit(child);
        }
      }
    }
  };
  visit(value);
  return found;
}
