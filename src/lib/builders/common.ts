/**
 * Shared pieces for entity builders: codings, narratives, identifiers
 */

import type {
  CodeableConcept,
  Coding,
  Extension,
  Identifier,
  Narrative,
} from "../../types/fhir.js";
import type { BuiltRecord, RecordKind, RecordKindMap } from "../../types/records.js";
import type { CodedValue, Registry } from "../registries/value-sets.js";
import { IdentifierSystems } from "../registries/systems.js";

export function coding(source: Registry, value: CodedValue, withDisplay = false): Coding {
  return withDisplay
    ? { system: source.system, code: value.code, display: value.display }
    : { system: source.system, code: value.code };
}

export function concept(source: Registry, value: CodedValue, withDisplay = false): CodeableConcept {
  return { coding: [coding(source, value, withDisplay)] };
}

export function codedExtension(url: string, source: Registry, value: CodedValue): Extension {
  return { url, valueCodeableConcept: concept(source, value) };
}

export function bbmriIdentifier(id: string): Identifier {
  return { system: IdentifierSystems.bbmri, value: `bbmri-eric:ID:${id}` };
}

function escapeXhtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function narrative(resourceType: string, id: string, summary: string): Narrative {
  return {
    status: "generated",
    div: `<div xmlns="http://www.w3.org/1999/xhtml"><p><b>${resourceType}/${id}</b>: ${escapeXhtml(summary)}</p></div>`,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Wrap a finished resource as an immutable record
 */
export function record<K extends RecordKind>(
  kind: K,
  ordinal: readonly number[],
  resource: RecordKindMap[K],
): BuiltRecord<K> {
  return deepFreeze({ kind, ordinal: [...ordinal], id: resource.id, resource });
}
