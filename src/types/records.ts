/**
 * Tagged record variants, one per entity kind
 */

import type {
  ConditionResource,
  DiagnosticReportResource,
  GroupResource,
  ObservationResource,
  OrganizationResource,
  PatientResource,
  SpecimenResource,
} from "./fhir.js";

export interface RecordKindMap {
  "legal-entity": OrganizationResource;
  biobank: OrganizationResource;
  "network-organization": OrganizationResource;
  network: GroupResource;
  "collection-organization": OrganizationResource;
  collection: GroupResource;
  donor: PatientResource;
  diagnosis: ConditionResource;
  specimen: SpecimenResource;
  report: DiagnosticReportResource;
  observation: ObservationResource;
}

export type RecordKind = keyof RecordKindMap;

/**
 * A built entity. `ordinal` is its position path, e.g. [donor, specimen]
 */
export interface BuiltRecord<K extends RecordKind = RecordKind> {
  readonly kind: K;
  readonly ordinal: readonly number[];
  readonly id: string;
  readonly resource: Readonly<RecordKindMap[K]>;
}

/** Discriminated union over every record kind */
export type AnyRecord = { [K in RecordKind]: BuiltRecord<K> }[RecordKind];
