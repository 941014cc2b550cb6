/**
 * The subset of FHIR R4 datatypes and resources the generator emits
 */

export interface Coding {
  system: string;
  code: string;
  display?: string;
}

export interface CodeableConcept {
  coding: Coding[];
}

export interface Reference {
  reference: string;
}

export interface Identifier {
  system: string;
  value: string;
}

export interface Narrative {
  status: "generated";
  div: string;
}

export interface Meta {
  profile: string[];
}

export interface Address {
  city?: string;
  country: string;
}

export interface ContactPoint {
  system: "url" | "email";
  value: string;
}

export interface HumanName {
  family: string;
  given: string[];
}

export interface Quantity {
  value: number;
  unit: string;
}

export interface Extension {
  url: string;
  valueCodeableConcept?: CodeableConcept;
  valueString?: string;
  valueInteger?: number;
  valueCode?: string;
  valueReference?: Reference;
  valueIdentifier?: Identifier;
}

interface ResourceBase {
  id: string;
  meta?: Meta;
  text: Narrative;
}

export interface OrganizationResource extends ResourceBase {
  resourceType: "Organization";
  identifier: Identifier[];
  active?: boolean;
  name: string;
  alias?: string[];
  telecom?: ContactPoint[];
  address: Address[];
  contact?: { name: HumanName; telecom: ContactPoint[] }[];
  partOf?: Reference;
  extension?: Extension[];
}

export interface GroupCharacteristic {
  code: CodeableConcept;
  valueCodeableConcept?: CodeableConcept;
  valueRange?: { low: Quantity; high: Quantity };
  exclude: boolean;
}

export interface GroupResource extends ResourceBase {
  resourceType: "Group";
  identifier: Identifier[];
  active: boolean;
  type: "person";
  actual: boolean;
  name: string;
  managingEntity: Reference;
  characteristic?: GroupCharacteristic[];
  extension: Extension[];
}

export interface PatientResource extends ResourceBase {
  resourceType: "Patient";
  identifier: Identifier[];
  gender: string;
  birthDate: string;
  deceasedDateTime?: string;
  extension: Extension[];
}

export interface ConditionResource extends ResourceBase {
  resourceType: "Condition";
  code: CodeableConcept;
  subject: Reference;
}

export interface SpecimenResource extends ResourceBase {
  resourceType: "Specimen";
  identifier: Identifier[];
  type: CodeableConcept;
  subject: Reference;
  collection: { collectedDateTime: string; bodySite: CodeableConcept };
  processing: { description: string; extension: Extension[] }[];
  extension: Extension[];
}

export interface DiagnosticReportResource extends ResourceBase {
  resourceType: "DiagnosticReport";
  status: "final";
  code: CodeableConcept;
  subject: Reference;
  effectiveDateTime: string;
  specimen: Reference[];
  conclusion: string;
  conclusionCode: CodeableConcept[];
}

export interface ObservationResource extends ResourceBase {
  resourceType: "Observation";
  status: "final";
  code: CodeableConcept;
  subject: Reference;
  specimen: Reference;
  effectiveDateTime: string;
  valueCodeableConcept: CodeableConcept;
  performer: Reference[];
}

export type Resource =
  | OrganizationResource
  | GroupResource
  | PatientResource
  | ConditionResource
  | SpecimenResource
  | DiagnosticReportResource
  | ObservationResource;

export type ResourceType = Resource["resourceType"];
