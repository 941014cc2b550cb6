/**
 * Canonical URIs for code systems, profiles and extensions recognized by the
 * MIABIS on FHIR implementation guide
 */

export const MIABIS_BASE = "https://fhir.bbmri-eric.eu";

const sd = (name: string) => `${MIABIS_BASE}/StructureDefinition/${name}`;
const cs = (name: string) => `${MIABIS_BASE}/CodeSystem/${name}`;

export const CodeSystems = {
  icd10: "http://hl7.org/fhir/sid/icd-10",
  snomed: "http://snomed.info/sct",
  loinc: "http://loinc.org",
  administrativeGender: "http://hl7.org/fhir/administrative-gender",
  detailedSampleType: cs("miabis-detailed-samply-type-cs"),
  collectionSampleType: cs("miabis-collection-sample-type-cs"),
  storageTemperature: cs("miabis-storage-temperature-cs"),
  collectionDatasetType: cs("miabis-collection-dataset-typeCS"),
  datasetType: cs("miabis-dataset-type-CS"),
  collectionDesign: cs("miabis-collection-design-cs"),
  infrastructuralCapabilities: cs("miabis-infrastructural-capabilities-cs"),
  inclusionCriteria: cs("miabis-inclusion-criteria-cs"),
  useAndAccessConditions: cs("miabis-use-and-access-conditions-cs"),
  sampleSource: cs("miabis-sample-source-cs"),
  characteristic: cs("miabis-characteristicCS"),
} as const;

export const Profiles = {
  biobank: sd("miabis-biobank"),
  networkOrganization: sd("miabis-network-organization"),
  network: sd("miabis-network"),
  collectionOrganization: sd("miabis-collection-organization"),
  collection: sd("miabis-collection"),
  sampleDonor: sd("miabis-sample-donor"),
  condition: sd("miabis-condition"),
  sample: sd("miabis-sample"),
  observation: sd("miabis-observation"),
} as const;

export const Extensions = {
  infrastructuralCapabilities: sd("miabis-infrastructural-capabilities-extension"),
  qualityManagementStandard: sd("miabis-quality-management-standard-extension"),
  organizationDescription: sd("miabis-organization-description-extension"),
  collectionDesign: sd("miabis-collection-design-extension"),
  sampleSource: sd("miabis-sample-source-extension"),
  collectionDatasetType: sd("miabis-collection-dataset-type-extension"),
  useAndAccessConditions: sd("miabis-use-and-access-conditions-extension"),
  numberOfSubjects: sd("miabis-number-of-subjects-extension"),
  inclusionCriteria: sd("miabis-inclusion-criteria-extension"),
  datasetType: sd("miabis-dataset-type-extension"),
  sampleStorageTemperature: sd("miabis-sample-storage-temperature-extension"),
  sampleCollection: sd("miabis-sample-collection-extension"),
  // R5 Group.member.entity backported to R4
  groupMemberEntity:
    "http://hl7.org/fhir/5.0/StructureDefinition/extension-Group.member.entity",
} as const;

export const IdentifierSystems = {
  bbmri: "http://www.bbmri-eric.eu/",
  directory: "https://directory.bbmri-eric.eu/",
  donor: "http://example.org/biobank/donor-ids",
  sample: "http://example.org/biobank/sample-ids",
} as const;
