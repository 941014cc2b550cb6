/**
 * Closed value sets drawn on by the entity builders.
 *
 * Codes match the MIABIS on FHIR code systems exactly, including their quirks
 * (the literal minus signs in storage temperatures, "samply" and "Lifesyle").
 */

import { CodeSystems } from "./systems.js";

export interface CodedValue {
  readonly code: string;
  readonly display: string;
}

export interface Registry {
  readonly name: string;
  readonly system: string;
  readonly values: readonly CodedValue[];
}

function registry(
  name: string,
  system: string,
  entries: readonly (readonly [code: string, display: string])[],
): Registry {
  const values = entries.map(([code, display]) =>
    Object.freeze({ code, display }),
  );
  return Object.freeze({ name, system, values: Object.freeze(values) });
}

/** Registry whose displays are the codes themselves */
function plainRegistry(
  name: string,
  system: string,
  codes: readonly string[],
): Registry {
  return registry(
    name,
    system,
    codes.map((code) => [code, code] as const),
  );
}

export const DiagnosisCodes = registry("diagnosis", CodeSystems.icd10, [
  ["C34.1", "Upper lobe, bronchus or lung"],
  ["C34.2", "Middle lobe, bronchus or lung"],
  ["C34.3", "Lower lobe, bronchus or lung"],
  ["C50.9", "Breast, unspecified"],
  ["C50.4", "Upper-outer quadrant of breast"],
  ["C18.0", "Caecum"],
  ["C18.2", "Ascending colon"],
  ["C18.7", "Sigmoid colon"],
  ["C61", "Malignant neoplasm of prostate"],
  ["C25.0", "Head of pancreas"],
  ["C56", "Malignant neoplasm of ovary"],
  ["C64", "Malignant neoplasm of kidney, except renal pelvis"],
  ["C16.0", "Cardia"],
  ["C67.9", "Bladder, unspecified"],
  ["C71.9", "Brain, unspecified"],
  ["C73", "Malignant neoplasm of thyroid gland"],
  ["C43.5", "Malignant melanoma of trunk"],
  ["C22.0", "Liver cell carcinoma"],
  ["C15.9", "Oesophagus, unspecified"],
  ["C20", "Malignant neoplasm of rectum"],
]);

export const SpecimenTypes = registry(
  "specimen-type",
  CodeSystems.detailedSampleType,
  [
    ["TissueFreshFrozen", "Tissue (fresh frozen)"],
    ["TissueFixed", "Tissue (fixed)"],
    ["WholeBlood", "Whole blood"],
    ["Plasma", "Plasma"],
    ["Serum", "Serum"],
    ["DNA", "DNA"],
    ["RNA", "RNA"],
    ["BuffyCoat", "Buffy coat"],
    ["Urine", "Urine"],
    ["Saliva", "Saliva"],
    ["CancerCellLine", "Cancer cell lines"],
  ],
);

export const CollectionSampleTypes = plainRegistry(
  "collection-sample-type",
  CodeSystems.collectionSampleType,
  [
    "TissueFrozen",
    "TissueFFPE",
    "Blood",
    "Plasma",
    "Serum",
    "DNA",
    "RNA",
    "BuffyCoat",
    "Urine",
    "Saliva",
    "CancerCellLine",
  ],
);

export const StorageTemperatures = registry(
  "storage-temperature",
  CodeSystems.storageTemperature,
  [
    ["RT", "Room temperature"],
    ["2to10", "between 2 and 10 degrees Celsius"],
    ["-18to-35", "between -18 and -35 degrees Celsius"],
    ["-60to-85", "between -60 and -85 degrees Celsius"],
    ["LN", "liquid nitrogen, -150 to -196 degrees Celsius"],
    ["Other", "any other temperature or long time storage information"],
  ],
);

export const BodySites = registry("body-site", CodeSystems.snomed, [
  ["39607008", "Lung structure"],
  ["76752008", "Breast structure"],
  ["71854001", "Colon structure"],
  ["41216001", "Prostatic structure"],
  ["15776009", "Pancreatic structure"],
  ["15497006", "Ovarian structure"],
  ["64033007", "Kidney structure"],
  ["69695003", "Stomach structure"],
  ["89837001", "Urinary bladder structure"],
  ["12738006", "Brain structure"],
  ["69748006", "Thyroid structure"],
  ["39937001", "Skin structure"],
  ["10200004", "Liver structure"],
  ["32849002", "Oesophageal structure"],
  ["34402009", "Rectum structure"],
]);

export const DatasetTypes = plainRegistry(
  "dataset-type",
  CodeSystems.datasetType,
  [
    "Lifestyle",
    "BiologicalSamples",
    "SurveyData",
    "ImagingData",
    "MedicalRecords",
    "NationalRegistries",
    "GenealogicalRecords",
    "PhysioBiochemicalData",
    "Other",
  ],
);

export const CollectionDatasetTypes = plainRegistry(
  "collection-dataset-type",
  CodeSystems.collectionDatasetType,
  [
    "Lifesyle",
    "Environmental",
    "Physiological",
    "Biochemical",
    "Clinical",
    "Psychological",
    "Genomic",
    "Proteomic",
    "Metabolomic",
    "BodyImage",
    "WholeSlideImage",
    "PhotoImage",
    "GenealogicalRecords",
    "Other",
  ],
);

export const CollectionDesigns = plainRegistry(
  "collection-design",
  CodeSystems.collectionDesign,
  [
    "CaseControl",
    "CrossSectional",
    "LongitudinalCohort",
    "DiseaseSpecificCohort",
    "PopulationBasedCohort",
    "TwinStudy",
    "QualityControl",
    "BirthCohort",
    "RareDiseaseCollection",
    "Other",
  ],
);

export const AccessConditions = plainRegistry(
  "access-condition",
  CodeSystems.useAndAccessConditions,
  [
    "CommercialUse",
    "Collaboration",
    "SpecificResearchUse",
    "GeneticDataUse",
    "OutsideEUAccess",
    "Xenograft",
    "OtherAnimalWork",
    "Other",
  ],
);

export const InclusionCriteria = plainRegistry(
  "inclusion-criteria",
  CodeSystems.inclusionCriteria,
  [
    "HealthStatus",
    "HospitalPatient",
    "UseOfMedication",
    "Gravidity",
    "AgeGroup",
    "FamilialStatus",
    "Sex",
    "CountryOfResidence",
    "EthnicOrigin",
    "PopulationRepresentative",
    "Lifestyle",
    "Other",
  ],
);

// Only these three exist in the code system
export const Capabilities = plainRegistry(
  "capability",
  CodeSystems.infrastructuralCapabilities,
  ["SampleStorage", "DataStorage", "Biosafety"],
);

export const SampleSources = plainRegistry(
  "sample-source",
  CodeSystems.sampleSource,
  ["Human"],
);

export const Sexes = registry("sex", CodeSystems.administrativeGender, [
  ["male", "Male"],
  ["female", "Female"],
]);

export const QualityStandards = plainRegistry("quality-standard", "", [
  "ISO 20387",
  "ISO 9001",
  "ISO 15189",
  "OECD Guidelines",
]);

/** Every registry a builder may draw a coded attribute from */
export const ALL_REGISTRIES: readonly Registry[] = [
  DiagnosisCodes,
  SpecimenTypes,
  CollectionSampleTypes,
  StorageTemperatures,
  BodySites,
  DatasetTypes,
  CollectionDatasetTypes,
  CollectionDesigns,
  AccessConditions,
  InclusionCriteria,
  Capabilities,
  SampleSources,
  Sexes,
  QualityStandards,
];

export function codeSet(source: Registry): ReadonlySet<string> {
  return new Set(source.values.map((value) => value.code));
}

export function isRegistered(source: Registry, code: string): boolean {
  return source.values.some((value) => value.code === code);
}

/**
 * Look up a value by code; throws for codes outside the registry
 */
export function lookup(source: Registry, code: string): CodedValue {
  const found = source.values.find((value) => value.code === code);
  if (!found) {
    throw new RangeError(`Code "${code}" is not in registry ${source.name}`);
  }
  return found;
}
