/**
 * Builders for the per-donor records: donor, diagnosis, specimen,
 * pathology report and sample-level diagnosis observation
 */

import type { BuiltRecord } from "../../types/records.js";
import type { FactProvider } from "../random/fact-provider.js";
import { assignId, referenceTo, type ResourceHandle } from "../identity/ids.js";
import {
  CodeSystems,
  Extensions,
  IdentifierSystems,
  Profiles,
} from "../registries/systems.js";
import {
  BodySites,
  DatasetTypes,
  DiagnosisCodes,
  Sexes,
  SpecimenTypes,
  StorageTemperatures,
  type CodedValue,
} from "../registries/value-sets.js";
import { bodySiteFor, storageTemperatureFor } from "../registries/mappings.js";
import { coding, concept, narrative, record } from "./common.js";

export interface DonorContext {
  index: number;
  deceasedProbability: number;
}

export function buildDonor(
  { index, deceasedProbability }: DonorContext,
  provider: FactProvider,
): BuiltRecord<"donor"> {
  const id = assignId("donor", index);
  const sex = provider.choice(Sexes.values);
  const birthDate = provider.dateInRange("1935-01-01", "2000-12-28");
  const deceasedDateTime = provider.chance(deceasedProbability)
    ? provider.dateInRange("2020-01-01", "2025-12-28")
    : undefined;
  const datasets = provider.sample(DatasetTypes.values, provider.integerInRange(1, 3));

  return record("donor", [index], {
    resourceType: "Patient",
    id,
    meta: { profile: [Profiles.sampleDonor] },
    identifier: [{ system: IdentifierSystems.donor, value: id.toUpperCase() }],
    gender: sex.code,
    birthDate,
    ...(deceasedDateTime ? { deceasedDateTime } : {}),
    extension: datasets.map((dataset) => ({
      url: Extensions.datasetType,
      valueCode: dataset.code,
    })),
    text: narrative(
      "Patient",
      id,
      `${sex.display}, born ${birthDate}. Datasets: ${datasets.map((d) => d.code).join(", ")}.`,
    ),
  });
}

export interface DiagnosisContext {
  index: number;
  donor: ResourceHandle;
}

export function buildDiagnosis(
  { index, donor }: DiagnosisContext,
  provider: FactProvider,
): BuiltRecord<"diagnosis"> {
  const id = assignId("diagnosis", index);
  const diagnosis = provider.choice(DiagnosisCodes.values);

  return record("diagnosis", [index], {
    resourceType: "Condition",
    id,
    meta: { profile: [Profiles.condition] },
    code: concept(DiagnosisCodes, diagnosis, true),
    subject: referenceTo(donor),
    text: narrative(
      "Condition",
      id,
      `ICD-10 ${diagnosis.code} - ${diagnosis.display}. Subject: ${donor.resourceType}/${donor.id}.`,
    ),
  });
}

export interface SpecimenContext {
  donorIndex: number;
  specimenIndex: number;
  donor: ResourceHandle;
  diagnosis: CodedValue;
  /** Directory identifier of the collection the sample is held in */
  collectionIdentifier: string;
}

export function buildSpecimen(
  { donorIndex, specimenIndex, donor, diagnosis, collectionIdentifier }: SpecimenContext,
  provider: FactProvider,
): BuiltRecord<"specimen"> {
  const id = assignId("specimen", donorIndex, specimenIndex);
  const type = provider.choice(SpecimenTypes.values);
  const storage = storageTemperatureFor(type.code);
  const bodySite = bodySiteFor(diagnosis.code);
  const collectedDateTime = provider.dateTimeInRange("2018-01-01", "2025-12-28");

  return record("specimen", [donorIndex, specimenIndex], {
    resourceType: "Specimen",
    id,
    meta: { profile: [Profiles.sample] },
    identifier: [{ system: IdentifierSystems.sample, value: id.toUpperCase() }],
    type: concept(SpecimenTypes, type, true),
    subject: referenceTo(donor),
    collection: {
      collectedDateTime,
      bodySite: concept(BodySites, bodySite, true),
    },
    processing: [
      {
        description: `Processed and stored at ${storage.display}`,
        extension: [
          {
            url: Extensions.sampleStorageTemperature,
            valueCodeableConcept: concept(StorageTemperatures, storage, true),
          },
        ],
      },
    ],
    extension: [
      {
        url: Extensions.sampleCollection,
        valueIdentifier: { system: IdentifierSystems.directory, value: collectionIdentifier },
      },
    ],
    text: narrative(
      "Specimen",
      id,
      `${type.display}, ${bodySite.display}, from ${donor.resourceType}/${donor.id}. Storage: ${storage.display}.`,
    ),
  });
}

export interface ReportContext {
  index: number;
  donor: ResourceHandle;
  specimens: readonly ResourceHandle[];
  diagnosis: CodedValue;
}

const PATHOLOGY_REPORT = {
  system: CodeSystems.loinc,
  code: "22637-3",
  display: "Pathology report final diagnosis Narrative",
};

export function buildReport(
  { index, donor, specimens, diagnosis }: ReportContext,
  provider: FactProvider,
): BuiltRecord<"report"> {
  const id = assignId("report", index);
  const effectiveDateTime = provider.dateInRange("2018-01-01", "2025-12-28");
  const conclusion = `Histopathological examination consistent with ${diagnosis.display} (${diagnosis.code}).`;

  return record("report", [index], {
    resourceType: "DiagnosticReport",
    id,
    status: "final",
    code: { coding: [PATHOLOGY_REPORT] },
    subject: referenceTo(donor),
    effectiveDateTime,
    specimen: specimens.map(referenceTo),
    conclusion,
    conclusionCode: [concept(DiagnosisCodes, diagnosis, true)],
    text: narrative("DiagnosticReport", id, `Pathology report. ${conclusion.slice(0, 80)}.`),
  });
}

export interface ObservationContext {
  donorIndex: number;
  specimenIndex: number;
  donor: ResourceHandle;
  specimen: ResourceHandle;
  performer: ResourceHandle;
  diagnosis: CodedValue;
  effectiveDateTime: string;
}

export function buildObservation(
  context: ObservationContext,
  _provider: FactProvider,
): BuiltRecord<"observation"> {
  const { donorIndex, specimenIndex, donor, specimen, performer, diagnosis } = context;
  const id = assignId("observation", donorIndex, specimenIndex);

  return record("observation", [donorIndex, specimenIndex], {
    resourceType: "Observation",
    id,
    meta: { profile: [Profiles.observation] },
    status: "final",
    code: { coding: [{ system: CodeSystems.loinc, code: "52797-8" }] },
    subject: referenceTo(donor),
    specimen: referenceTo(specimen),
    effectiveDateTime: context.effectiveDateTime,
    valueCodeableConcept: { coding: [coding(DiagnosisCodes, diagnosis, true)] },
    performer: [referenceTo(performer)],
    text: narrative(
      "Observation",
      id,
      `Diagnosis for ${specimen.resourceType}/${specimen.id}: ${diagnosis.code}.`,
    ),
  });
}
