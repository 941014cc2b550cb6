/**
 * The donor branch: one donor with exactly one diagnosis and one report, a
 * banded number of specimens, and at most one observation per specimen
 */

import type { AnyRecord, BuiltRecord } from "../../types/records.js";
import type { FactProvider } from "../random/fact-provider.js";
import type { ResourceHandle } from "../identity/ids.js";
import { DiagnosisCodes, lookup } from "../registries/value-sets.js";
import {
  buildDiagnosis,
  buildDonor,
  buildObservation,
  buildReport,
  buildSpecimen,
} from "./donor.js";

export interface DonorBranchOptions {
  minSpecimens: number;
  maxSpecimens: number;
  observationProbability: number;
  deceasedProbability: number;
}

export interface DonorBranchContext {
  index: number;
  collectionIdentifier: string;
  /** Biobank holding the donor's collection; performs the observations */
  biobank: ResourceHandle;
}

export interface DonorBranch {
  donor: BuiltRecord<"donor">;
  diagnosis: BuiltRecord<"diagnosis">;
  specimens: BuiltRecord<"specimen">[];
  report: BuiltRecord<"report">;
  observations: BuiltRecord<"observation">[];
}

export function buildDonorBranch(
  { index, collectionIdentifier, biobank }: DonorBranchContext,
  provider: FactProvider,
  options: DonorBranchOptions,
): DonorBranch {
  const donor = buildDonor(
    { index, deceasedProbability: options.deceasedProbability },
    provider,
  );
  const diagnosis = buildDiagnosis({ index, donor: donor.resource }, provider);
  const [diagnosisCoding] = diagnosis.resource.code.coding;
  const diagnosisCode = lookup(DiagnosisCodes, diagnosisCoding?.code ?? "");

  const specimenCount = provider.integerInRange(
    options.minSpecimens,
    options.maxSpecimens,
  );
  const specimens: BuiltRecord<"specimen">[] = [];
  for (let s = 0; s < specimenCount; s++) {
    specimens.push(
      buildSpecimen(
        {
          donorIndex: index,
          specimenIndex: s,
          donor: donor.resource,
          diagnosis: diagnosisCode,
          collectionIdentifier,
        },
        provider,
      ),
    );
  }

  const report = buildReport(
    {
      index,
      donor: donor.resource,
      specimens: specimens.map((specimen) => specimen.resource),
      diagnosis: diagnosisCode,
    },
    provider,
  );

  const observations: BuiltRecord<"observation">[] = [];
  for (const specimen of specimens) {
    if (!provider.chance(options.observationProbability)) continue;
    const [, specimenIndex = 0] = specimen.ordinal;
    observations.push(
      buildObservation(
        {
          donorIndex: index,
          specimenIndex,
          donor: donor.resource,
          specimen: specimen.resource,
          performer: biobank,
          diagnosis: diagnosisCode,
          effectiveDateTime: report.resource.effectiveDateTime,
        },
        provider,
      ),
    );
  }

  return { donor, diagnosis, specimens, report, observations };
}

/**
 * Records of a branch in write order
 */
export function branchRecords(branch: DonorBranch): AnyRecord[] {
  return [
    branch.donor,
    branch.diagnosis,
    ...branch.specimens,
    branch.report,
    ...branch.observations,
  ];
}
