/**
 * Deterministic cross-registry lookups: no randomness is involved once the
 * source code has been drawn
 */

import {
  BodySites,
  StorageTemperatures,
  lookup,
  type CodedValue,
} from "./value-sets.js";

const STORAGE_BY_SPECIMEN_TYPE: Readonly<Record<string, string>> = {
  TissueFreshFrozen: "LN",
  TissueFixed: "RT",
  WholeBlood: "-18to-35",
  Plasma: "-60to-85",
  Serum: "-60to-85",
  DNA: "-18to-35",
  RNA: "-60to-85",
  BuffyCoat: "-60to-85",
  Urine: "-18to-35",
  Saliva: "2to10",
  CancerCellLine: "LN",
};

const BODY_SITE_BY_ICD10_CATEGORY: Readonly<Record<string, string>> = {
  C34: "39607008",
  C50: "76752008",
  C18: "71854001",
  C20: "34402009",
  C61: "41216001",
  C25: "15776009",
  C56: "15497006",
  C64: "64033007",
  C16: "69695003",
  C67: "89837001",
  C71: "12738006",
  C73: "69748006",
  C43: "39937001",
  C22: "10200004",
  C15: "32849002",
};

const DEFAULT_BODY_SITE = "39607008";

export function storageTemperatureFor(specimenType: string): CodedValue {
  return lookup(
    StorageTemperatures,
    STORAGE_BY_SPECIMEN_TYPE[specimenType] ?? "Other",
  );
}

/**
 * Body site for an ICD-10 code, keyed on its three-character category
 */
export function bodySiteFor(icd10Code: string): CodedValue {
  const category = icd10Code.split(".")[0] ?? icd10Code;
  return lookup(
    BodySites,
    BODY_SITE_BY_ICD10_CATEGORY[category] ?? DEFAULT_BODY_SITE,
  );
}
