/**
 * Free-text fragments for organization names and addresses
 */

export const COUNTRIES: readonly string[] = [
  "CZ", "DE", "AT", "SE", "FI", "IT", "ES", "FR",
  "NL", "PL", "SI", "PT", "NO", "DK", "BE",
];

export const CITIES: Readonly<Record<string, readonly string[]>> = {
  CZ: ["Prague", "Brno", "Ostrava"],
  DE: ["Berlin", "Munich", "Hannover", "Hamburg"],
  AT: ["Vienna", "Graz", "Innsbruck"],
  SE: ["Stockholm", "Gothenburg", "Uppsala"],
  FI: ["Helsinki", "Turku", "Tampere"],
  IT: ["Rome", "Milan", "Florence"],
  ES: ["Madrid", "Barcelona", "Valencia"],
  FR: ["Paris", "Lyon", "Marseille"],
  NL: ["Amsterdam", "Rotterdam", "Utrecht"],
  PL: ["Warsaw", "Krakow", "Gdansk"],
  SI: ["Ljubljana", "Maribor"],
  PT: ["Lisbon", "Porto"],
  NO: ["Oslo", "Bergen"],
  DK: ["Copenhagen", "Aarhus"],
  BE: ["Brussels", "Leuven"],
};

export const BIOBANK_SUFFIXES: readonly string[] = [
  "University Hospital Biobank",
  "Cancer Research Biobank",
  "National Biobank",
  "Medical Center Biobank",
  "Clinical Research Biobank",
  "Integrated Biobank",
  "Genomics & Tissue Bank",
  "Translational Research Biobank",
];

export const COLLECTION_NAMES: readonly string[] = [
  "Solid Tumors",
  "Hematological Malignancies",
  "Breast Cancer Cohort",
  "Lung Cancer Registry",
  "Colorectal Cancer Study",
  "Prostate Cancer Cohort",
  "Pancreatic Cancer Collection",
  "Rare Tumors Collection",
  "Population Health Study",
  "Metabolic Diseases Cohort",
  "Cardiovascular Sample Repository",
  "Neurological Disorders Collection",
];

export function citiesOf(country: string): readonly string[] {
  return CITIES[country] ?? ["Unknown"];
}
