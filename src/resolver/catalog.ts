/**
 * Entity Catalog
 *
 * Closed vocabularies of the drugs and regions the analytics layer knows about.
 * Every resolver path (rules, remote, context recovery) detects entities through
 * matchEntities() so one utterance always yields the same detections.
 *
 * Matching is case-insensitive substring search. Catalog order is the tie-break:
 * the first entry found in the text wins, nothing is confidence-ranked.
 */

export const DRUG_CATALOG = [
  "Aspirin",
  "Ibuprofen",
  "Medication X",
  "Allergy Relief",
  "Blood Pressure Med",
  "Diabetes Control",
  "Antibiotic Plus",
  "Vitamin D3",
] as const;

export const REGION_CATALOG = [
  "North America",
  "Europe",
  "Asia",
  "South America",
] as const;

export type DrugName = (typeof DRUG_CATALOG)[number];
export type RegionName = (typeof REGION_CATALOG)[number];

export interface EntitySet {
  drug: DrugName | null;
  region: RegionName | null;
}

function firstContained<T extends string>(lowered: string, catalog: readonly T[]): T | null {
  for (const entry of catalog) {
    if (lowered.includes(entry.toLowerCase())) {
      return entry;
    }
  }
  return null;
}

/**
 * Detect the first catalog drug and the first catalog region mentioned in `text`.
 * Values come back in canonical catalog spelling; absent ones are null.
 */
export function matchEntities(text: string): EntitySet {
  const lowered = text.toLowerCase();
  return {
    drug: firstContained(lowered, DRUG_CATALOG),
    region: firstContained(lowered, REGION_CATALOG),
  };
}

function canonicalise<T extends string>(value: string | null | undefined, catalog: readonly T[]): T | null {
  if (typeof value !== "string") return null;
  const lowered = value.trim().toLowerCase();
  if (lowered === "") return null;

  const exact = catalog.find((entry) => entry.toLowerCase() === lowered);
  return exact ?? firstContained(lowered, catalog);
}

/** Map a free-form drug value (remote argument, stored record) to its catalog entry. */
export function canonicalDrug(value: string | null | undefined): DrugName | null {
  return canonicalise(value, DRUG_CATALOG);
}

/** Map a free-form region value to its catalog entry. */
export function canonicalRegion(value: string | null | undefined): RegionName | null {
  return canonicalise(value, REGION_CATALOG);
}
