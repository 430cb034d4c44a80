/**
 * Metric entry shapes, one per category. Field names are the wire names used
 * in the compact payload.
 */
import type { DatasetId, Row } from "../datasets/types.js";
import type { Directionality, MeasureUnit } from "./measure_meta.js";

export interface InfectionEntry {
  name: string;
  value: number;
  unit: "sir";
  better: "lower";
}

export interface MortalityEntry {
  name: string;
  value: number | null;
  unit: "rate";
  better: "lower";
  compared_to_national?: string;
}

export interface ReadmissionEntry {
  name: string;
  predicted: number;
  expected: number;
  /** predicted − expected; positive means more readmissions than expected. */
  difference: number;
  better: "lower";
}

interface TimelyEntryBase {
  name: string;
  unit: MeasureUnit;
  better: Directionality;
  id: string;
}

export type TimelyCareEntry =
  | (TimelyEntryBase & { value: number })
  | (TimelyEntryBase & { value_text: string });

export interface PatientExperienceEntry {
  id: string;
  value: number;
  unit: "linear_mean";
  better: "higher";
}

export interface CategoryEntryMap {
  patient_experience: PatientExperienceEntry;
  infections: InfectionEntry;
  readmissions: ReadmissionEntry;
  mortality_complications: MortalityEntry;
  timely_care: TimelyCareEntry;
}

export type MetricCategory = keyof CategoryEntryMap;

/**
 * Extraction settings for one category. `toEntry` returns null to drop a row;
 * `finalize` post-processes the kept entries (sorting, truncation).
 */
export interface CategorySpec<K extends MetricCategory> {
  category: K;
  dataset: DatasetId;
  requiredColumns: readonly string[];
  /** Column holding the measure identifier matched against `whitelist`. */
  measureColumn: string;
  /** Identifiers to keep; undefined keeps every row. */
  whitelist?: ReadonlySet<string>;
  toEntry: (row: Row, measureId: string) => CategoryEntryMap[K] | null;
  finalize?: (entries: CategoryEntryMap[K][]) => CategoryEntryMap[K][];
}

export type CategorySpecs = { [K in MetricCategory]: CategorySpec<K> };

export type CategoryEntries = { [K in MetricCategory]: CategoryEntryMap[K][] };
