/**
 * Metric Extraction — one routine for every category.
 *
 * Steps per category: required-column check → facility filter → whitelist →
 * entry shaping (numeric conversion happens inside `toEntry`) → finalize.
 * Row-level conversion failures drop the row; a missing column aborts.
 */

import { ensureColumns, filterFacility } from "../datasets/table.js";
import type { DatasetBundle } from "../datasets/types.js";
import { buildCategorySpecs } from "./categories.js";
import type { CategoryEntries, CategoryEntryMap, CategorySpec, CategorySpecs, MetricCategory } from "./types.js";

export function extractCategory<K extends MetricCategory>(
  bundle: DatasetBundle,
  facility: string,
  spec: CategorySpec<K>,
): CategoryEntryMap[K][] {
  const table = bundle.tables[spec.dataset];
  ensureColumns(table, spec.requiredColumns);

  const entries: CategoryEntryMap[K][] = [];
  for (const row of filterFacility(table, facility)) {
    const measureId = String(row[spec.measureColumn] ?? "").trim();
    if (spec.whitelist && !spec.whitelist.has(measureId)) continue;
    const entry = spec.toEntry(row, measureId);
    if (entry !== null) entries.push(entry);
  }

  return spec.finalize ? spec.finalize(entries) : entries;
}

/**
 * Run every category for a resolved facility. Schema checks run in the order
 * infections, mortality, readmissions, timely care, patient experience, so the
 * first missing column reported is deterministic.
 */
export function extractAllCategories(
  bundle: DatasetBundle,
  facility: string,
  specs: CategorySpecs = buildCategorySpecs(),
): CategoryEntries {
  const infections = extractCategory(bundle, facility, specs.infections);
  const mortality_complications = extractCategory(bundle, facility, specs.mortality_complications);
  const readmissions = extractCategory(bundle, facility, specs.readmissions);
  const timely_care = extractCategory(bundle, facility, specs.timely_care);
  const patient_experience = extractCategory(bundle, facility, specs.patient_experience);

  return { patient_experience, infections, readmissions, mortality_complications, timely_care };
}
