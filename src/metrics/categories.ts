/**
 * Category Specs — source columns, whitelists and entry shaping per category.
 */

import { FACILITY_COLUMN } from "../datasets/types.js";
import type { Row } from "../datasets/types.js";
import { isMissingToken, roundTo, toNum } from "../shared/normalize.js";
import { metaFor } from "./measure_meta.js";
import type { CategorySpecs, ReadmissionEntry } from "./types.js";

// ── Whitelists ───────────────────────────────────────────────────────

export const INFECTION_IDS: ReadonlySet<string> = new Set([
  "HAI_1_SIR", "HAI_2_SIR", "HAI_3_SIR", "HAI_4_SIR", "HAI_5_SIR", "HAI_6_SIR",
]);

export const MORTALITY_COMPLICATION_IDS: ReadonlySet<string> = new Set([
  "MORT_30_AMI", "MORT_30_CABG", "MORT_30_COPD", "MORT_30_HF", "MORT_30_PN", "MORT_30_STK",
  "COMP_HIP_KNEE", "PSI_03", "PSI_04", "PSI_06", "PSI_08", "PSI_09", "PSI_10",
  "PSI_11", "PSI_12", "PSI_13", "PSI_14", "PSI_15", "PSI_90",
]);

/** ED flow, sepsis and prevention measures. */
export const TIMELY_CARE_IDS: ReadonlySet<string> = new Set([
  "EDV",
  "ED_2_Strata_1", "ED_2_Strata_2",
  "IMM_3", "OP_18b", "OP_18c", "HCP_COVID_19",
  "SEP_1", "SEP_SH_3HR", "SEP_SH_6HR", "SEV_SEP_3HR", "SEV_SEP_6HR",
  "VTE_1", "VTE_2",
  "OP_22", "OP_23", "OP_29", "OP_31", "OP_40",
]);

/** HCAHPS linear-mean measures. */
export const PATIENT_EXPERIENCE_IDS: ReadonlySet<string> = new Set([
  "H_COMP_1_LINEAR_SCORE", "H_COMP_2_LINEAR_SCORE", "H_COMP_3_LINEAR_SCORE",
  "H_COMP_5_LINEAR_SCORE", "H_COMP_6_LINEAR_SCORE", "H_COMP_7_LINEAR_SCORE",
  "H_CLEAN_LINEAR_SCORE", "H_QUIET_LINEAR_SCORE",
  "H_HSP_RATING_LINEAR_SCORE", "H_RECMND_LINEAR_SCORE",
]);

// ── Columns ──────────────────────────────────────────────────────────

export const COLUMNS = {
  measureId: "Measure ID",
  score: "Score",
  comparedToNational: "Compared to National",
  measureName: "Measure Name",
  predicted: "Predicted Readmission Rate",
  expected: "Expected Readmission Rate",
  hcahpsId: "HCAHPS Measure ID",
  hcahpsValue: "HCAHPS Linear Mean Value",
} as const;

// ── Readmission ranking ──────────────────────────────────────────────

/**
 * Worst-first ranking: highest predicted − expected difference first,
 * truncated to `limit`. Stable for equal differences.
 */
export function rankReadmissions(entries: ReadmissionEntry[], limit: number): ReadmissionEntry[] {
  return [...entries]
    .sort((a, b) => b.difference - a.difference)
    .slice(0, limit);
}

function readmissionEntry(row: Row, name: string): ReadmissionEntry | null {
  const predicted = toNum(row[COLUMNS.predicted]);
  const expected = toNum(row[COLUMNS.expected]);
  if (predicted === null || expected === null) return null;
  const difference = predicted - expected;
  if (!Number.isFinite(difference)) return null;
  return {
    name,
    predicted: roundTo(predicted, 3),
    expected: roundTo(expected, 3),
    difference: roundTo(difference, 3),
    better: "lower",
  };
}

// ── Specs ────────────────────────────────────────────────────────────

export interface CategoryOptions {
  /** How many readmission measures to keep after ranking. */
  readmissionTopN?: number;
}

export function buildCategorySpecs(options: CategoryOptions = {}): CategorySpecs {
  const readmissionTopN = options.readmissionTopN ?? 3;

  return {
    infections: {
      category: "infections",
      dataset: "infections",
      requiredColumns: [FACILITY_COLUMN, COLUMNS.measureId, COLUMNS.score],
      measureColumn: COLUMNS.measureId,
      whitelist: INFECTION_IDS,
      toEntry: (row, id) => {
        const v = toNum(row[COLUMNS.score]);
        if (v === null) return null;
        return { name: id, value: roundTo(v, 3), unit: "sir", better: "lower" };
      },
    },

    mortality_complications: {
      category: "mortality_complications",
      dataset: "mortality_complications",
      requiredColumns: [FACILITY_COLUMN, COLUMNS.measureId, COLUMNS.score, COLUMNS.comparedToNational],
      measureColumn: COLUMNS.measureId,
      whitelist: MORTALITY_COMPLICATION_IDS,
      // Kept even without a score so the comparison label still reaches the summary
      toEntry: (row, id) => {
        const v = toNum(row[COLUMNS.score]);
        const ctn = row[COLUMNS.comparedToNational];
        return {
          name: id,
          value: v === null ? null : roundTo(v, 3),
          unit: "rate",
          better: "lower",
          ...(typeof ctn === "string" && ctn.trim() ? { compared_to_national: ctn.trim() } : {}),
        };
      },
    },

    readmissions: {
      category: "readmissions",
      dataset: "readmissions",
      requiredColumns: [FACILITY_COLUMN, COLUMNS.measureName, COLUMNS.predicted, COLUMNS.expected],
      measureColumn: COLUMNS.measureName,
      toEntry: readmissionEntry,
      finalize: (entries) => rankReadmissions(entries, readmissionTopN),
    },

    timely_care: {
      category: "timely_care",
      dataset: "timely_care",
      requiredColumns: [FACILITY_COLUMN, COLUMNS.measureId, COLUMNS.score],
      measureColumn: COLUMNS.measureId,
      whitelist: TIMELY_CARE_IDS,
      toEntry: (row, id) => {
        const raw = row[COLUMNS.score];
        const meta = metaFor(id);
        const v = toNum(raw);
        if (v !== null) {
          return { name: meta.name, value: roundTo(v, 3), unit: meta.unit, better: meta.better, id };
        }
        // Categorical scores (e.g. ED volume tiers) are kept as text
        const text = String(raw ?? "").trim();
        if (!text || isMissingToken(text)) return null;
        return { name: meta.name, value_text: text, unit: meta.unit, better: meta.better, id };
      },
    },

    patient_experience: {
      category: "patient_experience",
      dataset: "patient_experience",
      requiredColumns: [FACILITY_COLUMN, COLUMNS.hcahpsId, COLUMNS.hcahpsValue],
      measureColumn: COLUMNS.hcahpsId,
      whitelist: PATIENT_EXPERIENCE_IDS,
      toEntry: (row, id) => {
        const v = toNum(row[COLUMNS.hcahpsValue]);
        if (v === null) return null;
        return { id, value: roundTo(v, 2), unit: "linear_mean", better: "higher" };
      },
    },
  };
}
