/**
 * Dataset Types — table shape, dataset identifiers and the optional manifest.
 */
import { z } from "zod";

export type CellValue = string | number | boolean | null;

export type Row = Readonly<Record<string, CellValue>>;

export const FACILITY_COLUMN = "Facility Name";

/** Helper column added once per row at load time. */
export const FACILITY_NORM_COLUMN = "_facility_norm";

export const DATASET_IDS = [
  "patient_experience",
  "infections",
  "readmissions",
  "mortality_complications",
  "timely_care",
] as const;

export type DatasetId = (typeof DATASET_IDS)[number];

export interface DatasetTable {
  id: DatasetId;
  /** Human-readable name used in error messages. */
  label: string;
  sourcePath?: string;
  columns: readonly string[];
  rows: readonly Row[];
}

export interface DatasetBundle {
  tables: Readonly<Record<DatasetId, DatasetTable>>;
  /** SHA-256 per dataset file; empty for in-memory bundles. */
  fileHashes: Readonly<Partial<Record<DatasetId, string>>>;
}

export const DATASET_LABELS: Record<DatasetId, string> = {
  patient_experience: "Patient Experience",
  infections: "Infections",
  readmissions: "Readmission",
  mortality_complications: "Complication & Death",
  timely_care: "Timely Care",
};

export const DEFAULT_DATASET_FILES: Record<DatasetId, string> = {
  patient_experience: "Patient_experience.xlsx",
  infections: "Infections.xlsx",
  readmissions: "Readmission.xlsx",
  mortality_complications: "Complication_and_Death.xlsx",
  timely_care: "Timely care with join.xlsx",
};

// ── Manifest ─────────────────────────────────────────────────────────

const datasetFile = z
  .string()
  .min(1)
  .regex(/\.(csv|xlsx|xls)$/i, "Expected a .csv, .xlsx or .xls file");

export const DatasetManifestSchema = z.object({
  files: z
    .object({
      patient_experience: datasetFile,
      infections: datasetFile,
      readmissions: datasetFile,
      mortality_complications: datasetFile,
      timely_care: datasetFile,
    })
    .partial(),
});
