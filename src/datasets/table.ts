/**
 * In-memory tables: construction, column checks and facility filtering.
 */

import { DatasetSchemaError } from "../shared/errors.js";
import { normalizeName } from "../shared/normalize.js";
import {
  DATASET_LABELS,
  FACILITY_COLUMN,
  FACILITY_NORM_COLUMN,
} from "./types.js";
import type { CellValue, DatasetBundle, DatasetId, DatasetTable, Row } from "./types.js";

/**
 * Build a frozen table. When the facility column exists every row gets the
 * normalized-name helper column so requests never recompute it.
 */
export function createTable(params: {
  id: DatasetId;
  rows: Array<Record<string, CellValue>>;
  columns?: string[];
  label?: string;
  sourcePath?: string;
}): DatasetTable {
  const columns = params.columns ?? inferColumns(params.rows);
  const annotate = columns.includes(FACILITY_COLUMN);

  const rows: Row[] = params.rows.map((r) =>
    Object.freeze(
      annotate ? { ...r, [FACILITY_NORM_COLUMN]: normalizeName(r[FACILITY_COLUMN]) } : { ...r },
    ),
  );

  return Object.freeze({
    id: params.id,
    label: params.label ?? DATASET_LABELS[params.id],
    sourcePath: params.sourcePath,
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows),
  });
}

function inferColumns(rows: Array<Record<string, CellValue>>): string[] {
  const seen = new Set<string>();
  for (const r of rows) {
    for (const key of Object.keys(r)) seen.add(key);
  }
  return [...seen];
}

/** Bundle tables given per dataset id; missing ids become empty tables. */
export function createBundle(
  tables: Partial<Record<DatasetId, DatasetTable>>,
  fileHashes: Partial<Record<DatasetId, string>> = {},
): DatasetBundle {
  const pick = (id: DatasetId): DatasetTable =>
    tables[id] ?? createTable({ id, rows: [], columns: [] });
  const complete: Record<DatasetId, DatasetTable> = {
    patient_experience: pick("patient_experience"),
    infections: pick("infections"),
    readmissions: pick("readmissions"),
    mortality_complications: pick("mortality_complications"),
    timely_care: pick("timely_care"),
  };
  return Object.freeze({
    tables: Object.freeze(complete),
    fileHashes: Object.freeze({ ...fileHashes }),
  });
}

/** Throw a DatasetSchemaError naming every required column the table lacks. */
export function ensureColumns(table: DatasetTable, required: readonly string[]): void {
  const missing = required.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new DatasetSchemaError(table.label, missing);
  }
}

/** Rows belonging to a facility, compared by normalized name. */
export function filterFacility(table: DatasetTable, facility: string): Row[] {
  const key = normalizeName(facility);
  return table.rows.filter((r) => {
    const norm = r[FACILITY_NORM_COLUMN];
    return (typeof norm === "string" ? norm : normalizeName(r[FACILITY_COLUMN])) === key;
  });
}
