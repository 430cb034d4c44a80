/**
 * Dataset Loader — reads the five source files into frozen in-memory tables.
 *
 * Orchestrates: optional manifest → file lookup → CSV/XLSX parsing →
 * facility-name annotation → bundle with per-file hashes.
 * Runs once at process start; the returned bundle is shared read-only.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";

import { DatasetLoadError, errorMessage } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";
import { createBundle, createTable } from "./table.js";
import {
  DATASET_IDS,
  DATASET_LABELS,
  DEFAULT_DATASET_FILES,
  DatasetManifestSchema,
} from "./types.js";
import type { CellValue, DatasetBundle, DatasetId, DatasetTable } from "./types.js";

export const MANIFEST_FILENAME = "datasets.manifest.json";

interface ParsedSheet {
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

/**
 * Resolve the file name for every dataset: manifest entries override the
 * defaults, absent manifest means defaults only.
 */
export function resolveDatasetFiles(datasetDir: string): Record<DatasetId, string> {
  const manifestPath = path.join(datasetDir, MANIFEST_FILENAME);
  if (!existsSync(manifestPath)) return { ...DEFAULT_DATASET_FILES };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(manifestPath, "utf-8"));
  } catch (err) {
    throw new DatasetLoadError("dataset manifest", manifestPath, errorMessage(err));
  }
  const parsed = DatasetManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new DatasetLoadError("dataset manifest", manifestPath, issues.join("; "));
  }
  return { ...DEFAULT_DATASET_FILES, ...parsed.data.files };
}

/**
 * Parse CSV text. The first record is the header; header names and cells are
 * trimmed and every cell stays a string.
 */
export function parseCsv(text: string): ParsedSheet {
  const records: string[][] = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  const [header, ...body] = records;
  if (header === undefined) return { columns: [], rows: [] };

  const rows = body.map((cells) => {
    const row: Record<string, CellValue> = {};
    header.forEach((col, i) => {
      row[col] = cells[i] ?? "";
    });
    return row;
  });
  return { columns: header, rows };
}

/**
 * Parse the first worksheet of an XLSX/XLS workbook. Numeric cells keep
 * their numeric type; empty cells become null.
 */
export function parseWorkbook(buffer: Buffer): ParsedSheet {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return { columns: [], rows: [] };
  const sheet = workbook.Sheets[sheetName];

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  const [headerRow, ...body] = matrix;
  if (headerRow === undefined) return { columns: [], rows: [] };

  const columns = headerRow.map((h) => String(h ?? "").trim());
  const rows = body.map((cells) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((col, i) => {
      if (col) row[col] = toCellValue(cells[i]);
    });
    return row;
  });
  return { columns: columns.filter(Boolean), rows };
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Read one dataset file into a table.
 */
export function loadDatasetFile(id: DatasetId, filePath: string): { table: DatasetTable; sha256: string } {
  const label = DATASET_LABELS[id];
  if (!existsSync(filePath)) {
    throw new DatasetLoadError(label, filePath, "file not found");
  }

  let buffer: Buffer;
  let sheet: ParsedSheet;
  try {
    buffer = readFileSync(filePath);
    sheet = filePath.toLowerCase().endsWith(".csv")
      ? parseCsv(buffer.toString("utf-8"))
      : parseWorkbook(buffer);
  } catch (err) {
    throw new DatasetLoadError(label, filePath, errorMessage(err));
  }

  return {
    table: createTable({ id, label, rows: sheet.rows, columns: sheet.columns, sourcePath: filePath }),
    sha256: sha256Bytes(buffer),
  };
}

/**
 * Load all five datasets from a directory.
 */
export function loadDatasets(datasetDir: string): DatasetBundle {
  const files = resolveDatasetFiles(datasetDir);
  const tables: Partial<Record<DatasetId, DatasetTable>> = {};
  const fileHashes: Partial<Record<DatasetId, string>> = {};

  for (const id of DATASET_IDS) {
    const { table, sha256 } = loadDatasetFile(id, path.join(datasetDir, files[id]));
    tables[id] = table;
    fileHashes[id] = sha256;
  }

  return createBundle(tables, fileHashes);
}
