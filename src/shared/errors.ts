/**
 * Errors raised while loading or reading the datasets.
 *
 * Both are fatal: a load error stops the process at startup, a schema error
 * aborts the summary request that hit it.
 */

export class DatasetLoadError extends Error {
  constructor(
    readonly datasetLabel: string,
    readonly filePath: string,
    message: string,
  ) {
    super(`Failed to load ${datasetLabel} from ${filePath}: ${message}`);
    this.name = "DatasetLoadError";
  }
}

export class DatasetSchemaError extends Error {
  constructor(
    readonly datasetLabel: string,
    readonly missingColumns: string[],
  ) {
    super(`${datasetLabel} is missing columns: [${missingColumns.map((c) => `'${c}'`).join(", ")}]`);
    this.name = "DatasetSchemaError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Type name of an unknown thrown value, e.g. "TypeError" or "APIConnectionError". */
export function errorTypeName(err: unknown): string {
  if (err instanceof Error) return err.constructor.name || err.name;
  return typeof err;
}
