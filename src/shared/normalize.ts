/**
 * Value Normalization — facility-name keys and numeric cell conversion.
 *
 * Spreadsheet exports mark missing data with soft tokens ("Not Available",
 * "N/A", ...). These must never reach a numeric field.
 */

// ── Facility names ───────────────────────────────────────────────────

/** Lookup key for a facility name: trimmed and casefolded. */
export function normalizeName(value: unknown): string {
  return String(value ?? "").trim().toLowerCase();
}

// ── Missing-data sentinels ───────────────────────────────────────────

export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  "not applicable",
  "not available",
  "na",
  "n/a",
  "nan",
  "",
]);

export function isMissingToken(value: string): boolean {
  return MISSING_TOKENS.has(value.trim().toLowerCase());
}

// ── Numbers ──────────────────────────────────────────────────────────

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Convert a raw cell to a finite number, or null when it carries no value.
 * Never throws.
 */
export function toNum(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;
  if (isMissingToken(value)) return null;

  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/**
 * Round to a fixed number of decimals (0-20). Rounds the exact binary value;
 * a value lying exactly halfway goes to the even neighbour, so
 * `roundTo(89.125, 2)` is 89.12 while `roundTo(2.675, 2)` is 2.67.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;
  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);

  // toFixed rounds the exact value but breaks exact ties upward.
  const wider = magnitude.toFixed(decimals + 1);
  if (wider.endsWith("5") && Number(wider) === magnitude) {
    const digits = BigInt(wider.replace(".", ""));
    if (digits % 5n ** BigInt(decimals + 1) === 0n) {
      const lower = digits / 10n;
      const even = lower % 2n === 0n ? lower : lower + 1n;
      return sign * Number(`${even}e-${decimals}`);
    }
  }
  return sign * Number(magnitude.toFixed(decimals));
}
