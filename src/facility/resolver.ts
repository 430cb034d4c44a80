/**
 * Facility Index & Resolver
 *
 * Resolves free-text facility names in three tiers:
 * 1. Exact match on the normalized name (trim + casefold)
 * 2. Near-exact fuzzy match — auto-resolves to the single best candidate
 * 3. Loose fuzzy match — suggestions only, never auto-resolved
 *
 * Fuzzy tiers compare the trimmed input with canonical spellings as-is, so
 * casing counts there.
 */

import { DATASET_IDS, FACILITY_COLUMN } from "../datasets/types.js";
import type { DatasetBundle } from "../datasets/types.js";
import { normalizeName } from "../shared/normalize.js";
import type { ResolverSettings } from "../shared/config.js";
import { closeMatches } from "./similarity.js";

export const DEFAULT_RESOLVER_SETTINGS: ResolverSettings = {
  highCutoff: 0.88,
  suggestCutoff: 0.6,
  suggestLimit: 5,
};

export interface Resolution {
  /** Canonical facility name, or "" when nothing was resolved. */
  canonical: string;
  /** Explanation for the caller; "" on an exact match. */
  note: string;
}

/**
 * Immutable lookup from normalized facility name to its canonical spelling.
 * The first spelling encountered (in dataset order) becomes canonical.
 */
export class FacilityIndex {
  private readonly byKey: ReadonlyMap<string, string>;
  readonly names: readonly string[];

  private constructor(byKey: Map<string, string>) {
    this.byKey = byKey;
    this.names = Object.freeze([...byKey.values()]);
  }

  static fromNames(rawNames: Iterable<unknown>): FacilityIndex {
    const byKey = new Map<string, string>();
    for (const raw of rawNames) {
      if (raw === null || raw === undefined) continue;
      const name = String(raw);
      const key = normalizeName(name);
      if (!key || byKey.has(key)) continue;
      byKey.set(key, name);
    }
    return new FacilityIndex(byKey);
  }

  static fromBundle(bundle: DatasetBundle): FacilityIndex {
    function* facilityCells(): Generator<unknown> {
      for (const id of DATASET_IDS) {
        const table = bundle.tables[id];
        if (!table.columns.includes(FACILITY_COLUMN)) continue;
        for (const row of table.rows) yield row[FACILITY_COLUMN];
      }
    }
    return FacilityIndex.fromNames(facilityCells());
  }

  get size(): number {
    return this.byKey.size;
  }

  lookup(name: string): string | undefined {
    return this.byKey.get(normalizeName(name));
  }
}

export class FacilityResolver {
  private readonly settings: ResolverSettings;

  constructor(
    readonly index: FacilityIndex,
    settings: Partial<ResolverSettings> = {},
  ) {
    this.settings = Object.freeze({ ...DEFAULT_RESOLVER_SETTINGS, ...settings });
  }

  resolve(input: string): Resolution {
    const query = input.trim();
    if (!query) {
      return { canonical: "", note: "No facility selected." };
    }

    const exact = this.index.lookup(query);
    if (exact !== undefined) {
      return { canonical: exact, note: "" };
    }

    const [closest] = closeMatches(query, this.index.names, 1, this.settings.highCutoff);
    if (closest) {
      return {
        canonical: closest.candidate,
        note: `(Resolved to closest match: ${closest.candidate})`,
      };
    }

    const suggestions = closeMatches(
      query,
      this.index.names,
      this.settings.suggestLimit,
      this.settings.suggestCutoff,
    );
    if (suggestions.length > 0) {
      const list = suggestions.map((s) => s.candidate).join(" | ");
      return {
        canonical: "",
        note: `Facility not found: '${query}'. Did you mean one of: ${list}?`,
      };
    }

    return { canonical: "", note: `Facility not found: '${query}'.` };
  }
}
