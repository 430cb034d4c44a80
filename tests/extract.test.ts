import { describe, it, expect } from "vitest";
import { createBundle, createTable } from "../src/datasets/table.js";
import { DatasetSchemaError } from "../src/shared/errors.js";
import { buildCategorySpecs, rankReadmissions } from "../src/metrics/categories.js";
import { extractAllCategories, extractCategory } from "../src/metrics/extract.js";
import { metaFor } from "../src/metrics/measure_meta.js";
import type { ReadmissionEntry } from "../src/metrics/types.js";
import { loadFixtureBundle } from "./helpers/fixtures.js";

const bundle = loadFixtureBundle();
const specs = buildCategorySpecs();
const MERCY = "Mercy General Hospital";

describe("Infections", () => {
  it("keeps whitelisted SIR measures with parseable scores, rounded to 3 decimals", () => {
    expect(extractCategory(bundle, MERCY, specs.infections)).toEqual([
      { name: "HAI_1_SIR", value: 0.876, unit: "sir", better: "lower" },
      { name: "HAI_5_SIR", value: 1.2, unit: "sir", better: "lower" },
    ]);
  });

  it("matches rows by normalized facility name", () => {
    expect(extractCategory(bundle, "riverside community hospital", specs.infections)).toEqual([
      { name: "HAI_1_SIR", value: 0.5, unit: "sir", better: "lower" },
    ]);
  });
});

describe("Mortality & complications", () => {
  it("keeps unparseable scores as null and attaches non-blank comparison labels", () => {
    expect(extractCategory(bundle, MERCY, specs.mortality_complications)).toEqual([
      {
        name: "MORT_30_AMI",
        value: 12.346,
        unit: "rate",
        better: "lower",
        compared_to_national: "No Different Than the National Rate",
      },
      { name: "PSI_90", value: null, unit: "rate", better: "lower", compared_to_national: "Not Available" },
      { name: "MORT_30_HF", value: 10.5, unit: "rate", better: "lower" },
    ]);
  });

  it("omits the comparison key when the label is blank", () => {
    const [, , hf] = extractCategory(bundle, MERCY, specs.mortality_complications);
    expect(Object.keys(hf)).not.toContain("compared_to_national");
  });
});

describe("Readmissions", () => {
  it("keeps the three worst differences, worst first", () => {
    expect(extractCategory(bundle, MERCY, specs.readmissions)).toEqual([
      { name: "READM-30-AMI-HRRP", predicted: 20, expected: 15, difference: 5, better: "lower" },
      { name: "READM-30-PN-HRRP", predicted: 17, expected: 14, difference: 3, better: "lower" },
      { name: "READM-30-HIP-KNEE-HRRP", predicted: 5, expected: 4, difference: 1, better: "lower" },
    ]);
  });

  it("ranks by descending difference and truncates", () => {
    const entries: ReadmissionEntry[] = [5, -2, 3, -8, 1].map((difference, i) => ({
      name: `M${i}`,
      predicted: 10 + difference,
      expected: 10,
      difference,
      better: "lower",
    }));
    const ranked = rankReadmissions(entries, 3);
    expect(ranked.map((e) => e.difference)).toEqual([5, 3, 1]);
    expect(ranked.map((e) => [e.name, e.predicted, e.expected])).toEqual([
      ["M0", 15, 10],
      ["M2", 13, 10],
      ["M4", 11, 10],
    ]);
  });

  it("uses the configured limit", () => {
    const five = buildCategorySpecs({ readmissionTopN: 5 });
    expect(extractCategory(bundle, MERCY, five.readmissions).map((e) => e.difference)).toEqual([5, 3, 1, -2, -8]);
  });

  it("drops rows whose predicted or expected rate is missing", () => {
    const names = extractCategory(bundle, MERCY, buildCategorySpecs({ readmissionTopN: 10 }).readmissions).map(
      (e) => e.name,
    );
    expect(names).not.toContain("READM-30-CABG-HRRP");
    expect(names).toHaveLength(5);
  });
});

describe("Timely care", () => {
  it("emits numeric entries with metadata and keeps categorical scores as text", () => {
    expect(extractCategory(bundle, MERCY, specs.timely_care)).toEqual([
      {
        name: "Emergency department volume",
        value_text: "high",
        unit: "category",
        better: "context",
        id: "EDV",
      },
      { name: "ED throughput time (median)", value: 185, unit: "minutes", better: "lower", id: "OP_18b" },
      { name: "OP_23", value: 72, unit: "unknown", better: "unknown", id: "OP_23" },
    ]);
  });
});

describe("Patient experience", () => {
  it("keeps whitelisted linear means rounded to 2 decimals", () => {
    expect(extractCategory(bundle, MERCY, specs.patient_experience)).toEqual([
      { id: "H_COMP_1_LINEAR_SCORE", value: 91, unit: "linear_mean", better: "higher" },
      { id: "H_COMP_2_LINEAR_SCORE", value: 89.44, unit: "linear_mean", better: "higher" },
    ]);
  });
});

describe("extractAllCategories", () => {
  it("returns empty lists for a facility present in only one dataset", () => {
    expect(extractAllCategories(bundle, "Lakeview Regional Hospital")).toEqual({
      patient_experience: [],
      infections: [],
      readmissions: [],
      mortality_complications: [],
      timely_care: [
        { name: "ED throughput time (median)", value: 140, unit: "minutes", better: "lower", id: "OP_18b" },
      ],
    });
  });

  it("fails with a schema error naming the table and missing columns", () => {
    const broken = createBundle({
      ...bundle.tables,
      infections: createTable({ id: "infections", rows: [{ "Measure ID": "HAI_1_SIR", Score: "1" }] }),
    });
    expect(() => extractAllCategories(broken, MERCY)).toThrow(DatasetSchemaError);
    expect(() => extractAllCategories(broken, MERCY)).toThrow("Infections is missing columns: ['Facility Name']");
  });

  it("lists every missing column", () => {
    const broken = createBundle({
      ...bundle.tables,
      mortality_complications: createTable({ id: "mortality_complications", rows: [], columns: ["Facility Name", "Score"] }),
    });
    try {
      extractAllCategories(broken, MERCY);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DatasetSchemaError);
      if (err instanceof DatasetSchemaError) {
        expect(err.datasetLabel).toBe("Complication & Death");
        expect(err.missingColumns).toEqual(["Measure ID", "Compared to National"]);
      }
    }
  });
});

describe("metaFor", () => {
  it("falls back to the identifier with unknown unit and direction", () => {
    expect(metaFor(" OP_99 ")).toEqual({ name: "OP_99", unit: "unknown", better: "unknown" });
    expect(metaFor("SEP_1")).toEqual({ name: "Sepsis bundle (SEP-1)", unit: "percent", better: "higher" });
  });

  it("does not treat inherited object keys as measures", () => {
    expect(metaFor("toString")).toEqual({ name: "toString", unit: "unknown", better: "unknown" });
  });
});
