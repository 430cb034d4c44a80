import { describe, it, expect } from "vitest";
import { FacilityIndex, FacilityResolver } from "../src/facility/resolver.js";
import { createBundle, createTable } from "../src/datasets/table.js";
import { loadFixtureBundle } from "./helpers/fixtures.js";

describe("FacilityIndex", () => {
  it("keeps the first spelling seen as canonical", () => {
    const index = FacilityIndex.fromNames(["Mercy General Hospital", "MERCY GENERAL HOSPITAL ", "Other"]);
    expect(index.names).toEqual(["Mercy General Hospital", "Other"]);
    expect(index.lookup("  mercy general hospital")).toBe("Mercy General Hospital");
  });

  it("skips blank and missing names", () => {
    const index = FacilityIndex.fromNames(["", "   ", null, undefined, "A"]);
    expect(index.names).toEqual(["A"]);
    expect(index.size).toBe(1);
  });

  it("collects names across datasets in dataset order", () => {
    const index = FacilityIndex.fromBundle(loadFixtureBundle());
    expect(index.names).toEqual([
      "Mercy General Hospital",
      "St. Luke Medical Center",
      "Riverside Community Hospital",
      "Lakeview Regional Hospital",
    ]);
  });

  it("ignores tables without a facility column", () => {
    const bundle = createBundle({
      infections: createTable({ id: "infections", rows: [{ Name: "Hidden" }] }),
      timely_care: createTable({ id: "timely_care", rows: [{ "Facility Name": "Visible" }] }),
    });
    expect(FacilityIndex.fromBundle(bundle).names).toEqual(["Visible"]);
  });
});

describe("FacilityResolver", () => {
  const resolver = new FacilityResolver(FacilityIndex.fromBundle(loadFixtureBundle()));

  it("reports an empty selection", () => {
    expect(resolver.resolve("")).toEqual({ canonical: "", note: "No facility selected." });
    expect(resolver.resolve("   ")).toEqual({ canonical: "", note: "No facility selected." });
  });

  it("resolves casing and whitespace variants exactly with no note", () => {
    expect(resolver.resolve("mercy general hospital ")).toEqual({
      canonical: "Mercy General Hospital",
      note: "",
    });
    expect(resolver.resolve("ST. LUKE MEDICAL CENTER")).toEqual({
      canonical: "St. Luke Medical Center",
      note: "",
    });
  });

  it("auto-resolves a one-letter typo to the closest match", () => {
    expect(resolver.resolve("Mercy Generl Hospital")).toEqual({
      canonical: "Mercy General Hospital",
      note: "(Resolved to closest match: Mercy General Hospital)",
    });
  });

  it("does not fuzzy-match a typo whose casing differs", () => {
    expect(resolver.resolve("MERCY GENERL HOSPITAL")).toEqual({
      canonical: "",
      note: "Facility not found: 'MERCY GENERL HOSPITAL'.",
    });
  });

  it("does not resolve an unrelated name", () => {
    const { canonical, note } = resolver.resolve("Unknown Clinic XYZ");
    expect(canonical).toBe("");
    expect(note.startsWith("Facility not found: 'Unknown Clinic XYZ'.")).toBe(true);
  });

  it("lists suggestions for a loose match without resolving", () => {
    const r = new FacilityResolver(FacilityIndex.fromNames(["Alpha Clinic", "Alpha Clinics", "Beta Clinic"]));
    expect(r.resolve("Alpha Cl")).toEqual({
      canonical: "",
      note: "Facility not found: 'Alpha Cl'. Did you mean one of: Alpha Clinic | Alpha Clinics?",
    });
  });

  it("reports not found without suggestions when nothing is close", () => {
    const r = new FacilityResolver(FacilityIndex.fromNames(["Alpha Clinic"]));
    expect(r.resolve("Zzz")).toEqual({ canonical: "", note: "Facility not found: 'Zzz'." });
  });

  it("honours configured cutoffs and limits", () => {
    const index = FacilityIndex.fromNames(["Alpha Clinic", "Alpha Clinics"]);

    const strict = new FacilityResolver(index, { highCutoff: 0.99 });
    expect(strict.resolve("Alpha Clini").canonical).toBe("");

    const loose = new FacilityResolver(index, { highCutoff: 0.75 });
    expect(loose.resolve("Alpha Cl")).toEqual({
      canonical: "Alpha Clinic",
      note: "(Resolved to closest match: Alpha Clinic)",
    });

    const single = new FacilityResolver(index, { suggestLimit: 1 });
    expect(single.resolve("Alpha Cl").note).toBe(
      "Facility not found: 'Alpha Cl'. Did you mean one of: Alpha Clinic?",
    );
  });
});
