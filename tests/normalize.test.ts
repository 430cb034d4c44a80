import { describe, it, expect } from "vitest";
import { isMissingToken, normalizeName, roundTo, toNum } from "../src/shared/normalize.js";

describe("toNum", () => {
  it("maps every missing-data token to null regardless of case and whitespace", () => {
    for (const token of [
      "not applicable",
      "Not Applicable",
      "NOT AVAILABLE",
      " na ",
      "N/A",
      "NaN",
      "",
      "   ",
    ]) {
      expect(toNum(token)).toBeNull();
    }
  });

  it("converts numeric-looking strings", () => {
    expect(toNum("12.5")).toBe(12.5);
    expect(toNum(" 3 ")).toBe(3);
    expect(toNum("-0.25")).toBe(-0.25);
    expect(toNum("+7")).toBe(7);
    expect(toNum("1e3")).toBe(1000);
    expect(toNum(".5")).toBe(0.5);
    expect(toNum("4.")).toBe(4);
  });

  it("rejects non-numeric text without throwing", () => {
    expect(toNum("abc")).toBeNull();
    expect(toNum("12%")).toBeNull();
    expect(toNum("1,200")).toBeNull();
    expect(toNum("0x10")).toBeNull();
    expect(toNum("Infinity")).toBeNull();
    expect(toNum("high")).toBeNull();
  });

  it("passes finite numbers through and rejects everything else", () => {
    expect(toNum(7)).toBe(7);
    expect(toNum(0)).toBe(0);
    expect(toNum(Number.NaN)).toBeNull();
    expect(toNum(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toNum(null)).toBeNull();
    expect(toNum(undefined)).toBeNull();
    expect(toNum(true)).toBeNull();
    expect(toNum({ value: 1 })).toBeNull();
  });

  it("is idempotent", () => {
    for (const input of ["12.5", "N/A", "abc", 3, null, " 0.125 "]) {
      expect(toNum(toNum(input))).toBe(toNum(input));
    }
  });
});

describe("isMissingToken", () => {
  it("recognises tokens after trimming", () => {
    expect(isMissingToken("  Not Available ")).toBe(true);
    expect(isMissingToken("high")).toBe(false);
  });
});

describe("normalizeName", () => {
  it("trims and casefolds", () => {
    expect(normalizeName("  Mercy General HOSPITAL ")).toBe("mercy general hospital");
  });

  it("treats null and undefined as empty", () => {
    expect(normalizeName(null)).toBe("");
    expect(normalizeName(undefined)).toBe("");
  });
});

describe("roundTo", () => {
  it("rounds to the requested decimals", () => {
    expect(roundTo(0.8764, 3)).toBe(0.876);
    expect(roundTo(89.444, 2)).toBe(89.44);
    expect(roundTo(12.3456, 3)).toBe(12.346);
    expect(roundTo(5, 3)).toBe(5);
  });

  it("sends exact halves to the even neighbour", () => {
    expect(roundTo(89.125, 2)).toBe(89.12);
    expect(roundTo(1.0625, 3)).toBe(1.062);
    expect(roundTo(0.375, 2)).toBe(0.38);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(-0.125, 2)).toBe(-0.12);
  });

  it("rounds values just short of a half downward", () => {
    // 2.675 is stored slightly below 2.675
    expect(roundTo(2.675, 2)).toBe(2.67);
  });
});
