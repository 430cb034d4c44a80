import { describe, it, expect } from "vitest";
import { closeMatches, matchingCharacters, similarityRatio } from "../src/facility/similarity.js";

describe("similarityRatio", () => {
  it("is 1 for identical strings, including two empty ones", () => {
    expect(similarityRatio("mercy", "mercy")).toBe(1);
    expect(similarityRatio("", "")).toBe(1);
  });

  it("is 0 when nothing matches", () => {
    expect(similarityRatio("abc", "xyz")).toBe(0);
    expect(similarityRatio("abc", "")).toBe(0);
  });

  it("counts characters across recursive matching blocks", () => {
    expect(matchingCharacters("abcd", "bcde")).toBe(3);
    expect(similarityRatio("abcd", "bcde")).toBe(0.75);
    expect(matchingCharacters("apple", "appel")).toBe(4);
    expect(similarityRatio("apple", "appel")).toBe(0.8);
    expect(similarityRatio("abcd", "abcd abcd")).toBeCloseTo(8 / 13, 10);
  });

  it("scores a one-letter drop above the near-exact cutoff", () => {
    const score = similarityRatio("mercy general hospital", "mercy generl hospital");
    expect(score).toBeCloseTo(42 / 43, 10);
    expect(score).toBeGreaterThan(0.88);
  });
});

describe("closeMatches", () => {
  it("returns candidates above the cutoff, best first", () => {
    const result = closeMatches("appel", ["ape", "apple", "peach", "puppy"], 3, 0.6);
    expect(result.map((m) => m.candidate)).toEqual(["apple", "ape"]);
    expect(result[0].score).toBe(0.8);
    expect(result[1].score).toBe(0.75);
  });

  it("limits the number of candidates", () => {
    const result = closeMatches("appel", ["ape", "apple", "peach", "puppy"], 1, 0.6);
    expect(result.map((m) => m.candidate)).toEqual(["apple"]);
  });

  it("orders equal scores by candidate descending", () => {
    const result = closeMatches("ab", ["ac", "ad"], 2, 0);
    expect(result.map((m) => m.candidate)).toEqual(["ad", "ac"]);
  });

  it("treats case differences as mismatches", () => {
    expect(closeMatches("APPLE", ["apple"], 1, 0.1)).toEqual([]);
    expect(closeMatches("Apple", ["apple"], 1, 0.7)).toEqual([{ candidate: "apple", score: 0.8 }]);
  });

  it("returns nothing for a non-positive limit", () => {
    expect(closeMatches("apple", ["apple"], 0, 0)).toEqual([]);
  });
});
