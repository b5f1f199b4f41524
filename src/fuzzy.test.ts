import { describe, expect, it } from "vitest";
import { bestWordMatch, editDistance, fuzzyTitleMatch, maxEditsFor, splitWords } from "./fuzzy";

describe("editDistance", () => {
  it("counts an adjacent transposition as one edit", () => {
    expect(editDistance("tesitng", "testing")).toBe(1);
  });

  it("handles insertions, deletions and substitutions", () => {
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "abc")).toBe(3);
    expect(editDistance("same", "same")).toBe(0);
  });
});

it("allows 40% of the term length in edits", () => {
  expect([2, 3, 5, 7, 10].map(maxEditsFor)).toEqual([0, 1, 2, 2, 4]);
});

it("splits words on punctuation", () => {
  expect(splitWords("Binding-Guidelines: v2")).toEqual(["Binding", "Guidelines", "v2"]);
});

describe("bestWordMatch", () => {
  it("matches a prefix of a longer word", () => {
    const m = bestWordMatch("cache", ["Caching", "Strategies"]);
    expect(m?.term).toBe("Caching");
    expect(m?.similarity).toBeCloseTo(0.8);
  });
});

describe("fuzzyTitleMatch", () => {
  it("finds a transposed word", () => {
    const m = fuzzyTitleMatch("tesitng", "Testing Best Practices");
    expect(m?.term).toBe("Testing");
    expect(m?.similarity).toBeCloseTo(6 / 7);
  });

  it("scores a closer typo higher", () => {
    const near = fuzzyTitleMatch("testng", "Testing Best Practices");
    const far = fuzzyTitleMatch("tesng", "Testing Best Practices");
    expect(near?.similarity).toBeCloseTo(6 / 7);
    expect(far?.similarity).toBeCloseTo(5 / 7);
  });

  it("matches the whole title", () => {
    expect(fuzzyTitleMatch("simplicty", "Simplicity")).toEqual({
      term: "Simplicity",
      similarity: 0.9,
    });
  });

  it("requires every query word to match", () => {
    expect(fuzzyTitleMatch("testing zebra", "Testing Best Practices")).toBeUndefined();
  });

  it("ignores short or unrelated queries", () => {
    expect(fuzzyTitleMatch("ab", "Abc")).toBeUndefined();
    expect(fuzzyTitleMatch("xyz", "Testing Best Practices")).toBeUndefined();
  });
});
