import { describe, expect, it } from "vitest";
import { BATCH_SIMILARITY_THRESHOLD, findDuplicatePairs, normalize, similarity } from "./similarity";

describe("normalize", () => {
  it("lowercases, collapses whitespace and trims", () => {
    expect(normalize("  What IS\ta\n\nHash   Table? ")).toBe("what is a hash table?");
  });

  it("is idempotent", () => {
    const samples = ["  A  b\tC ", "already normal", "", "\n\n", "Mixed CASE\r\nlines"];
    for (const s of samples) expect(normalize(normalize(s))).toBe(normalize(s));
  });
});

describe("similarity", () => {
  it("is 1 for identical text", () => {
    expect(similarity("explain recursion", "explain recursion")).toBe(1);
  });

  it("is 0 when either side has no words", () => {
    expect(similarity("", "explain recursion")).toBe(0);
    expect(similarity("explain recursion", "")).toBe(0);
  });

  it("is symmetric", () => {
    const a = normalize("What is a hash table?");
    const b = normalize("How does a hash table work?");
    expect(similarity(a, b)).toBe(similarity(b, a));
  });

  it("keeps punctuation attached to words, so the hash table pair stays well below the threshold", () => {
    // {what,is,a,hash,table?} vs {how,does,a,hash,table,work?}: 2 shared, 9 total
    const score = similarity(normalize("What is a hash table?"), normalize("How does a hash table work?"));
    expect(score).toBeCloseTo(0.32, 10);
    expect(score).toBeLessThanOrEqual(BATCH_SIMILARITY_THRESHOLD);
  });

  it("uses the weighted overlap when one question is contained in another", () => {
    // 6 shared words, 8 in the union: jaccard 0.75, overlap 0.8 * 6/6
    const score = similarity("explain how a hash table works", "explain how a hash table works in detail");
    expect(score).toBeCloseTo(0.8, 10);
  });

  it("uses jaccard when it beats the weighted overlap", () => {
    // identical word sets in a different order: jaccard 1, weighted overlap 0.8
    expect(similarity("a b c d", "d c b a")).toBe(1);
  });
});

describe("findDuplicatePairs", () => {
  it("returns nothing for distinct questions", () => {
    expect(
      findDuplicatePairs([
        "Explain how a hash table resolves collisions.",
        "Compare open addressing with separate chaining.",
        "Why does load factor affect lookup performance?",
      ])
    ).toEqual([]);
  });

  it("flags exact duplicates after normalization", () => {
    expect(findDuplicatePairs(["Explain recursion.", "  EXPLAIN   recursion. "])).toEqual([
      { first: 1, second: 2, score: 1, exact: true },
    ]);
  });

  it("flags near duplicates above the threshold with 1-based positions", () => {
    const pairs = findDuplicatePairs([
      "Describe binary search.",
      "explain how a hash table works",
      "explain how a hash table works in detail",
    ]);
    expect(pairs).toHaveLength(1);
    expect(pairs[0]).toMatchObject({ first: 2, second: 3, exact: false });
    expect(pairs[0].score).toBeCloseTo(0.8, 10);
  });

  it("does not flag a pair scoring exactly at the threshold", () => {
    expect(findDuplicatePairs(["a b c d", "a b c d e f g"], 0.8)).toEqual([]);
  });
});
