/**
 * Unit tests for cosine similarity and ranking order
 */

import { describe, it, expect } from "vitest";
import { cosineSimilarity, rankBySimilarity } from "@/retrieval/ranker";

function vec(entries: Array<[number, number]>): Map<number, number> {
  return new Map(entries);
}

describe("cosineSimilarity", () => {
  it("is 1 for identical directions", () => {
    expect(cosineSimilarity(vec([[0, 3], [1, 4]]), vec([[0, 3], [1, 4]]))).toBe(1);
    expect(cosineSimilarity(vec([[0, 1]]), vec([[0, 5]]))).toBe(1);
  });

  it("is 0 for vectors with no shared columns", () => {
    expect(cosineSimilarity(vec([[0, 1]]), vec([[1, 1]]))).toBe(0);
  });

  it("is 0 when either vector is empty", () => {
    expect(cosineSimilarity(vec([]), vec([[0, 1]]))).toBe(0);
    expect(cosineSimilarity(vec([[0, 1]]), vec([]))).toBe(0);
  });

  it("computes partial overlap", () => {
    expect(cosineSimilarity(vec([[0, 1]]), vec([[0, 1], [1, 1]]))).toBeCloseTo(
      Math.SQRT1_2,
      12,
    );
  });

  it("is symmetric", () => {
    const a = vec([[0, 0.2], [2, 0.9]]);
    const b = vec([[0, 0.5], [1, 0.1], [2, 0.3]]);
    expect(cosineSimilarity(a, b)).toBeCloseTo(cosineSimilarity(b, a), 12);
  });
});

describe("rankBySimilarity", () => {
  it("orders by score descending and index ascending on ties", () => {
    const ranked = rankBySimilarity(vec([[0, 1]]), [
      vec([[1, 1]]),
      vec([[0, 1], [1, 1]]),
      vec([[0, 1]]),
      vec([[0, 2]]),
    ]);

    expect(ranked.map((r) => r.index)).toEqual([2, 3, 1, 0]);
    expect(ranked[0].score).toBe(1);
    expect(ranked[3].score).toBe(0);
  });

  it("returns one entry per vector", () => {
    const vectors = [vec([]), vec([]), vec([])];
    const ranked = rankBySimilarity(vec([[0, 1]]), vectors);

    expect(ranked).toEqual([
      { index: 0, score: 0 },
      { index: 1, score: 0 },
      { index: 2, score: 0 },
    ]);
  });

  it("returns an empty ranking for no vectors", () => {
    expect(rankBySimilarity(vec([[0, 1]]), [])).toEqual([]);
  });
});
