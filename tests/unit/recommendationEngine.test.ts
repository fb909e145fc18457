/**
 * Unit tests for the recommendation engine
 *
 * Uses the six-item fixture catalog; page fetching is a stub function.
 * No DB, no network.
 */

import { describe, it, expect, vi } from "vitest";
import {
  RecommendationEngine,
  RecommendationEngineError,
  buildRecommendationContext,
  clampMaxResults,
  roundSimilarity,
} from "@/recommendation";
import { parseItemDuration } from "@/retrieval/constraints";
import { loadCatalogFromFile } from "@/catalog";
import type {
  CatalogItem,
  Logger,
  PageTextFetcher,
  RecommendationContext,
  VectorSpace,
} from "@/types";
import { createTestCatalog } from "../helpers/catalogFixtures";

function createSilentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createEngine(
  items: CatalogItem[] = createTestCatalog(),
  fetchPageText?: PageTextFetcher,
): RecommendationEngine {
  return new RecommendationEngine(buildRecommendationContext(items), {
    fetchPageText,
    logger: createSilentLogger(),
  });
}

describe("RecommendationEngine", () => {
  describe("ranking", () => {
    it("returns the closest item first with a rounded score", async () => {
      const recs = await createEngine().getRecommendations("python");

      expect(recs[0].name).toBe("Python (New)");
      expect(recs[0].similarity).toBe(0.4396);
      expect(recs[0].url).toBe(
        "https://catalog.example.com/assessments/python-new-/",
      );
    });

    it("orders results by non-increasing similarity", async () => {
      const recs = await createEngine().getRecommendations("programming");
      const scores = recs.map((r) => r.similarity);

      expect(recs.map((r) => r.name).slice(0, 3)).toEqual([
        "Python (New)",
        "Core Java (Advanced Level)",
        "Core Java (Entry Level)",
      ]);
      for (let i = 1; i < scores.length; i++) {
        expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
      }
    });

    it("keeps zero-score items, in catalog order", async () => {
      const recs = await createEngine().getRecommendations("assessment");

      expect(recs.map((r) => r.name)).toEqual(
        createTestCatalog().map((item) => item.name),
      );
      expect(recs.every((r) => r.similarity === 0)).toBe(true);
    });

    it("returns every score rounded to 4 decimals", async () => {
      const recs = await createEngine().getRecommendations(
        "Java programming concepts for developers",
      );
      for (const rec of recs) {
        expect(rec.similarity).toBe(roundSimilarity(rec.similarity));
        expect(rec.similarity).toBeGreaterThanOrEqual(0);
        expect(rec.similarity).toBeLessThanOrEqual(1);
      }
    });

    it("gives the same answer for the same input", async () => {
      const engine = createEngine();
      const first = await engine.getRecommendations("sales aptitude");
      const second = await engine.getRecommendations("sales aptitude");
      expect(second).toEqual(first);
    });

    it("ignores case and surrounding whitespace", async () => {
      const engine = createEngine();
      const plain = await engine.getRecommendations("python programming");
      const noisy = await engine.getRecommendations("  PYTHON \n Programming ");
      expect(noisy).toEqual(plain);
    });
  });

  describe("maxResults", () => {
    it("defaults to 10, capped by catalog size", async () => {
      const recs = await createEngine().getRecommendations("programming");
      expect(recs).toHaveLength(6);
    });

    it("truncates to the requested count", async () => {
      const recs = await createEngine().getRecommendations("programming", {
        maxResults: 2,
      });
      expect(recs.map((r) => r.name)).toEqual([
        "Python (New)",
        "Core Java (Advanced Level)",
      ]);
    });

    it("clamps out-of-range values", async () => {
      const engine = createEngine();
      expect(
        await engine.getRecommendations("programming", { maxResults: 0 }),
      ).toHaveLength(1);
      expect(
        await engine.getRecommendations("programming", { maxResults: 50 }),
      ).toHaveLength(6);
    });
  });

  describe("duration constraint", () => {
    it("drops items longer than the stated limit", async () => {
      const recs = await createEngine().getRecommendations(
        "Java programming in 40 minutes",
      );

      expect(recs.map((r) => r.name)).toEqual([
        "Core Java (Entry Level)",
        "Python (New)",
        "Verify Numerical Reasoning",
        "Occupational Personality Questionnaire",
      ]);
      expect(recs[0].similarity).toBe(0.3124);
    });

    it("lets untimed items pass any limit", async () => {
      const recs = await createEngine().getRecommendations(
        "advanced java concurrency in 10 minutes",
      );

      expect(recs.map((r) => r.name)).toEqual([
        "Occupational Personality Questionnaire",
      ]);
      expect(recs[0].similarity).toBe(0);
    });

    it("falls back to the best match when nothing fits", async () => {
      const recs = await createEngine(createTestCatalog().slice(0, 5)).getRecommendations(
        "advanced java concurrency in 10 minutes",
      );

      expect(recs).toHaveLength(1);
      expect(recs[0].name).toBe("Core Java (Advanced Level)");
      expect(recs[0].similarity).toBe(0.5479);
    });

    it("applies an hour phrase as 60 minutes", async () => {
      const recs = await createEngine().getRecommendations(
        "sales role, about an hour",
      );

      expect(recs[0].name).toBe("Sales Representative Solution");
      for (const rec of recs) {
        expect(parseItemDuration(rec.duration)).toBeLessThanOrEqual(60);
      }
    });
  });

  describe("fractional hour limits", () => {
    it("reads half an hour as 30 minutes, not a full hour", async () => {
      const recs = await createEngine().getRecommendations(
        "sales role, test must take half an hour",
      );

      expect(recs.map((r) => r.name)).toEqual([
        "Python (New)",
        "Verify Numerical Reasoning",
        "Occupational Personality Questionnaire",
      ]);
    });
  });

  describe("page text", () => {
    it("appends fetched page text to the query", async () => {
      const fetchPageText = vi.fn<[string], Promise<string | null>>(
        async () => "sales aptitude customer focus",
      );
      const engine = createEngine(createTestCatalog(), fetchPageText);

      const recs = await engine.getRecommendations("assessment", {
        url: " https://jobs.example.com/sales-1 ",
      });

      expect(fetchPageText).toHaveBeenCalledTimes(1);
      expect(fetchPageText).toHaveBeenCalledWith(
        "https://jobs.example.com/sales-1",
      );
      expect(recs[0].name).toBe("Sales Representative Solution");
      expect(recs[0].similarity).toBe(0.6162);
    });

    it("ranks on the query alone when the fetcher returns null", async () => {
      const engine = createEngine(createTestCatalog(), async () => null);
      const withUrl = await engine.getRecommendations("python", {
        url: "https://jobs.example.com/404",
      });
      const withoutUrl = await engine.getRecommendations("python");

      expect(withUrl).toEqual(withoutUrl);
    });

    it("logs and ignores a fetcher that rejects", async () => {
      const log = createSilentLogger();
      const engine = new RecommendationEngine(
        buildRecommendationContext(createTestCatalog()),
        {
          fetchPageText: async () => {
            throw new Error("socket hang up");
          },
          logger: log,
        },
      );

      const recs = await engine.getRecommendations("python", {
        url: "https://jobs.example.com/down",
      });

      expect(recs[0].name).toBe("Python (New)");
      expect(log.warn).toHaveBeenCalledTimes(1);
    });

    it("does not fetch for a blank or missing URL", async () => {
      const fetchPageText = vi.fn<[string], Promise<string | null>>(
        async () => "ignored",
      );
      const engine = createEngine(createTestCatalog(), fetchPageText);

      await engine.getRecommendations("python", { url: "   " });
      await engine.getRecommendations("python", { url: null });
      await engine.getRecommendations("python");

      expect(fetchPageText).not.toHaveBeenCalled();
    });
  });

  describe("degenerate catalogs", () => {
    it("returns nothing for an empty catalog", async () => {
      const recs = await createEngine([]).getRecommendations("java");
      expect(recs).toEqual([]);
    });

    it("returns nothing when the catalog has no indexable terms", async () => {
      const [first] = createTestCatalog();
      const recs = await createEngine([
        { ...first, name: "The", test_type: "A", description: "of and" },
      ]).getRecommendations("java");
      expect(recs).toEqual([]);
    });

    it("returns an item for an empty query", async () => {
      const recs = await createEngine().getRecommendations("", {
        maxResults: 1,
      });
      expect(recs).toHaveLength(1);
      expect(recs[0].name).toBe("Core Java (Entry Level)");
    });
  });

  describe("failures", () => {
    function createBrokenContext(index: VectorSpace): RecommendationContext {
      return { catalog: createTestCatalog().slice(0, 1), index };
    }

    it("wraps vector space errors in RecommendationEngineError", async () => {
      const cause = new Error("corrupt model");
      const engine = new RecommendationEngine(
        createBrokenContext({
          vectors: [new Map()],
          isUsable: true,
          vectorize: () => {
            throw cause;
          },
        }),
        { logger: createSilentLogger() },
      );

      const error = await engine.getRecommendations("java").then(
        () => null,
        (err: unknown) => err,
      );

      expect(error).toBeInstanceOf(RecommendationEngineError);
      expect(error).toMatchObject({
        name: "RecommendationEngineError",
        message: "Failed to compute recommendations: corrupt model",
        cause,
      });
    });

    it("rejects a vector space that does not match the catalog", async () => {
      const engine = new RecommendationEngine(
        createBrokenContext({
          vectors: [new Map(), new Map()],
          isUsable: true,
          vectorize: () => new Map(),
        }),
        { logger: createSilentLogger() },
      );

      await expect(engine.getRecommendations("java")).rejects.toThrow(
        "Vector space has 2 rows for 1 catalog items",
      );
    });
  });

  describe("shipped catalog", () => {
    it("answers a Java hiring query within 40 minutes", async () => {
      const engine = createEngine(loadCatalogFromFile("data/assessments.json"));

      const recs = await engine.getRecommendations(
        "Hiring Java developers who collaborate with business teams. " +
          "Assessments should be completed in 40 minutes.",
      );
      const names = recs.map((r) => r.name);

      expect(recs).toHaveLength(10);
      expect(names).toContain("Core Java (Entry Level)");
      expect(names).toContain("Java 8 Features");
      expect(names).not.toContain("Core Java (Advanced Level)");
      for (const rec of recs) {
        expect(parseItemDuration(rec.duration)).toBeLessThanOrEqual(40);
      }
    });
  });
});

describe("clampMaxResults", () => {
  it.each([
    [undefined, 10],
    [Number.NaN, 10],
    [0, 1],
    [-3, 1],
    [3, 3],
    [3.7, 3],
    [25, 10],
  ])("maps %s to %s", (input, expected) => {
    expect(clampMaxResults(input)).toBe(expected);
  });
});

describe("roundSimilarity", () => {
  it("rounds to 4 decimals", () => {
    expect(roundSimilarity(0.123456)).toBe(0.1235);
    expect(roundSimilarity(0.44943)).toBe(0.4494);
    expect(roundSimilarity(1)).toBe(1);
    expect(roundSimilarity(0)).toBe(0);
  });
});
