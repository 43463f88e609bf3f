import { describe, expect, it } from "vitest";
import { createVerseScorer } from "../scoring/createVerseScorer.js";
import { createTokenOverlapScorer } from "../scoring/tokenOverlapScorer.js";
import {
  cosineSimilarity,
  createVectorSimilarityScorer,
  embedTokens,
} from "../scoring/vectorSimilarityScorer.js";
import { verseTagTokens } from "../scoring/verseScorer.js";
import { verse } from "./fixtures.js";

const tokens = (...values: string[]) => new Set(values);

describe("verseTagTokens", () => {
  it("splits multi-word tags and memoizes per record", () => {
    const v = verse("v1", ["Full Moon", "Pūrṇimā"]);
    const first = verseTagTokens(v);
    expect([...first].sort()).toEqual(["full", "moon", "purnima"]);
    expect(verseTagTokens(v)).toBe(first);
  });
});

describe("token overlap scorer", () => {
  const scorer = createTokenOverlapScorer();

  it("counts query tokens found in the verse tags", () => {
    const v = verse("v1", ["shiva", "pradosham", "rudra"]);
    expect(scorer.score(tokens("shiva", "pradosham", "twilight"), v)).toBe(2);
  });

  it("falls back to substring hits in meaning and theme, kept below one", () => {
    const v = verse("v1", ["karma"], "Remembering the ancestors with water offerings.", "Pitrus");
    // "ancestors" and "pitru" (inside "pitrus") hit; "amavasya" does not
    expect(scorer.score(tokens("ancestors", "pitru", "amavasya"), v)).toBe(2 / 4);
  });

  it("ignores substring hits shorter than three characters", () => {
    const v = verse("v1", ["karma"], "om shanti", "");
    expect(scorer.score(tokens("om"), v)).toBe(0);
  });

  it("scores an empty query as zero", () => {
    expect(scorer.score(tokens(), verse("v1", ["karma"]))).toBe(0);
  });
});

describe("vector similarity scorer", () => {
  it("cosine of identical bags is one and of empty bags zero", () => {
    const a = embedTokens(["vishnu", "devotion"]);
    expect(cosineSimilarity(a, embedTokens(["devotion", "vishnu"]))).toBeCloseTo(1, 10);
    expect(cosineSimilarity(a, embedTokens([]))).toBe(0);
  });

  it("weights repeated tokens by count", () => {
    const a = embedTokens(["agni", "soma"]);
    const b = embedTokens(["soma", "vayu", "vayu"]);
    expect(b.get("vayu")).toBe(2);
    // dot 1, norms sqrt(2) and sqrt(5)
    expect(cosineSimilarity(a, b)).toBeCloseTo(1 / Math.sqrt(10), 12);
  });

  it("scores exactly zero when no token is shared", () => {
    const scorer = createVectorSimilarityScorer();
    const v = verse("v1", ["shiva", "pradosham"], "The lord of the mountain.", "Rudra");
    for (const word of ["qwxz", "xylophone", "quux", "plugh"]) {
      expect(scorer.score(tokens(word), v)).toBe(0);
    }
  });

  it("ranks the verse sharing more vocabulary higher", () => {
    const scorer = createVectorSimilarityScorer();
    const query = tokens("vishnu", "ekadashi", "fasting");
    const close = verse("close", ["vishnu", "ekadashi", "fasting"], "x", "");
    const far = verse("far", ["shiva"], "the lord of the mountain", "");

    expect(scorer.score(query, close)).toBeGreaterThan(scorer.score(query, far));
    expect(scorer.score(query, close)).toBeLessThanOrEqual(1);
  });

  it("is deterministic across scorer instances", () => {
    const v = verse("v1", ["shiva", "pradosham"]);
    const query = tokens("shiva", "twilight");
    expect(createVectorSimilarityScorer().score(query, v)).toBe(
      createVectorSimilarityScorer().score(query, v)
    );
  });
});

describe("createVerseScorer", () => {
  it("selects the backend by name", () => {
    expect(createVerseScorer("keyword").backend).toBe("keyword");
    expect(createVerseScorer("vector").backend).toBe("vector");
  });
});
