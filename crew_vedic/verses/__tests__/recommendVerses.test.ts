import { describe, expect, it } from "vitest";
import { CorpusEmptyError } from "../../../astro/errors.js";
import { recommendVerses, resolveDefaultVerse } from "../recommendVerses.js";
import { loadVerseCorpus } from "../loadVerseCorpus.js";
import { createTokenOverlapScorer } from "../scoring/tokenOverlapScorer.js";
import { createVectorSimilarityScorer } from "../scoring/vectorSimilarityScorer.js";
import { TEST_CORPUS, verse } from "./fixtures.js";

const UNRELATED_WORDS = ["qwxz", "xylophone", "quux", "plugh", "frobnicate"];

describe("recommendVerses", () => {
  it("ranks by overlap and reports the matched tags", () => {
    const [top] = recommendVerses({
      corpus: TEST_CORPUS,
      queryTags: ["ekadashi", "vishnu", "fasting", "devotion"],
      topK: 1,
    });

    expect(top).toEqual({
      verse: TEST_CORPUS[1],
      score: 3,
      query_tags: ["devotion", "ekadashi", "fasting", "vishnu"],
      matched_tags: ["ekadashi", "fasting", "vishnu"],
      fallback: false,
    });
  });

  it("breaks ties by corpus order", () => {
    const corpus = [verse("a", ["shiva"]), verse("b", ["shiva", "other"]), verse("c", ["shiva"])];
    const ids = recommendVerses({ corpus, queryTags: ["shiva"], topK: 3 }).map((r) => r.verse.id);
    expect(ids).toEqual(["a", "b", "c"]);
  });

  it("returns at most topK results, only scores above zero", () => {
    const results = recommendVerses({
      corpus: TEST_CORPUS,
      queryTags: ["shiva", "full moon"],
      topK: 5,
    });
    expect(results.map((r) => [r.verse.id, r.score])).toEqual([
      ["v-moon", 2],
      ["v-shiva", 1],
    ]);
  });

  it("is deterministic for the same inputs", () => {
    const input = { corpus: TEST_CORPUS, queryTags: ["ganesha", "shiva", "vishnu"], topK: 3 };
    expect(recommendVerses(input)).toEqual(recommendVerses(input));
  });

  it("falls back to the configured default verse when nothing matches", () => {
    const results = recommendVerses({
      corpus: TEST_CORPUS,
      queryTags: ["zzz"],
      topK: 3,
      defaultVerseId: "v-ganesha",
    });
    expect(results).toEqual([
      { verse: TEST_CORPUS[4], score: 0, query_tags: ["zzz"], matched_tags: [], fallback: true },
    ]);
  });

  it("falls back to the first verse without a configured default", () => {
    const [result] = recommendVerses({ corpus: TEST_CORPUS, queryTags: [], topK: 1 });
    expect(result?.verse.id).toBe("v-general");
    expect(result?.fallback).toBe(true);
  });

  it("rejects an unknown default even when something matches", () => {
    expect(() =>
      recommendVerses({
        corpus: TEST_CORPUS,
        queryTags: ["shiva"],
        topK: 1,
        defaultVerseId: "missing",
        corpusSource: "data/verses.json",
      })
    ).toThrow('Default verse "missing" not found in data/verses.json');
  });

  it("raises CorpusEmpty for an empty corpus", () => {
    expect(() => recommendVerses({ corpus: [], queryTags: ["shiva"], topK: 1 })).toThrow(
      CorpusEmptyError
    );
  });

  it("rejects topK below one", () => {
    expect(() => recommendVerses({ corpus: TEST_CORPUS, queryTags: ["shiva"], topK: 0 })).toThrow(
      RangeError
    );
  });

  it("works with the vector backend behind the same interface", () => {
    const [top] = recommendVerses({
      corpus: TEST_CORPUS,
      queryTags: ["pradosham", "shiva"],
      topK: 1,
      scorer: createVectorSimilarityScorer(),
    });
    expect(top?.verse.id).toBe("v-shiva");
    expect(top?.matched_tags).toEqual(["pradosham", "shiva"]);
  });
});

describe.each([
  { backend: "keyword", createScorer: createTokenOverlapScorer },
  { backend: "vector", createScorer: createVectorSimilarityScorer },
])("recommendVerses with the $backend backend", ({ createScorer }) => {
  it("falls back to the default verse when no tag overlaps", () => {
    const results = recommendVerses({
      corpus: TEST_CORPUS,
      queryTags: ["qwxz", "plugh"],
      topK: 3,
      defaultVerseId: "v-ganesha",
      scorer: createScorer(),
    });
    expect(results).toEqual([
      {
        verse: TEST_CORPUS[4],
        score: 0,
        query_tags: ["plugh", "qwxz"],
        matched_tags: [],
        fallback: true,
      },
    ]);
  });

  it.each(UNRELATED_WORDS)("returns the bundled default verse for %s", (word) => {
    const [result] = recommendVerses({
      corpus: loadVerseCorpus(),
      queryTags: [word],
      topK: 1,
      defaultVerseId: "bg-2.47",
      scorer: createScorer(),
    });
    expect(result?.verse.id).toBe("bg-2.47");
    expect(result?.fallback).toBe(true);
  });

  it("is deterministic for the same inputs", () => {
    const input = { corpus: TEST_CORPUS, queryTags: ["ganesha", "shiva", "vishnu"], topK: 3 };
    expect(recommendVerses({ ...input, scorer: createScorer() })).toEqual(
      recommendVerses({ ...input, scorer: createScorer() })
    );
  });

  it("ranks a verse with matching tags first", () => {
    const [top] = recommendVerses({
      corpus: TEST_CORPUS,
      queryTags: ["ganesha", "beginning"],
      topK: 1,
      scorer: createScorer(),
    });
    expect(top?.verse.id).toBe("v-ganesha");
    expect(top?.fallback).toBe(false);
  });
});

describe("resolveDefaultVerse", () => {
  it("names the corpus source in CorpusEmpty errors", () => {
    expect(() => resolveDefaultVerse([], null, "empty.json")).toThrow(
      "No verse records available in empty.json"
    );
  });
});
