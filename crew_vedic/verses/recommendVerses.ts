/**
 * Verse Recommender
 *
 * Ranks corpus entries against a set of query tags. Output order is fully
 * determined by (corpus, query, backend): descending score, then corpus order.
 * When nothing scores above zero the default verse is returned, so every
 * caller always gets at least one verse.
 */

import { CorpusEmptyError } from "../../astro/errors.js";
import type { RecommendationResult, VerseRecord } from "./schema/verse.schema.js";
import { createTokenOverlapScorer } from "./scoring/tokenOverlapScorer.js";
import { verseTagTokens, type VerseScorer } from "./scoring/verseScorer.js";
import { normalizeTags } from "./textNormalization.js";

export interface RecommendVersesInput {
  corpus: readonly VerseRecord[];
  queryTags: Iterable<string>;
  topK: number;
  scorer?: VerseScorer;
  /** Verse returned when nothing matches; the first corpus entry when omitted */
  defaultVerseId?: string | null;
  /** Names the corpus in CorpusEmptyError messages */
  corpusSource?: string;
}

export function resolveDefaultVerse(
  corpus: readonly VerseRecord[],
  defaultVerseId?: string | null,
  corpusSource = "verse corpus"
): VerseRecord {
  const first = corpus[0];
  if (first === undefined) {
    throw new CorpusEmptyError(corpusSource);
  }
  if (defaultVerseId === undefined || defaultVerseId === null) {
    return first;
  }
  const configured = corpus.find((verse) => verse.id === defaultVerseId);
  if (!configured) {
    throw new Error(`Default verse "${defaultVerseId}" not found in ${corpusSource}`);
  }
  return configured;
}

function matchedTags(queryTags: readonly string[], verse: VerseRecord): string[] {
  const tagTokens = verseTagTokens(verse);
  return queryTags.filter((token) => tagTokens.has(token));
}

export function recommendVerses(input: RecommendVersesInput): RecommendationResult[] {
  const { corpus, topK } = input;
  const scorer = input.scorer ?? createTokenOverlapScorer();

  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be an integer >= 1, got ${topK}`);
  }

  // Resolved up front so a bad default fails even when something matches.
  const defaultVerse = resolveDefaultVerse(corpus, input.defaultVerseId, input.corpusSource);

  const queryTags = normalizeTags(input.queryTags);
  const queryTokens = new Set(queryTags);

  const ranked = corpus
    .map((verse, position) => ({ verse, position, score: scorer.score(queryTokens, verse) }))
    .filter((candidate) => candidate.score > 0)
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, topK);

  if (ranked.length === 0) {
    return [
      {
        verse: defaultVerse,
        score: 0,
        query_tags: queryTags,
        matched_tags: [],
        fallback: true,
      },
    ];
  }

  return ranked.map(({ verse, score }) => ({
    verse,
    score,
    query_tags: queryTags,
    matched_tags: matchedTags(queryTags, verse),
    fallback: false,
  }));
}
