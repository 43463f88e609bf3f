import type { MatchingBackend, VerseRecord } from "../schema/verse.schema.js";
import { tokenize } from "../textNormalization.js";

/**
 * Scoring capability shared by the matching backends.
 *
 * Scores must be >= 0, deterministic for identical inputs and monotone in
 * relevance. Zero means "no match".
 */
export interface VerseScorer {
  readonly backend: MatchingBackend;
  score(queryTokens: ReadonlySet<string>, verse: VerseRecord): number;
}

const tagTokenCache = new WeakMap<VerseRecord, ReadonlySet<string>>();

/**
 * Normalized tokens of a verse's own tags (memoized per record).
 */
export function verseTagTokens(verse: VerseRecord): ReadonlySet<string> {
  const cached = tagTokenCache.get(verse);
  if (cached) return cached;
  const tokens = new Set(verse.tags.flatMap((tag) => tokenize(tag)));
  tagTokenCache.set(verse, tokens);
  return tokens;
}
