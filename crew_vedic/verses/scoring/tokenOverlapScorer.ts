import type { VerseRecord } from "../schema/verse.schema.js";
import { normalizeText } from "../textNormalization.js";
import { verseTagTokens, type VerseScorer } from "./verseScorer.js";

/** Shorter tokens match inside too many unrelated words */
const MIN_SUBSTRING_TOKEN_LENGTH = 3;

/**
 * Keyword backend.
 *
 * Score = number of query tokens found in the verse tags. When there is no
 * tag overlap, query tokens appearing inside the meaning/theme text count as
 * hits / (query size + 1), which always stays below a single tag match.
 */
export function createTokenOverlapScorer(): VerseScorer {
  return {
    backend: "keyword",

    score(queryTokens: ReadonlySet<string>, verse: VerseRecord): number {
      if (queryTokens.size === 0) return 0;

      const tagTokens = verseTagTokens(verse);
      let overlap = 0;
      for (const token of queryTokens) {
        if (tagTokens.has(token)) overlap++;
      }
      if (overlap > 0) return overlap;

      const text = normalizeText(`${verse.meaning} ${verse.theme}`);
      let hits = 0;
      for (const token of queryTokens) {
        if (token.length >= MIN_SUBSTRING_TOKEN_LENGTH && text.includes(token)) hits++;
      }
      return hits / (queryTokens.size + 1);
    },
  };
}
