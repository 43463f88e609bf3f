import type { MatchingBackend } from "../schema/verse.schema.js";
import { createTokenOverlapScorer } from "./tokenOverlapScorer.js";
import type { VerseScorer } from "./verseScorer.js";
import { createVectorSimilarityScorer } from "./vectorSimilarityScorer.js";

export function createVerseScorer(backend: MatchingBackend): VerseScorer {
  switch (backend) {
    case "keyword":
      return createTokenOverlapScorer();
    case "vector":
      return createVectorSimilarityScorer();
  }
}
