import type { VerseRecord } from "../schema/verse.schema.js";
import { tokenize } from "../textNormalization.js";
import type { VerseScorer } from "./verseScorer.js";

/**
 * Vector backend: cosine similarity between sparse bag-of-words vectors.
 *
 * Verse vectors cover tags, meaning and theme; they are built once per record.
 * Dimensions are the tokens themselves, so a query sharing no token with a
 * verse scores exactly 0.
 */

export type TermVector = Map<string, number>;

export function embedTokens(tokens: Iterable<string>): TermVector {
  const vector: TermVector = new Map();
  for (const token of tokens) {
    vector.set(token, (vector.get(token) ?? 0) + 1);
  }
  return vector;
}

function squaredNorm(vector: TermVector): number {
  let sum = 0;
  for (const weight of vector.values()) sum += weight * weight;
  return sum;
}

export function cosineSimilarity(a: TermVector, b: TermVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [token, weight] of small) {
    dot += weight * (large.get(token) ?? 0);
  }
  if (dot === 0) return 0;
  return dot / Math.sqrt(squaredNorm(a) * squaredNorm(b));
}

export function createVectorSimilarityScorer(): VerseScorer {
  const verseVectors = new WeakMap<VerseRecord, TermVector>();

  const vectorFor = (verse: VerseRecord): TermVector => {
    const cached = verseVectors.get(verse);
    if (cached) return cached;
    const tokens = [
      ...verse.tags.flatMap((tag) => tokenize(tag)),
      ...tokenize(verse.meaning),
      ...tokenize(verse.theme),
    ];
    const vector = embedTokens(tokens);
    verseVectors.set(verse, vector);
    return vector;
  };

  return {
    backend: "vector",

    score(queryTokens: ReadonlySet<string>, verse: VerseRecord): number {
      if (queryTokens.size === 0) return 0;
      return cosineSimilarity(embedTokens(queryTokens), vectorFor(verse));
    },
  };
}
