import fs from "node:fs";
import path from "node:path";
import { CorpusEmptyError } from "../../astro/errors.js";
import { VerseRecordSchema, type VerseRecord } from "./schema/verse.schema.js";

export const DEFAULT_CORPUS_PATH = "data/verses.json";

/**
 * Load the verse corpus from a JSON array file.
 *
 * Records keep their file order, which is the recommender's tie-break order.
 * Relative paths resolve against the working directory.
 */
export function loadVerseCorpus(corpusPath: string = DEFAULT_CORPUS_PATH): VerseRecord[] {
  const fullPath = path.resolve(corpusPath);

  let raw: string;
  try {
    raw = fs.readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new Error(
      `Verse corpus not found at ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse verse corpus JSON (${fullPath}): ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`Verse corpus ${fullPath} must be a JSON array`);
  }

  const corpus: VerseRecord[] = [];
  const seenIds = new Set<string>();

  parsed.forEach((entry: unknown, position: number) => {
    const result = VerseRecordSchema.safeParse(entry);
    if (!result.success) {
      throw new Error(
        `Verse schema validation failed for entry ${position} in ${fullPath}: ${result.error.message}`
      );
    }
    if (seenIds.has(result.data.id)) {
      throw new Error(`Duplicate verse id "${result.data.id}" in ${fullPath}`);
    }
    seenIds.add(result.data.id);
    corpus.push(result.data);
  });

  if (corpus.length === 0) {
    throw new CorpusEmptyError(fullPath);
  }

  return corpus;
}
