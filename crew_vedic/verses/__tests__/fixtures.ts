import type { VerseRecord } from "../schema/verse.schema.js";

export function verse(id: string, tags: string[], meaning = `Meaning of ${id}.`, theme = ""): VerseRecord {
  return {
    id,
    devanagari: `देव ${id}`,
    transliteration: `deva ${id}`,
    meaning,
    theme,
    source: `Test Source ${id}`,
    tags,
  };
}

export const TEST_CORPUS: VerseRecord[] = [
  verse("v-general", ["general", "karma"], "Act without attachment to results.", "Karma"),
  verse("v-vishnu", ["vishnu", "ekadashi", "fasting"], "The preserver keeps those who remember him.", "Preserver"),
  verse("v-shiva", ["shiva", "pradosham"], "The three-eyed lord frees us from bondage.", "Rudra"),
  verse("v-moon", ["purnima", "full moon"], "That is whole and this is whole.", "Fullness"),
  verse("v-ganesha", ["ganesha", "beginning"], "Remove obstacles from every undertaking.", "Vinayaka"),
];
