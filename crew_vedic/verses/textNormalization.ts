/**
 * Text normalization for tag matching and display.
 */

/**
 * Lowercase, strip diacritics and punctuation, collapse whitespace.
 * "Pitṛ-tarpaṇam" → "pitr tarpanam"
 */
export function normalizeText(input: string): string {
  return input
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/[^\w\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(input: string): string[] {
  const normalized = normalizeText(input);
  return normalized ? normalized.split(" ") : [];
}

/**
 * Unique normalized tokens of a tag collection, sorted.
 */
export function normalizeTags(tags: Iterable<string>): string[] {
  const tokens = new Set<string>();
  for (const tag of tags) {
    for (const token of tokenize(tag)) tokens.add(token);
  }
  return [...tokens].sort();
}

/**
 * Transliteration with diacritics folded to plain ASCII-style text.
 */
export function stripDiacritics(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Drop a leading verse number such as "7.3 " and normalize spacing.
 */
export function cleanMeaning(text: string): string {
  return text.replace(/^\s*\d+\.\d+\s*/, "").replace(/\s+/g, " ").trim();
}
