import { recommendVerses } from "../verses/recommendVerses.js";
import type { VerseRecord } from "../verses/schema/verse.schema.js";
import { createTokenOverlapScorer } from "../verses/scoring/tokenOverlapScorer.js";
import type { VerseScorer } from "../verses/scoring/verseScorer.js";
import { cleanMeaning, stripDiacritics } from "../verses/textNormalization.js";
import { nakshatraLifestyle, nakshatraThemeTags } from "./nakshatraThemes.js";
import type { JanamPatri, JanamPatriReport } from "./schema/janamPatri.schema.js";

export const JANAM_PATRI_VERSE_COUNT = 5;

export interface JanamPatriReportOptions {
  scorer?: VerseScorer;
  defaultVerseId?: string | null;
  corpusSource?: string;
  topK?: number;
}

/**
 * Verses and lifestyle suggestions for a janma nakshatra.
 */
export function buildJanamPatriReport(
  patri: JanamPatri,
  corpus: readonly VerseRecord[],
  options: JanamPatriReportOptions = {}
): JanamPatriReport {
  const scorer = options.scorer ?? createTokenOverlapScorer();
  const themeTags = nakshatraThemeTags(patri.nakshatra.name);

  const verses = recommendVerses({
    corpus,
    queryTags: themeTags,
    topK: options.topK ?? JANAM_PATRI_VERSE_COUNT,
    scorer,
    defaultVerseId: options.defaultVerseId,
    corpusSource: options.corpusSource,
  });

  return {
    janam_patri: patri,
    matching_backend: scorer.backend,
    theme_tags: themeTags,
    verses,
    lifestyle_recommendations: nakshatraLifestyle(patri.nakshatra.name),
  };
}

export function formatJanamPatriReport(report: JanamPatriReport): string {
  const { janam_patri: patri } = report;
  const place = patri.birth.location.name ?? "Birth place";
  const lines = [
    "Janam Patri",
    `Birth: ${patri.birth.date} ${patri.birth.time} (${place})`,
    `Janma Nakshatra: ${patri.nakshatra.name} | Rashi: ${patri.rashi.name}`,
    `Theme: ${report.theme_tags.join(", ")}`,
    "",
    "Recommended verses:",
  ];

  report.verses.forEach((result, i) => {
    lines.push(
      `${i + 1}. ${result.verse.source}`,
      `   Transliteration: ${stripDiacritics(result.verse.transliteration)}`,
      `   Meaning: ${cleanMeaning(result.verse.meaning)}`
    );
  });

  if (report.lifestyle_recommendations.length > 0) {
    lines.push("", "Lifestyle guidance:");
    lines.push(...report.lifestyle_recommendations.map((rec) => `  • ${rec}`));
  }

  return lines.join("\n");
}
