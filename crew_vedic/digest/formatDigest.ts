import { formatPanchangDay } from "../panchang/formatPanchangDay.js";
import type { RecommendationResult } from "../verses/schema/verse.schema.js";
import type { WeeklyDigest } from "./schema/weeklyDigest.schema.js";

function indentLines(text: string, prefix: string): string[] {
  return text.split("\n").map((line) => `${prefix}${line}`);
}

function verseLines(result: RecommendationResult, prefix: string): string[] {
  const { verse } = result;
  return [
    ...indentLines(verse.devanagari, prefix),
    ...indentLines(verse.transliteration, prefix),
    `${prefix}— ${verse.meaning} [${verse.source}]`,
  ];
}

/**
 * Plain-text rendering of a weekly digest.
 */
export function formatDigest(digest: WeeklyDigest): string {
  const place = digest.location.name ? ` (${digest.location.name})` : "";
  const lines: string[] = [
    "═══ Vedic Wisdom Weekly ═══",
    `Week: ${digest.week_start} → ${digest.week_end}${place}`,
    "",
    "Daily Panchang:",
    ...digest.days.map((day) => `  ${formatPanchangDay(day.panchang)}`),
    "",
  ];

  const observances = digest.days.flatMap((day) => day.observances);
  if (observances.length > 0) {
    lines.push("Observances This Week:");
    for (const o of observances) {
      const kshaya = o.kshaya ? " [kshaya tithi]" : "";
      lines.push(`  • ${o.date} — ${o.name} (${o.deity}): ${o.description}${kshaya}`);
    }
  } else {
    lines.push("No major observances this week.");
  }

  lines.push("", "Shloka by Tithi:");
  for (const day of digest.days) {
    const { panchang, recommendation } = day;
    lines.push(`  ${panchang.date} (${panchang.tithi.paksha} ${panchang.tithi.name})`);
    lines.push(...verseLines(recommendation, "    "));
  }

  lines.push("", "Verse of the Week:", ...verseLines(digest.verse_of_week, "  "));

  if (digest.lifestyle_recommendations.length > 0) {
    lines.push("", "Lifestyle Recommendations:");
    lines.push(...digest.lifestyle_recommendations.map((rec) => `  • ${rec}`));
  }

  return lines.join("\n");
}
