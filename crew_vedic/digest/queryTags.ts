import type { PanchangDay } from "../../astro/schemas/panchang.schema.js";
import type { ObservanceSet } from "../observances/schema/observance.schema.js";

/**
 * Theme tags for days that carry no observance, keyed by tithi name.
 * Tithis not listed fall back to their own name, the nakshatra and "dharma".
 */
export const TITHI_THEME_TAGS: Readonly<Record<string, readonly string[]>> = {
  Pratipada: ["ganesha", "beginning", "auspicious"],
  Chaturthi: ["ganesha", "chaturthi", "obstacles"],
  Ekadashi: ["vishnu", "ekadashi", "devotion"],
  Dwadashi: ["vishnu", "devotion"],
  Trayodashi: ["shiva", "pradosham"],
  Purnima: ["full moon", "devotion"],
  Amavasya: ["pitru", "ancestors", "amavasya", "tarpanam"],
};

function unique(tags: Iterable<string>): string[] {
  return [...new Set(tags)];
}

export function observanceTags(observances: Iterable<ObservanceSet>): string[] {
  const tags: string[] = [];
  for (const set of observances) {
    for (const observance of set) tags.push(...observance.tags);
  }
  return unique(tags);
}

export function dayQueryTags(
  day: Pick<PanchangDay, "tithi" | "nakshatra">,
  observances: ObservanceSet
): string[] {
  if (observances.length > 0) {
    return observanceTags([observances]);
  }
  const theme = TITHI_THEME_TAGS[day.tithi.name];
  if (theme) return [...theme];
  return [day.tithi.name, day.nakshatra.name, "dharma"];
}
