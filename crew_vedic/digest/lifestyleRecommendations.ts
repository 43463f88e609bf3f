import type { PanchangDay } from "../../astro/schemas/panchang.schema.js";
import type { ObservanceSet } from "../observances/schema/observance.schema.js";

export const MAX_LIFESTYLE_RECOMMENDATIONS = 5;

export const DAILY_ANCHOR_RECOMMENDATION =
  "Daily anchor: keep the first hour after sunrise free of screens and notifications.";

/**
 * Short practical suggestions for the week, driven by its observances and
 * weekdays. The daily anchor is always last; the list never exceeds five.
 */
export function buildLifestyleRecommendations(
  days: readonly Pick<PanchangDay, "tithi" | "vaara">[],
  observances: readonly ObservanceSet[]
): string[] {
  const names = new Set(observances.flatMap((set) => set.map((o) => o.name)));
  const hasTithi = (name: string) => days.some((day) => day.tithi.name === name);
  const hasVaara = (name: string) => days.some((day) => day.vaara === name);

  const recs: string[] = [];

  if (names.has("Amavasya")) {
    recs.push("Amavasya week: set aside quiet time for reflection and gratitude toward your ancestors.");
  }
  if (names.has("Ekadashi")) {
    recs.push("Ekadashi: keep meals light and sattvic, drink plenty of water and add a few rounds of japa.");
  }
  if (names.has("Pradosham")) {
    recs.push("Pradosham: pause at twilight for a lamp, a short Shiva prayer or a few minutes of stillness.");
  }
  if (names.has("Sankashti Chaturthi") || hasTithi("Chaturthi")) {
    recs.push("Chaturthi: close one pending task and clear one source of clutter.");
  }
  if (names.has("Purnima")) {
    recs.push("Purnima: spend a few minutes under the evening moon and offer thanks for what is complete.");
  }
  if (hasVaara("Somavara")) {
    recs.push("Somavara: open the week with a short sankalpa and ten minutes of silence.");
  }
  if (hasVaara("Guruvara")) {
    recs.push("Guruvara: make time for study, for asking guidance, or for teaching someone one thing.");
  }

  return [...recs.slice(0, MAX_LIFESTYLE_RECOMMENDATIONS - 1), DAILY_ANCHOR_RECOMMENDATION];
}
