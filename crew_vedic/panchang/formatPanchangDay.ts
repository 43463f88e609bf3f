import type { PanchangDay } from "../../astro/schemas/panchang.schema.js";

/**
 * One-line summary:
 * "2025-10-21 (Mangalavara) | Krishna Amavasya | Chitra | Yoga Vishkambha | Karana Chatushpada | Sunrise 07:14"
 */
export function formatPanchangDay(day: PanchangDay): string {
  const parts = [
    `${day.date} (${day.vaara})`,
    `${day.tithi.paksha} ${day.tithi.name}`,
    day.nakshatra.name,
    `Yoga ${day.yoga.name}`,
    `Karana ${day.karana.name}`,
    `Sunrise ${day.sunrise_local}`,
  ];
  const line = parts.join(" | ");
  if (!day.skipped_tithi) return line;
  return `${line} | Kshaya ${day.skipped_tithi.paksha} ${day.skipped_tithi.name}`;
}
