/**
 * Pure functions for deriving calendar indices from Sun/Moon longitudes.
 * Layer 0: geometry only, no names and no observance rules.
 *
 * Shared by the panchang (positions at sunrise) and the janam patri
 * (positions at the birth moment).
 */

export type Paksha = "Shukla" | "Krishna";

export interface CalendarIndices {
  /** 1–30; 1–15 Shukla, 16–30 Krishna */
  tithi: number;
  paksha: Paksha;
  /** 1–27 */
  nakshatra: number;
  /** 1–27 */
  yoga: number;
  /** 1–11 */
  karana: number;
  /** 1–12 */
  rashi: number;
  /** Directed Moon − Sun separation in [0, 360) */
  elongation_deg: number;
}

const TITHI_SPAN_DEG = 12;
const KARANA_SPAN_DEG = 6;
const NAKSHATRA_SPAN_DEG = 360 / 27;
const RASHI_SPAN_DEG = 30;

/**
 * Normalize degrees to the [0, 360) range
 */
export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-15 + 360 rounds to 360
  return v >= 360 ? 0 : v;
}

/**
 * Directed elongation of the Moon from the Sun, 0–360.
 */
export function elongationDeg(sunLongitude: number, moonLongitude: number): number {
  return normalizeDegrees(moonLongitude - sunLongitude);
}

function segmentIndex(longitude: number, span: number, count: number): number {
  return Math.min(Math.floor(longitude / span), count - 1) + 1;
}

/**
 * Map a half-tithi number (0–59) onto the 11 karanas.
 *
 * The first half of Shukla Pratipada is Kimstughna (11) and the last three
 * halves of the month are Shakuni, Chatushpada and Nagava (8, 9, 10).
 * Everything in between cycles through the seven movable karanas (1–7).
 */
export function karanaFromHalfTithi(halfTithi: number): number {
  if (halfTithi === 0) return 11;
  if (halfTithi === 57) return 8;
  if (halfTithi === 58) return 9;
  if (halfTithi === 59) return 10;
  return ((halfTithi - 1) % 7) + 1;
}

export function pakshaForTithi(tithi: number): Paksha {
  return tithi <= 15 ? "Shukla" : "Krishna";
}

/**
 * Derive tithi, nakshatra, yoga, karana and rashi indices.
 *
 * @param ayanamsa - Sidereal correction subtracted from both longitudes before
 *   nakshatra, yoga and rashi are taken. Tithi and karana only depend on the
 *   Moon − Sun difference, so the correction cancels out for them.
 */
export function zodiacalPositionsToCalendarIndices(
  sunLongitude: number,
  moonLongitude: number,
  ayanamsa = 0
): CalendarIndices {
  const elongation = elongationDeg(sunLongitude, moonLongitude);
  const siderealSun = normalizeDegrees(sunLongitude - ayanamsa);
  const siderealMoon = normalizeDegrees(moonLongitude - ayanamsa);

  const tithi = segmentIndex(elongation, TITHI_SPAN_DEG, 30);
  const halfTithi = Math.min(Math.floor(elongation / KARANA_SPAN_DEG), 59);

  return {
    tithi,
    paksha: pakshaForTithi(tithi),
    nakshatra: segmentIndex(siderealMoon, NAKSHATRA_SPAN_DEG, 27),
    yoga: segmentIndex(normalizeDegrees(siderealSun + siderealMoon), NAKSHATRA_SPAN_DEG, 27),
    karana: karanaFromHalfTithi(halfTithi),
    rashi: segmentIndex(siderealMoon, RASHI_SPAN_DEG, 12),
    elongation_deg: elongation,
  };
}
