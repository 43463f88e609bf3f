/**
 * Layer 1 — Panchang Calculator
 *
 * Fixes a day's tithi, nakshatra, yoga and karana at local sunrise, the
 * nominal start of the Hindu day. A day also needs the next day's sunrise
 * tithi, so a range of N days reads N + 1 sunrises. Errors from the ephemeris
 * adapter propagate unchanged.
 */

import {
  pakshaForTithi,
  zodiacalPositionsToCalendarIndices,
  type CalendarIndices,
} from "../../astro/computeCalendarIndices.js";
import type { EphemerisAdapter } from "../../astro/ephemeris/ephemerisAdapter.js";
import { addDays, formatLocalTime, weekdayOf } from "../../astro/localDate.js";
import type { CelestialPosition, GeoLocation, PanchangDay, Tithi } from "../../astro/schemas/panchang.schema.js";
import {
  karanaName,
  nakshatraName,
  tithiName,
  vaaraName,
  yogaName,
} from "./names.js";

function tithiOf(index: number): Tithi {
  return { index, name: tithiName(index), paksha: pakshaForTithi(index) };
}

/**
 * A tithi that starts after this sunrise and ends before the next one never
 * owns a sunrise. It shows up as a jump of two between consecutive days.
 */
export function skippedTithiBetween(todayTithi: number, nextTithi: number): number | null {
  const gap = (nextTithi - todayTithi + 30) % 30;
  if (gap !== 2) return null;
  return (todayTithi % 30) + 1;
}

interface SunriseReading {
  date: string;
  sunrise: Date;
  sunset: Date;
  position: CelestialPosition;
  indices: CalendarIndices;
}

function readAtSunrise(date: string, location: GeoLocation, ephemeris: EphemerisAdapter): SunriseReading {
  const { sunrise, sunset } = ephemeris.sunriseSunset(date, location);
  const position = ephemeris.positions(sunrise, location);
  const indices = zodiacalPositionsToCalendarIndices(
    position.sun_longitude,
    position.moon_longitude,
    position.ayanamsa
  );
  return { date, sunrise, sunset, position, indices };
}

function panchangFromReadings(
  today: SunriseReading,
  next: SunriseReading,
  location: GeoLocation
): PanchangDay {
  const { date, sunrise, sunset, position, indices } = today;
  const skipped = skippedTithiBetween(indices.tithi, next.indices.tithi);
  const weekday = weekdayOf(date);

  return {
    date,
    weekday,
    vaara: vaaraName(weekday),
    location,
    sunrise: sunrise.toISOString(),
    sunset: sunset.toISOString(),
    sunrise_local: formatLocalTime(sunrise, location.utc_offset_hours),
    position,
    tithi: tithiOf(indices.tithi),
    skipped_tithi: skipped === null ? null : tithiOf(skipped),
    nakshatra: { index: indices.nakshatra, name: nakshatraName(indices.nakshatra) },
    yoga: { index: indices.yoga, name: yogaName(indices.yoga) },
    karana: { index: indices.karana, name: karanaName(indices.karana) },
  };
}

/**
 * Reads the following sunrise too, for kshaya detection.
 */
export function computePanchangDay(
  date: string,
  location: GeoLocation,
  ephemeris: EphemerisAdapter
): PanchangDay {
  const today = readAtSunrise(date, location, ephemeris);
  const next = readAtSunrise(addDays(date, 1), location, ephemeris);
  return panchangFromReadings(today, next, location);
}

/**
 * Consecutive panchang days in calendar order. Each sunrise is read once and
 * shared with the previous day's kshaya check, so the day after the range
 * must resolve as well. Fails on the first sunrise that cannot be computed.
 */
export function computePanchangRange(
  startDate: string,
  days: number,
  location: GeoLocation,
  ephemeris: EphemerisAdapter
): PanchangDay[] {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`days must be a positive integer, got ${days}`);
  }
  const result: PanchangDay[] = [];
  let today = readAtSunrise(startDate, location, ephemeris);
  for (let offset = 1; offset <= days; offset++) {
    const next = readAtSunrise(addDays(startDate, offset), location, ephemeris);
    result.push(panchangFromReadings(today, next, location));
    today = next;
  }
  return result;
}
