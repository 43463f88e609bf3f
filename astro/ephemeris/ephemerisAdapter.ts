/**
 * Ephemeris Adapter
 *
 * Wraps an external ephemeris provider and turns whatever it returns into
 * normalized CelestialPosition values and local sunrise/sunset instants.
 *
 * IMPORTANT:
 * - Never substitutes a default position. Any provider failure or invalid
 *   value raises EphemerisUnavailableError.
 * - A date without sunrise or sunset at the location raises InvalidDateError.
 */

import { normalizeDegrees } from "../computeCalendarIndices.js";
import { EphemerisUnavailableError, InvalidDateError } from "../errors.js";
import { localMidnightUtc } from "../localDate.js";
import type { CelestialPosition, GeoLocation } from "../schemas/panchang.schema.js";

export interface ProviderLongitudes {
  sun_longitude: number;
  moon_longitude: number;
  obliquity: number;
}

export interface ProviderRiseSet {
  sunrise: Date | null;
  sunset: Date | null;
}

/**
 * Boundary contract of the external ephemeris library.
 */
export interface EphemerisProvider {
  readonly engine: string;
  eclipticLongitudes(instant: Date, latitude: number, longitude: number): ProviderLongitudes;
  /** Next sunrise after `dayStart` and the sunset that follows it */
  riseSet(dayStart: Date, latitude: number, longitude: number): ProviderRiseSet;
}

export type Zodiac = "sidereal" | "tropical";

export interface SunriseSunset {
  sunrise: Date;
  sunset: Date;
}

export interface EphemerisAdapter {
  readonly engine: string;
  readonly zodiac: Zodiac;
  positions(moment: Date, location: GeoLocation): CelestialPosition;
  sunriseSunset(date: string, location: GeoLocation): SunriseSunset;
}

export interface EphemerisAdapterOptions {
  zodiac?: Zodiac;
}

const MS_PER_DAY = 86_400_000;
const J2000_MS = Date.UTC(2000, 0, 1, 12, 0, 0);
const MS_PER_JULIAN_YEAR = 365.25 * MS_PER_DAY;

/**
 * Lahiri (Chitrapaksha) ayanamsa, linear precession model anchored at J2000.
 */
const LAHIRI_AT_J2000_DEG = 23.853;
const PRECESSION_DEG_PER_YEAR = 50.2788 / 3600;

export function lahiriAyanamsa(moment: Date): number {
  const years = (moment.getTime() - J2000_MS) / MS_PER_JULIAN_YEAR;
  return normalizeDegrees(LAHIRI_AT_J2000_DEG + years * PRECESSION_DEG_PER_YEAR);
}

function isValidInstant(value: unknown): value is Date {
  return value instanceof Date && Number.isFinite(value.getTime());
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function requireFiniteDegrees(engine: string, field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new EphemerisUnavailableError(
      `${engine} returned invalid ${field}: ${String(value)}`
    );
  }
  return value;
}

export function createEphemerisAdapter(
  provider: EphemerisProvider,
  options: EphemerisAdapterOptions = {}
): EphemerisAdapter {
  const engine = provider.engine;
  const zodiac: Zodiac = options.zodiac ?? "sidereal";

  function positions(moment: Date, location: GeoLocation): CelestialPosition {
    if (!isValidInstant(moment)) {
      throw new InvalidDateError(String(moment), "Invalid moment passed to ephemeris");
    }

    let raw: ProviderLongitudes;
    try {
      raw = provider.eclipticLongitudes(moment, location.latitude, location.longitude);
    } catch (err) {
      throw new EphemerisUnavailableError(
        `${engine} failed to compute positions at ${moment.toISOString()}: ${describe(err)}`,
        { cause: err }
      );
    }

    if (!raw || typeof raw !== "object") {
      throw new EphemerisUnavailableError(`${engine} returned no positions`);
    }

    return {
      sun_longitude: normalizeDegrees(requireFiniteDegrees(engine, "sun_longitude", raw.sun_longitude)),
      moon_longitude: normalizeDegrees(requireFiniteDegrees(engine, "moon_longitude", raw.moon_longitude)),
      ayanamsa: zodiac === "sidereal" ? lahiriAyanamsa(moment) : 0,
      obliquity: requireFiniteDegrees(engine, "obliquity", raw.obliquity),
    };
  }

  function sunriseSunset(date: string, location: GeoLocation): SunriseSunset {
    const dayStart = localMidnightUtc(date, location.utc_offset_hours);
    const dayEnd = dayStart.getTime() + MS_PER_DAY;

    let raw: ProviderRiseSet;
    try {
      raw = provider.riseSet(dayStart, location.latitude, location.longitude);
    } catch (err) {
      throw new EphemerisUnavailableError(
        `${engine} failed to compute sunrise for ${date}: ${describe(err)}`,
        { cause: err }
      );
    }

    if (!raw || typeof raw !== "object") {
      throw new EphemerisUnavailableError(`${engine} returned no rise/set data for ${date}`);
    }

    const { sunrise, sunset } = raw;
    for (const [field, value] of [["sunrise", sunrise], ["sunset", sunset]] as const) {
      if (value !== null && !isValidInstant(value)) {
        throw new EphemerisUnavailableError(`${engine} returned invalid ${field} for ${date}`);
      }
    }

    if (sunrise === null || sunrise.getTime() >= dayEnd) {
      throw new InvalidDateError(
        date,
        `No sunrise on ${date} at latitude ${location.latitude}, longitude ${location.longitude}`
      );
    }
    if (sunset === null) {
      throw new InvalidDateError(
        date,
        `No sunset after sunrise on ${date} at latitude ${location.latitude}, longitude ${location.longitude}`
      );
    }

    return { sunrise, sunset };
  }

  return { engine, zodiac, positions, sunriseSunset };
}
