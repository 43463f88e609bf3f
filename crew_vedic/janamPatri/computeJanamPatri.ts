/**
 * Janam Patri Calculator
 *
 * Janma nakshatra and rashi from the Moon at the exact birth moment (not the
 * day's sunrise). A configured override is returned as-is without touching
 * the ephemeris. The birth moment is validated either way: it identifies the
 * record in reports and run keys. Override names are checked first.
 */

import {
  normalizeDegrees,
  zodiacalPositionsToCalendarIndices,
} from "../../astro/computeCalendarIndices.js";
import type { EphemerisAdapter } from "../../astro/ephemeris/ephemerisAdapter.js";
import { localDateTimeToUtc } from "../../astro/localDate.js";
import {
  NAKSHATRA_NAMES,
  RASHI_NAMES,
  nakshatraName,
  rashiName,
  resolveNamedIndex,
} from "../panchang/names.js";
import {
  JANAM_PATRI_SCHEMA_VERSION,
  type BirthDetails,
  type JanamPatri,
  type JanamPatriOverride,
} from "./schema/janamPatri.schema.js";

export class InvalidOverrideError extends Error {
  constructor(
    public field: "nakshatra" | "rashi",
    public value: number | string
  ) {
    super(`Unknown ${field} override: ${String(value)}`);
    this.name = "InvalidOverrideError";
  }
}

function resolveOverride(
  field: "nakshatra" | "rashi",
  names: readonly string[],
  value: number | string
): number {
  const index = resolveNamedIndex(names, value);
  if (index === null) {
    throw new InvalidOverrideError(field, value);
  }
  return index;
}

export function computeJanamPatri(
  birth: BirthDetails,
  ephemeris: EphemerisAdapter,
  override?: JanamPatriOverride | null
): JanamPatri {
  const { location } = birth;
  const resolved = override
    ? {
        nakshatra: resolveOverride("nakshatra", NAKSHATRA_NAMES, override.nakshatra),
        rashi: resolveOverride("rashi", RASHI_NAMES, override.rashi),
      }
    : null;

  const moment = localDateTimeToUtc(birth.date, birth.time, location.utc_offset_hours);
  const birthRecord = {
    date: birth.date,
    time: birth.time,
    utc_offset_hours: location.utc_offset_hours,
    moment: moment.toISOString(),
    location,
  };

  if (resolved) {
    return {
      schema_version: JANAM_PATRI_SCHEMA_VERSION,
      birth: birthRecord,
      nakshatra: { index: resolved.nakshatra, name: nakshatraName(resolved.nakshatra) },
      rashi: { index: resolved.rashi, name: rashiName(resolved.rashi) },
      moon_longitude: null,
      source: "override",
    };
  }

  const position = ephemeris.positions(moment, location);
  const indices = zodiacalPositionsToCalendarIndices(
    position.sun_longitude,
    position.moon_longitude,
    position.ayanamsa
  );

  return {
    schema_version: JANAM_PATRI_SCHEMA_VERSION,
    birth: birthRecord,
    nakshatra: { index: indices.nakshatra, name: nakshatraName(indices.nakshatra) },
    rashi: { index: indices.rashi, name: rashiName(indices.rashi) },
    moon_longitude: normalizeDegrees(position.moon_longitude - position.ayanamsa),
    source: "ephemeris",
  };
}
