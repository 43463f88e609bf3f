import * as Astronomy from "astronomy-engine";
import type { EphemerisProvider, ProviderLongitudes, ProviderRiseSet } from "./ephemerisAdapter.js";

/**
 * Default ephemeris provider backed by astronomy-engine.
 *
 * Longitudes are geocentric, ecliptic of date (tropical). Rise/set times use
 * the library's standard refraction and upper-limb convention.
 */

const DAYS_PER_JULIAN_CENTURY = 36525;

/**
 * Mean obliquity of the ecliptic (IAU 1980 leading terms), degrees.
 */
function meanObliquityDeg(date: Date): number {
  const t = Astronomy.MakeTime(date).tt / DAYS_PER_JULIAN_CENTURY;
  return 23.439291 - 0.0130042 * t - 1.64e-7 * t * t + 5.04e-7 * t * t * t;
}

export function createAstronomyEngineProvider(): EphemerisProvider {
  return {
    engine: "astronomy-engine",

    eclipticLongitudes(instant: Date, _latitude: number, _longitude: number): ProviderLongitudes {
      const sun = Astronomy.SunPosition(instant);
      const moon = Astronomy.EclipticGeoMoon(instant);
      return {
        sun_longitude: sun.elon,
        moon_longitude: moon.lon,
        obliquity: meanObliquityDeg(instant),
      };
    },

    riseSet(dayStart: Date, latitude: number, longitude: number): ProviderRiseSet {
      const observer = new Astronomy.Observer(latitude, longitude, 0);
      const sunrise = Astronomy.SearchRiseSet(Astronomy.Body.Sun, observer, +1, dayStart, 1);
      const sunset = Astronomy.SearchRiseSet(
        Astronomy.Body.Sun,
        observer,
        -1,
        sunrise ? sunrise.date : dayStart,
        1
      );
      return {
        sunrise: sunrise ? sunrise.date : null,
        sunset: sunset ? sunset.date : null,
      };
    },
  };
}
