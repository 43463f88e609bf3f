/**
 * Traditional names for the panchang limbs, indexed from 1.
 * Telugu/Amanta usage; spelling follows common transliteration without diacritics.
 */

export const TITHI_NAMES = [
  "Pratipada", "Dwitiya", "Tritiya", "Chaturthi", "Panchami",
  "Shashthi", "Saptami", "Ashtami", "Navami", "Dashami",
  "Ekadashi", "Dwadashi", "Trayodashi", "Chaturdashi", "Purnima",
  "Pratipada", "Dwitiya", "Tritiya", "Chaturthi", "Panchami",
  "Shashthi", "Saptami", "Ashtami", "Navami", "Dashami",
  "Ekadashi", "Dwadashi", "Trayodashi", "Chaturdashi", "Amavasya",
] as const;

export const NAKSHATRA_NAMES = [
  "Ashwini", "Bharani", "Krittika", "Rohini", "Mrigashira",
  "Ardra", "Punarvasu", "Pushya", "Ashlesha", "Magha",
  "Purva Phalguni", "Uttara Phalguni", "Hasta", "Chitra", "Swati",
  "Vishakha", "Anuradha", "Jyeshtha", "Mula", "Purva Ashadha",
  "Uttara Ashadha", "Shravana", "Dhanishta", "Shatabhisha",
  "Purva Bhadrapada", "Uttara Bhadrapada", "Revati",
] as const;

export const YOGA_NAMES = [
  "Vishkambha", "Priti", "Ayushman", "Saubhagya", "Shobhana",
  "Atiganda", "Sukarma", "Dhriti", "Shula", "Ganda",
  "Vriddhi", "Dhruva", "Vyaghata", "Harshana", "Vajra",
  "Siddhi", "Vyatipata", "Variyan", "Parigha", "Shiva",
  "Siddha", "Sadhya", "Shubha", "Shukla", "Brahma",
  "Indra", "Vaidhriti",
] as const;

export const KARANA_NAMES = [
  "Bava", "Balava", "Kaulava", "Taitila", "Garaja",
  "Vanija", "Vishti", "Shakuni", "Chatushpada", "Nagava", "Kimstughna",
] as const;

export const RASHI_NAMES = [
  "Mesha", "Vrishabha", "Mithuna", "Karka", "Simha", "Kanya",
  "Tula", "Vrishchika", "Dhanu", "Makara", "Kumbha", "Meena",
] as const;

// 0 = Sunday
export const VAARA_NAMES = [
  "Ravivara", "Somavara", "Mangalavara", "Budhavara",
  "Guruvara", "Shukravara", "Shanivara",
] as const;

export type NakshatraName = (typeof NAKSHATRA_NAMES)[number];

function nameAt<T extends string>(names: readonly T[], index: number, kind: string): T {
  const name = names[index - 1];
  if (name === undefined) {
    throw new RangeError(`${kind} index out of range: ${index}`);
  }
  return name;
}

export const tithiName = (index: number) => nameAt(TITHI_NAMES, index, "Tithi");
export const nakshatraName = (index: number) => nameAt(NAKSHATRA_NAMES, index, "Nakshatra");
export const yogaName = (index: number) => nameAt(YOGA_NAMES, index, "Yoga");
export const karanaName = (index: number) => nameAt(KARANA_NAMES, index, "Karana");
export const rashiName = (index: number) => nameAt(RASHI_NAMES, index, "Rashi");

export function vaaraName(weekday: number): (typeof VAARA_NAMES)[number] {
  return nameAt(VAARA_NAMES, weekday + 1, "Weekday");
}

/**
 * Resolve a 1-based index or a traditional name (case-insensitive) to an index.
 * Returns null when the value matches nothing.
 */
export function resolveNamedIndex(
  names: readonly string[],
  value: number | string
): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 1 && value <= names.length ? value : null;
  }
  const wanted = value.trim().toLowerCase();
  const position = names.findIndex((name) => name.toLowerCase() === wanted);
  return position === -1 ? null : position + 1;
}
