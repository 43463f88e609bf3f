import type { NakshatraName } from "../panchang/names.js";

/**
 * Presiding deity / theme of each janma nakshatra, used as verse query tags.
 */
export const NAKSHATRA_THEME_TAGS: Readonly<Record<NakshatraName, readonly string[]>> = {
  Ashwini: ["healing", "vitality", "ashwini kumaras"],
  Bharani: ["transformation", "yama", "dharma"],
  Krittika: ["agni", "fire", "purification"],
  Rohini: ["moon", "devotion", "beauty"],
  Mrigashira: ["soma", "moon", "seeking"],
  Ardra: ["shiva", "rudra", "storm"],
  Punarvasu: ["aditi", "abundance", "home"],
  Pushya: ["brihaspati", "wisdom", "jupiter"],
  Ashlesha: ["serpent", "wisdom", "naga"],
  Magha: ["pitru", "ancestors", "royalty"],
  "Purva Phalguni": ["love", "devotion", "venus"],
  "Uttara Phalguni": ["grace", "aryaman"],
  Hasta: ["skill", "savitr", "sun"],
  Chitra: ["vishwakarma", "creation"],
  Swati: ["vayu", "wind", "freedom"],
  Vishakha: ["indra", "agni", "victory"],
  Anuradha: ["mitra", "friendship", "devotion"],
  Jyeshtha: ["indra", "protection", "elder"],
  Mula: ["nirriti", "dissolution"],
  "Purva Ashadha": ["apah", "waters"],
  "Uttara Ashadha": ["vishvedeva", "universal"],
  Shravana: ["vishnu", "listening"],
  Dhanishta: ["vasudeva", "rhythm"],
  Shatabhisha: ["varuna", "healing"],
  "Purva Bhadrapada": ["aja ekapada"],
  "Uttara Bhadrapada": ["ahir budhnya"],
  Revati: ["pushan", "nourishment"],
};

export const DEFAULT_NAKSHATRA_LIFESTYLE: readonly string[] = [
  "Keep a steady sleep and wake rhythm and one daily reflection practice.",
  "Favour sattvic food and avoid over-stimulation late in the evening.",
  "Do one deliberate act of service each week.",
];

export const NAKSHATRA_LIFESTYLE: Readonly<Partial<Record<NakshatraName, readonly string[]>>> = {
  Punarvasu: [
    "Keep mornings uncluttered; begin with a short prayer and fresh air.",
    "Tend the home: one small act of care for your living space each day.",
    "Prefer steady routines over sudden changes this week.",
  ],
  Magha: [
    "Light a lamp for your forefathers once this week and recall one of their stories.",
    "Carry responsibility with humility; lead by example rather than by rank.",
  ],
  Shravana: [
    "Listen more than you speak in one conversation each day.",
    "Spend ten minutes with a recitation or a recorded chant before sleep.",
  ],
  Ardra: [
    "Give restless energy a channel: a brisk walk or physical work before noon.",
    "Close the day with a few rounds of Om Namah Shivaya.",
  ],
};

export function nakshatraThemeTags(name: NakshatraName): string[] {
  return [...NAKSHATRA_THEME_TAGS[name]];
}

export function nakshatraLifestyle(name: NakshatraName): string[] {
  return [...(NAKSHATRA_LIFESTYLE[name] ?? DEFAULT_NAKSHATRA_LIFESTYLE)];
}
