import { describe, expect, it } from "vitest";
import type { Observance } from "../../observances/schema/observance.schema.js";
import { dayQueryTags, observanceTags } from "../queryTags.js";

function observance(name: Observance["name"], tags: string[]): Observance {
  return { name, deity: "", description: "", tags, date: "2025-03-10", tithi_index: 1, kshaya: false };
}

const panchang = (tithi: string, nakshatra: string) => ({
  tithi: { index: 1, name: tithi, paksha: "Shukla" as const },
  nakshatra: { index: 1, name: nakshatra },
});

describe("dayQueryTags", () => {
  it("uses observance tags when the day has any", () => {
    const tags = dayQueryTags(panchang("Ekadashi", "Rohini"), [
      observance("Ekadashi", ["ekadashi", "vishnu"]),
      observance("Pradosham", ["shiva", "vishnu"]),
    ]);
    expect(tags).toEqual(["ekadashi", "vishnu", "shiva"]);
  });

  it("uses the tithi theme otherwise", () => {
    expect(dayQueryTags(panchang("Trayodashi", "Rohini"), [])).toEqual(["shiva", "pradosham"]);
  });

  it("falls back to tithi, nakshatra and dharma", () => {
    expect(dayQueryTags(panchang("Saptami", "Rohini"), [])).toEqual(["Saptami", "Rohini", "dharma"]);
  });
});

describe("observanceTags", () => {
  it("is the ordered union across days", () => {
    expect(
      observanceTags([[observance("Ekadashi", ["a", "b"])], [], [observance("Purnima", ["b", "c"])]])
    ).toEqual(["a", "b", "c"]);
  });
});
