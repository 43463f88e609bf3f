import { describe, expect, it } from "vitest";
import type { Observance } from "../../observances/schema/observance.schema.js";
import {
  buildLifestyleRecommendations,
  DAILY_ANCHOR_RECOMMENDATION,
} from "../lifestyleRecommendations.js";

function observance(name: Observance["name"]): Observance {
  return { name, deity: "", description: "", tags: [], date: "2025-03-10", tithi_index: 1, kshaya: false };
}

function day(tithiName: string, vaara: string) {
  return { tithi: { index: 1, name: tithiName, paksha: "Shukla" as const }, vaara };
}

describe("buildLifestyleRecommendations", () => {
  it("always ends with the daily anchor", () => {
    expect(buildLifestyleRecommendations([day("Dashami", "Budhavara")], [[]])).toEqual([
      DAILY_ANCHOR_RECOMMENDATION,
    ]);
  });

  it("follows the week's observances and weekdays in a fixed order", () => {
    const recs = buildLifestyleRecommendations(
      [day("Chaturthi", "Shanivara"), day("Amavasya", "Guruvara")],
      [[], [observance("Amavasya")]]
    );
    expect(recs.map((r) => r.split(":")[0])).toEqual([
      "Amavasya week",
      "Chaturthi",
      "Guruvara",
      "Daily anchor",
    ]);
  });

  it("never returns more than five", () => {
    const recs = buildLifestyleRecommendations(
      [day("Chaturthi", "Somavara"), day("Dashami", "Guruvara")],
      [[observance("Amavasya"), observance("Ekadashi"), observance("Pradosham")], [observance("Purnima")]]
    );
    expect(recs).toHaveLength(5);
    expect(recs.map((r) => r.split(":")[0])).toEqual([
      "Amavasya week",
      "Ekadashi",
      "Pradosham",
      "Chaturthi",
      "Daily anchor",
    ]);
  });
});
