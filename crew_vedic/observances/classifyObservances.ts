/**
 * Observance Classifier
 *
 * Pure and total over tithi index + weekday. Output is index-aligned with the
 * input week.
 */

import type { PanchangDay } from "../../astro/schemas/panchang.schema.js";
import { OBSERVANCE_POLICY_V1, type ObservancePolicyV1, type ObservanceRule } from "./policy/observancePolicy.v1.js";
import type { Observance, ObservanceSet } from "./schema/observance.schema.js";

export type ClassifiableDay = Pick<PanchangDay, "date" | "weekday" | "tithi" | "skipped_tithi">;

function ruleMatches(rule: ObservanceRule, tithiIndex: number, weekday: number): boolean {
  if (!rule.tithi_indices.includes(tithiIndex)) return false;
  return rule.weekdays === undefined || rule.weekdays.includes(weekday);
}

function toObservance(rule: ObservanceRule, date: string, tithiIndex: number, kshaya: boolean): Observance {
  return {
    name: rule.name,
    deity: rule.deity,
    description: rule.description,
    tags: [...rule.tags],
    date,
    tithi_index: tithiIndex,
    kshaya,
  };
}

/**
 * Observances for one day. A skipped (kshaya) tithi is observed on the day
 * whose sunrise-to-sunrise span contains it.
 */
export function classifyDay(
  day: ClassifiableDay,
  policy: ObservancePolicyV1 = OBSERVANCE_POLICY_V1
): ObservanceSet {
  const candidates: Array<{ tithi: number; kshaya: boolean }> = [
    { tithi: day.tithi.index, kshaya: false },
  ];
  if (day.skipped_tithi) {
    candidates.push({ tithi: day.skipped_tithi.index, kshaya: true });
  }

  const result: ObservanceSet = [];
  const seen = new Set<string>();

  for (const rule of policy.rules) {
    for (const candidate of candidates) {
      if (seen.has(rule.name)) break;
      if (ruleMatches(rule, candidate.tithi, day.weekday)) {
        seen.add(rule.name);
        result.push(toObservance(rule, day.date, candidate.tithi, candidate.kshaya));
      }
    }
  }

  return result;
}

export function classifyObservances(
  week: readonly ClassifiableDay[],
  policy: ObservancePolicyV1 = OBSERVANCE_POLICY_V1
): ObservanceSet[] {
  return week.map((day) => classifyDay(day, policy));
}
