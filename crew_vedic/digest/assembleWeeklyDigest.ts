/**
 * Layer 3 — Weekly Digest Assembler
 *
 * panchang (7 days) → observances → per-day verse → verse of the week.
 *
 * IMPORTANT:
 * - All-or-nothing: any day that fails to compute aborts the whole digest.
 * - The corpus and default verse are checked before any ephemeris work.
 */

import type { EphemerisAdapter } from "../../astro/ephemeris/ephemerisAdapter.js";
import { addDays } from "../../astro/localDate.js";
import type { GeoLocation } from "../../astro/schemas/panchang.schema.js";
import { classifyObservances } from "../observances/classifyObservances.js";
import { computePanchangRange } from "../panchang/computePanchangDay.js";
import { recommendVerses, resolveDefaultVerse } from "../verses/recommendVerses.js";
import type { RecommendationResult, VerseRecord } from "../verses/schema/verse.schema.js";
import { createTokenOverlapScorer } from "../verses/scoring/tokenOverlapScorer.js";
import type { VerseScorer } from "../verses/scoring/verseScorer.js";
import { buildLifestyleRecommendations } from "./lifestyleRecommendations.js";
import { dayQueryTags, observanceTags } from "./queryTags.js";
import {
  WEEKLY_DIGEST_SCHEMA_VERSION,
  type DigestDay,
  type WeeklyDigest,
} from "./schema/weeklyDigest.schema.js";

export const DAYS_PER_WEEK = 7;

export interface AssembleWeeklyDigestInput {
  /** First day of the week, YYYY-MM-DD */
  weekStart: string;
  location: GeoLocation;
  corpus: readonly VerseRecord[];
  ephemeris: EphemerisAdapter;
  scorer?: VerseScorer;
  defaultVerseId?: string | null;
  corpusSource?: string;
}

function topRecommendation(results: readonly RecommendationResult[]): RecommendationResult {
  const [top] = results;
  if (top === undefined) {
    throw new Error("Verse recommender returned no results");
  }
  return top;
}

export function assembleWeeklyDigest(input: AssembleWeeklyDigestInput): WeeklyDigest {
  const { weekStart, location, corpus, ephemeris } = input;
  const scorer = input.scorer ?? createTokenOverlapScorer();

  resolveDefaultVerse(corpus, input.defaultVerseId, input.corpusSource);

  const recommend = (queryTags: Iterable<string>) =>
    topRecommendation(
      recommendVerses({
        corpus,
        queryTags,
        topK: 1,
        scorer,
        defaultVerseId: input.defaultVerseId,
        corpusSource: input.corpusSource,
      })
    );

  const panchang = computePanchangRange(weekStart, DAYS_PER_WEEK, location, ephemeris);
  const observances = classifyObservances(panchang);

  const days: DigestDay[] = panchang.map((day, i) => {
    const dayObservances = observances[i] ?? [];
    return {
      panchang: day,
      observances: dayObservances,
      recommendation: recommend(dayQueryTags(day, dayObservances)),
    };
  });

  return {
    schema_version: WEEKLY_DIGEST_SCHEMA_VERSION,
    week_start: weekStart,
    week_end: addDays(weekStart, DAYS_PER_WEEK - 1),
    location,
    matching_backend: scorer.backend,
    days,
    verse_of_week: recommend(observanceTags(observances)),
    lifestyle_recommendations: buildLifestyleRecommendations(panchang, observances),
  };
}
