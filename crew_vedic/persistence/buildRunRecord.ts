import type { WeeklyDigest } from "../digest/schema/weeklyDigest.schema.js";
import type { JanamPatriReport } from "../janamPatri/schema/janamPatri.schema.js";
import {
  RECOMMENDATION_RUN_SCHEMA_VERSION,
  type RecommendationRunRecord,
} from "./schema/recommendationRun.schema.js";

export interface RunRecordOptions {
  corpusSize: number;
  generatedAt?: Date;
}

/**
 * Verse of the week first, then one entry per day in calendar order.
 */
export function buildDigestRunRecord(
  digest: WeeklyDigest,
  options: RunRecordOptions
): RecommendationRunRecord {
  const generatedAt = options.generatedAt ?? new Date();
  const results = [digest.verse_of_week, ...digest.days.map((day) => day.recommendation)];
  const { latitude, longitude } = digest.location;

  return {
    schema_version: RECOMMENDATION_RUN_SCHEMA_VERSION,
    kind: "weekly_digest",
    run_key: `weekly_digest:${digest.week_start}:${latitude},${longitude}`,
    generated_at: generatedAt.toISOString(),
    matching_backend: digest.matching_backend,
    corpus_size: options.corpusSize,
    observances: digest.days.flatMap((day) => day.observances.map((o) => `${o.date} ${o.name}`)),
    query_tags: digest.verse_of_week.query_tags,
    verse_ids: results.map((r) => r.verse.id),
    scores: results.map((r) => r.score),
    payload: digest,
  };
}

export function buildJanamPatriRunRecord(
  report: JanamPatriReport,
  options: RunRecordOptions
): RecommendationRunRecord {
  const generatedAt = options.generatedAt ?? new Date();
  const { birth } = report.janam_patri;

  return {
    schema_version: RECOMMENDATION_RUN_SCHEMA_VERSION,
    kind: "janam_patri",
    run_key: `janam_patri:${birth.moment}:${birth.location.latitude},${birth.location.longitude}`,
    generated_at: generatedAt.toISOString(),
    matching_backend: report.matching_backend,
    corpus_size: options.corpusSize,
    observances: [],
    query_tags: report.verses[0]?.query_tags ?? [],
    verse_ids: report.verses.map((r) => r.verse.id),
    scores: report.verses.map((r) => r.score),
    payload: report,
  };
}
