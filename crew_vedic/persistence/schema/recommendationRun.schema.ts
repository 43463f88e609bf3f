import { z } from "zod";
import { WeeklyDigestSchema } from "../../digest/schema/weeklyDigest.schema.js";
import { JanamPatriReportSchema } from "../../janamPatri/schema/janamPatri.schema.js";
import { MatchingBackendSchema } from "../../verses/schema/verse.schema.js";

export const RECOMMENDATION_RUN_SCHEMA_VERSION = "1.0.0";

/**
 * One row of `recommendation_runs`. Self-describing: the payload carries the
 * full digest or report so a run can be replayed or diffed later.
 */
export const RecommendationRunRecordSchema = z.object({
  schema_version: z.literal(RECOMMENDATION_RUN_SCHEMA_VERSION),
  kind: z.enum(["weekly_digest", "janam_patri"]),
  run_key: z.string().min(1),
  generated_at: z.string().datetime(),
  matching_backend: MatchingBackendSchema,
  corpus_size: z.number().int().min(1),
  // "YYYY-MM-DD Name" per observance, in calendar order
  observances: z.array(z.string()),
  query_tags: z.array(z.string()),
  // verse_ids[i] scored scores[i]
  verse_ids: z.array(z.string()),
  scores: z.array(z.number()),
  payload: z.union([WeeklyDigestSchema, JanamPatriReportSchema]),
});

export type RecommendationRunRecord = z.infer<typeof RecommendationRunRecordSchema>;
