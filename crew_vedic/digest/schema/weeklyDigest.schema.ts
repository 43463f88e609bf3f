import { z } from "zod";
import { GeoLocationSchema, PanchangDaySchema } from "../../../astro/schemas/panchang.schema.js";
import { ObservanceSetSchema } from "../../observances/schema/observance.schema.js";
import {
  MatchingBackendSchema,
  RecommendationResultSchema,
} from "../../verses/schema/verse.schema.js";

export const WEEKLY_DIGEST_SCHEMA_VERSION = "1.0.0";

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const DigestDaySchema = z.object({
  panchang: PanchangDaySchema,
  observances: ObservanceSetSchema,
  recommendation: RecommendationResultSchema,
});

export const WeeklyDigestSchema = z.object({
  schema_version: z.literal(WEEKLY_DIGEST_SCHEMA_VERSION),
  week_start: IsoDateSchema,
  week_end: IsoDateSchema,
  location: GeoLocationSchema,
  matching_backend: MatchingBackendSchema,
  // Calendar order, week_start first
  days: z.array(DigestDaySchema).length(7),
  verse_of_week: RecommendationResultSchema,
  lifestyle_recommendations: z.array(z.string()).max(5),
});

export type DigestDay = z.infer<typeof DigestDaySchema>;
export type WeeklyDigest = z.infer<typeof WeeklyDigestSchema>;
