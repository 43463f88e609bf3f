import { z } from "zod";
import { GeoLocationSchema } from "../../../astro/schemas/panchang.schema.js";
import {
  MatchingBackendSchema,
  RecommendationResultSchema,
} from "../../verses/schema/verse.schema.js";
import { NAKSHATRA_NAMES, RASHI_NAMES } from "../../panchang/names.js";

export const JANAM_PATRI_SCHEMA_VERSION = "1.0.0";

export const BirthDetailsSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  // Local wall-clock time at the birth place
  time: z.string().regex(/^\d{1,2}:\d{2}(:\d{2})?$/),
  location: GeoLocationSchema,
});

/** Traditional name or 1-based index */
const NamedIndexInputSchema = z.union([z.number().int().min(1), z.string().min(1)]);

export const JanamPatriOverrideSchema = z.object({
  nakshatra: NamedIndexInputSchema,
  rashi: NamedIndexInputSchema,
});

export const JanamPatriSchema = z.object({
  schema_version: z.literal(JANAM_PATRI_SCHEMA_VERSION),
  birth: z.object({
    date: z.string(),
    time: z.string(),
    utc_offset_hours: z.number(),
    moment: z.string().datetime(),
    location: GeoLocationSchema,
  }),
  nakshatra: z.object({
    index: z.number().int().min(1).max(27),
    name: z.enum(NAKSHATRA_NAMES),
  }),
  rashi: z.object({
    index: z.number().int().min(1).max(12),
    name: z.enum(RASHI_NAMES),
  }),
  // Moon longitude in the configured zodiac; null when overridden
  moon_longitude: z.number().min(0).lt(360).nullable(),
  source: z.enum(["ephemeris", "override"]),
});

export const JanamPatriReportSchema = z.object({
  janam_patri: JanamPatriSchema,
  matching_backend: MatchingBackendSchema,
  theme_tags: z.array(z.string()),
  verses: z.array(RecommendationResultSchema).min(1),
  lifestyle_recommendations: z.array(z.string()),
});

export type BirthDetails = z.infer<typeof BirthDetailsSchema>;
export type JanamPatriOverride = z.infer<typeof JanamPatriOverrideSchema>;
export type JanamPatri = z.infer<typeof JanamPatriSchema>;
export type JanamPatriReport = z.infer<typeof JanamPatriReportSchema>;
