import { z } from "zod";
import { GeoLocationSchema } from "../../astro/schemas/panchang.schema.js";
import { JanamPatriOverrideSchema } from "../janamPatri/schema/janamPatri.schema.js";
import { DEFAULT_CORPUS_PATH } from "../verses/loadVerseCorpus.js";
import { MatchingBackendSchema } from "../verses/schema/verse.schema.js";

export const JanamPatriConfigSchema = z.object({
  enabled: z.boolean().default(false),
  birth_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  birth_time: z.string().regex(/^\d{1,2}:\d{2}(:\d{2})?$/),
  birth_place: GeoLocationSchema,
  override: JanamPatriOverrideSchema.nullable().default(null),
});

export const VedicConfigSchema = z.object({
  location: GeoLocationSchema,
  zodiac: z.enum(["sidereal", "tropical"]).default("sidereal"),
  corpus: z
    .object({
      path: z.string().min(1).default(DEFAULT_CORPUS_PATH),
      default_verse_id: z.string().min(1).nullable().default(null),
      matching_backend: MatchingBackendSchema.default("keyword"),
    })
    .default({}),
  janam_patri: JanamPatriConfigSchema.nullable().default(null),
});

export type JanamPatriConfig = z.infer<typeof JanamPatriConfigSchema>;
export type VedicConfig = z.infer<typeof VedicConfigSchema>;
