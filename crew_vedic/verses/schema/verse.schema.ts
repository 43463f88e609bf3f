import { z } from "zod";

export const VerseRecordSchema = z.object({
  id: z.string().min(1),
  /** Text in the original script */
  devanagari: z.string().min(1),
  transliteration: z.string(),
  meaning: z.string().min(1),
  /** Deity or theme the verse is associated with */
  theme: z.string(),
  /** Source-text identifier, e.g. "Bhagavad Gita 2.47" */
  source: z.string().min(1),
  tags: z.array(z.string()),
});

export const MatchingBackendSchema = z.enum(["keyword", "vector"]);

export const RecommendationResultSchema = z.object({
  verse: VerseRecordSchema,
  score: z.number().min(0),
  /** Normalized query tokens that were scored, sorted */
  query_tags: z.array(z.string()),
  /** Query tokens found in the verse's own tags */
  matched_tags: z.array(z.string()),
  /** true when nothing scored above zero and the default verse was used */
  fallback: z.boolean(),
});

export type VerseRecord = z.infer<typeof VerseRecordSchema>;
export type MatchingBackend = z.infer<typeof MatchingBackendSchema>;
export type RecommendationResult = z.infer<typeof RecommendationResultSchema>;
