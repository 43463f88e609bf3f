import { logRun } from "../../logging/runLogger.js";
import { getSupabase } from "../lib/supabaseClient.js";
import type { RecommendationRunRecord } from "./schema/recommendationRun.schema.js";

export const RECOMMENDATION_RUNS_TABLE = "recommendation_runs";

export async function recordRecommendationRun(record: RecommendationRunRecord): Promise<void> {
  const { error } = await getSupabase().from(RECOMMENDATION_RUNS_TABLE).insert(record);

  if (error) {
    throw new Error(`Failed to insert ${record.kind} run ${record.run_key}: ${error.message}`, {
      cause: error,
    });
  }
}

export function logRecommendationRun(record: RecommendationRunRecord): void {
  logRun({
    component: record.kind,
    input: {
      run_key: record.run_key,
      matching_backend: record.matching_backend,
      corpus_size: record.corpus_size,
      observances: record.observances,
      query_tags: record.query_tags,
    },
    output: {
      verse_ids: record.verse_ids,
      scores: record.scores,
    },
  });
}
