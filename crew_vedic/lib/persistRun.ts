import {
  logRecommendationRun,
  recordRecommendationRun,
} from "../persistence/recordRecommendationRun.js";
import type { RecommendationRunRecord } from "../persistence/schema/recommendationRun.schema.js";
import { describeError } from "./describeError.js";
import { hasSupabaseEnv } from "./supabaseClient.js";

export type PersistOutcome = "persisted" | "skipped" | "failed";

/**
 * Log the run and store it when Supabase is configured. A failed insert is
 * reported but never fails the command that produced the record.
 */
export async function persistRun(
  record: RecommendationRunRecord,
  { enabled, tag }: { enabled: boolean; tag: string }
): Promise<PersistOutcome> {
  logRecommendationRun(record);

  if (!enabled) {
    console.error(`[${tag}] Persistence disabled (--no-persist)`);
    return "skipped";
  }
  if (!hasSupabaseEnv()) {
    console.error(`[${tag}] Supabase env not set; skipping persistence`);
    return "skipped";
  }

  try {
    await recordRecommendationRun(record);
    console.error(`[${tag}] Stored run ${record.run_key}`);
    return "persisted";
  } catch (err) {
    console.warn(`[${tag}] Failed to persist run ${record.run_key}: ${describeError(err)}`);
    return "failed";
  }
}
