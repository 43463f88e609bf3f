import { beforeEach, describe, expect, it, vi } from "vitest";
import { createEphemerisAdapter } from "../../../astro/ephemeris/ephemerisAdapter.js";
import {
  createScriptedProvider,
  EQUATOR_TEST_LOCATION,
} from "../../../astro/ephemeris/__tests__/scriptedProvider.js";
import { assembleWeeklyDigest } from "../../digest/assembleWeeklyDigest.js";
import { buildJanamPatriReport } from "../../janamPatri/buildJanamPatriReport.js";
import { computeJanamPatri } from "../../janamPatri/computeJanamPatri.js";
import { TEST_CORPUS } from "../../verses/__tests__/fixtures.js";
import { buildDigestRunRecord, buildJanamPatriRunRecord } from "../buildRunRecord.js";
import {
  logRecommendationRun,
  recordRecommendationRun,
  RECOMMENDATION_RUNS_TABLE,
} from "../recordRecommendationRun.js";
import { RecommendationRunRecordSchema } from "../schema/recommendationRun.schema.js";

const supabase = vi.hoisted(() => {
  const insert = vi.fn();
  const from = vi.fn(() => ({ insert }));
  return { from, insert };
});

vi.mock("../../lib/supabaseClient.js", () => ({
  getSupabase: () => ({ from: supabase.from }),
  hasSupabaseEnv: () => true,
}));

const GENERATED_AT = new Date("2025-03-08T12:00:00.000Z");

function weekDigest() {
  const provider = createScriptedProvider({
    "2025-03-09": 110,
    "2025-03-10": 125,
    "2025-03-11": 150,
    "2025-03-12": 165,
    "2025-03-13": 175,
    "2025-03-14": 186,
    "2025-03-15": 198,
    "2025-03-16": 212,
  });
  return assembleWeeklyDigest({
    weekStart: "2025-03-09",
    location: EQUATOR_TEST_LOCATION,
    corpus: TEST_CORPUS,
    ephemeris: createEphemerisAdapter(provider, { zodiac: "tropical" }),
    defaultVerseId: "v-general",
  });
}

describe("buildDigestRunRecord", () => {
  it("summarizes the digest and carries it as payload", () => {
    const digest = weekDigest();
    const record = buildDigestRunRecord(digest, { corpusSize: TEST_CORPUS.length, generatedAt: GENERATED_AT });

    expect(record).toMatchObject({
      schema_version: "1.0.0",
      kind: "weekly_digest",
      run_key: "weekly_digest:2025-03-09:0,0",
      generated_at: "2025-03-08T12:00:00.000Z",
      matching_backend: "keyword",
      corpus_size: 5,
      observances: ["2025-03-10 Ekadashi", "2025-03-11 Pradosham", "2025-03-13 Purnima"],
      verse_ids: [
        "v-vishnu",
        "v-general",
        "v-vishnu",
        "v-shiva",
        "v-general",
        "v-moon",
        "v-ganesha",
        "v-general",
      ],
      scores: [3, 0, 3, 2, 0, 3, 2, 0],
    });
    expect(record.payload).toBe(digest);
    expect(RecommendationRunRecordSchema.parse(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });
});

describe("buildJanamPatriRunRecord", () => {
  it("keys the run by birth moment and place", () => {
    const patri = computeJanamPatri(
      { date: "1990-01-01", time: "10:30", location: EQUATOR_TEST_LOCATION },
      createEphemerisAdapter(createScriptedProvider({})),
      { nakshatra: "Ardra", rashi: "Mithuna" }
    );
    const report = buildJanamPatriReport(patri, TEST_CORPUS);
    const record = buildJanamPatriRunRecord(report, { corpusSize: 5, generatedAt: GENERATED_AT });

    expect(record.run_key).toBe("janam_patri:1990-01-01T10:30:00.000Z:0,0");
    expect(record.observances).toEqual([]);
    expect(record.query_tags).toEqual(["rudra", "shiva", "storm"]);
    expect(record.verse_ids).toEqual(["v-shiva"]);
    expect(record.scores).toEqual([1]);
  });
});

describe("recordRecommendationRun", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("inserts the record into recommendation_runs", async () => {
    supabase.insert.mockResolvedValue({ error: null });
    const record = buildDigestRunRecord(weekDigest(), { corpusSize: 5, generatedAt: GENERATED_AT });

    await recordRecommendationRun(record);

    expect(supabase.from).toHaveBeenCalledWith(RECOMMENDATION_RUNS_TABLE);
    expect(supabase.insert).toHaveBeenCalledWith(record);
  });

  it("throws when the insert fails", async () => {
    supabase.insert.mockResolvedValue({ error: { message: "permission denied" } });
    const record = buildDigestRunRecord(weekDigest(), { corpusSize: 5, generatedAt: GENERATED_AT });

    await expect(recordRecommendationRun(record)).rejects.toThrow(
      "Failed to insert weekly_digest run weekly_digest:2025-03-09:0,0: permission denied"
    );
  });
});

describe("logRecommendationRun", () => {
  it("logs the run summary under its kind", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const record = buildDigestRunRecord(weekDigest(), { corpusSize: 5, generatedAt: GENERATED_AT });

    logRecommendationRun(record);

    expect(spy).toHaveBeenCalledWith("[RUN:weekly_digest]", {
      input: {
        run_key: "weekly_digest:2025-03-09:0,0",
        matching_backend: "keyword",
        corpus_size: 5,
        observances: record.observances,
        query_tags: record.query_tags,
      },
      output: { verse_ids: record.verse_ids, scores: record.scores },
    });
    spy.mockRestore();
  });
});
