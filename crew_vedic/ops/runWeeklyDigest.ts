#!/usr/bin/env node
import "dotenv/config";
import { todayAtOffset } from "../../astro/localDate.js";
import { loadVedicConfig } from "../config/loadVedicConfig.js";
import { assembleWeeklyDigest } from "../digest/assembleWeeklyDigest.js";
import { formatDigest } from "../digest/formatDigest.js";
import type { WeeklyDigest } from "../digest/schema/weeklyDigest.schema.js";
import { createVedicRuntime } from "../lib/createVedicRuntime.js";
import { describeError } from "../lib/describeError.js";
import { isMainModule } from "../lib/isMainModule.js";
import { persistRun } from "../lib/persistRun.js";
import { buildDigestRunRecord } from "../persistence/buildRunRecord.js";

const TAG = "weekly-digest";

export type OutputFormat = "text" | "json";

export interface WeeklyDigestArgs {
  startDate: string | null;
  format: OutputFormat;
  persist: boolean;
  configPath: string | null;
}

export function parseArgs(argv: readonly string[]): WeeklyDigestArgs {
  const args: WeeklyDigestArgs = { startDate: null, format: "text", persist: true, configPath: null };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--start-date" && next !== undefined) {
      args.startDate = next;
      i++;
    } else if (arg === "--config" && next !== undefined) {
      args.configPath = next;
      i++;
    } else if (arg === "--format" && next !== undefined) {
      if (next !== "text" && next !== "json") {
        throw new Error(`--format must be "text" or "json", got "${next}"`);
      }
      args.format = next;
      i++;
    } else if (arg === "--json") {
      args.format = "json";
    } else if (arg === "--no-persist") {
      args.persist = false;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

export async function runWeeklyDigest(args: WeeklyDigestArgs): Promise<WeeklyDigest> {
  const config = loadVedicConfig(args.configPath ? { path: args.configPath } : {});
  const runtime = createVedicRuntime(config);
  const weekStart = args.startDate ?? todayAtOffset(config.location.utc_offset_hours);

  console.error(
    `[${TAG}] week_start=${weekStart} backend=${runtime.scorer.backend} zodiac=${config.zodiac} corpus=${runtime.corpus.length}`
  );

  const digest = assembleWeeklyDigest({
    weekStart,
    location: config.location,
    corpus: runtime.corpus,
    ephemeris: runtime.ephemeris,
    scorer: runtime.scorer,
    defaultVerseId: config.corpus.default_verse_id,
    corpusSource: config.corpus.path,
  });

  console.log(args.format === "json" ? JSON.stringify(digest, null, 2) : formatDigest(digest));

  await persistRun(buildDigestRunRecord(digest, { corpusSize: runtime.corpus.length }), {
    enabled: args.persist,
    tag: TAG,
  });

  return digest;
}

async function main(): Promise<void> {
  try {
    await runWeeklyDigest(parseArgs(process.argv.slice(2)));
  } catch (err) {
    console.error(`✗ Error: ${describeError(err)}`);
    process.exit(1);
  }
}

if (isMainModule(import.meta.url)) {
  void main();
}
