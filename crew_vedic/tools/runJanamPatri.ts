#!/usr/bin/env node
import "dotenv/config";
import { loadVedicConfig } from "../config/loadVedicConfig.js";
import {
  buildJanamPatriReport,
  formatJanamPatriReport,
} from "../janamPatri/buildJanamPatriReport.js";
import { computeJanamPatri } from "../janamPatri/computeJanamPatri.js";
import { createVedicRuntime } from "../lib/createVedicRuntime.js";
import { describeError } from "../lib/describeError.js";
import { isMainModule } from "../lib/isMainModule.js";
import { persistRun } from "../lib/persistRun.js";
import { buildJanamPatriRunRecord } from "../persistence/buildRunRecord.js";

/**
 * Janma nakshatra, rashi and verse recommendations for the configured birth.
 *
 * Usage: tsx crew_vedic/tools/runJanamPatri.ts [--json] [--no-persist]
 */

const TAG = "janam-patri";

async function main(): Promise<void> {
  try {
    const argv = process.argv.slice(2);
    const json = argv.includes("--json");
    const persist = !argv.includes("--no-persist");

    const config = loadVedicConfig();
    const jp = config.janam_patri;
    if (!jp || !jp.enabled) {
      console.log(
        "Janam patri is disabled or missing in config. Set janam_patri.enabled to true and add birth details."
      );
      return;
    }

    const runtime = createVedicRuntime(config);
    const patri = computeJanamPatri(
      { date: jp.birth_date, time: jp.birth_time, location: jp.birth_place },
      runtime.ephemeris,
      jp.override
    );
    const report = buildJanamPatriReport(patri, runtime.corpus, {
      scorer: runtime.scorer,
      defaultVerseId: config.corpus.default_verse_id,
      corpusSource: config.corpus.path,
    });

    console.log(json ? JSON.stringify(report, null, 2) : formatJanamPatriReport(report));

    await persistRun(buildJanamPatriRunRecord(report, { corpusSize: runtime.corpus.length }), {
      enabled: persist,
      tag: TAG,
    });
  } catch (err) {
    console.error(`✗ Error: ${describeError(err)}`);
    process.exit(1);
  }
}

if (isMainModule(import.meta.url)) {
  void main();
}
