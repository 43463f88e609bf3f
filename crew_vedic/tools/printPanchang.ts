#!/usr/bin/env node
import "dotenv/config";
import { createEphemerisAdapter } from "../../astro/ephemeris/ephemerisAdapter.js";
import { createAstronomyEngineProvider } from "../../astro/ephemeris/astronomyEngineProvider.js";
import { todayAtOffset } from "../../astro/localDate.js";
import { loadVedicConfig } from "../config/loadVedicConfig.js";
import { classifyObservances } from "../observances/classifyObservances.js";
import { computePanchangRange } from "../panchang/computePanchangDay.js";
import { formatPanchangDay } from "../panchang/formatPanchangDay.js";
import { describeError } from "../lib/describeError.js";
import { isMainModule } from "../lib/isMainModule.js";

/**
 * Print panchang lines for one or more days at the configured location.
 *
 * Usage: tsx crew_vedic/tools/printPanchang.ts [--date YYYY-MM-DD] [--days N] [--json]
 */

function parseArgs(argv: readonly string[]): { date: string | null; days: number; json: boolean } {
  let date: string | null = null;
  let days = 1;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--date" && next !== undefined) {
      date = next;
      i++;
    } else if (arg === "--days" && next !== undefined) {
      days = parseInt(next, 10);
      if (isNaN(days) || days < 1) {
        throw new Error("--days must be a positive integer");
      }
      i++;
    } else if (arg === "--json") {
      json = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { date, days, json };
}

function main(): void {
  try {
    const { date, days, json } = parseArgs(process.argv.slice(2));
    const config = loadVedicConfig();
    const ephemeris = createEphemerisAdapter(createAstronomyEngineProvider(), { zodiac: config.zodiac });
    const start = date ?? todayAtOffset(config.location.utc_offset_hours);

    const panchang = computePanchangRange(start, days, config.location, ephemeris);
    const observances = classifyObservances(panchang);

    if (json) {
      console.log(JSON.stringify(panchang.map((day, i) => ({ ...day, observances: observances[i] ?? [] })), null, 2));
      return;
    }

    panchang.forEach((day, i) => {
      const names = (observances[i] ?? []).map((o) => o.name);
      console.log(names.length > 0 ? `${formatPanchangDay(day)} | ${names.join(", ")}` : formatPanchangDay(day));
    });
  } catch (err) {
    console.error(`✗ Error: ${describeError(err)}`);
    process.exit(1);
  }
}

if (isMainModule(import.meta.url)) {
  main();
}
