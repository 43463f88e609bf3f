import {
  createEphemerisAdapter,
  type EphemerisAdapter,
  type EphemerisProvider,
} from "../../astro/ephemeris/ephemerisAdapter.js";
import { createAstronomyEngineProvider } from "../../astro/ephemeris/astronomyEngineProvider.js";
import type { VedicConfig } from "../config/vedicConfig.schema.js";
import { loadVerseCorpus } from "../verses/loadVerseCorpus.js";
import type { VerseRecord } from "../verses/schema/verse.schema.js";
import { createVerseScorer } from "../verses/scoring/createVerseScorer.js";
import type { VerseScorer } from "../verses/scoring/verseScorer.js";

export interface VedicRuntime {
  config: VedicConfig;
  corpus: VerseRecord[];
  ephemeris: EphemerisAdapter;
  scorer: VerseScorer;
}

/**
 * Everything a command needs, built from one config snapshot.
 */
export function createVedicRuntime(
  config: VedicConfig,
  provider: EphemerisProvider = createAstronomyEngineProvider()
): VedicRuntime {
  return {
    config,
    corpus: loadVerseCorpus(config.corpus.path),
    ephemeris: createEphemerisAdapter(provider, { zodiac: config.zodiac }),
    scorer: createVerseScorer(config.corpus.matching_backend),
  };
}
