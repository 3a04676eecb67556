/**
 * ttbl command: scrapes one Bundesliga season and writes games, stats
 * and the leaderboard.
 */

import { join } from "node:path";
import { loadScraperConfig } from "../config";
import type { TtblConfig } from "../config";
import { createHttpClient } from "../http";
import { writeJson } from "../output";
import { intOption, leaderboardOptionsFromFlags, parseSeason } from "../options";
import { buildRun, reportRun } from "../pipeline";
import { appendBatch, emptyBatch } from "../records";
import { fetchTtblSeason } from "../ttbl-fetch";
import {
  collectTtblPlayers,
  countMatchStates,
  normalizeTtblMatch,
  summarizeTtblMatch,
} from "../ttbl-normalize";
import type { TtblMatchSummary } from "../ttbl-types";

export interface TtblCommandOptions {
  season?: string;
  gamedays?: string;
  delay?: string;
  out?: string;
  minGames?: string;
  top?: string;
  verbose?: boolean;
}

export async function ttbl(options: TtblCommandOptions) {
  const config = loadScraperConfig();
  const ttblConfig: TtblConfig = {
    ...config.ttbl,
    season: options.season ? parseSeason(options.season) : config.ttbl.season,
    gamedays: intOption(options.gamedays, "--gamedays", config.ttbl.gamedays, 1),
    delayMs: intOption(options.delay, "--delay", config.ttbl.delayMs),
  };
  const leaderboardOptions = leaderboardOptionsFromFlags(options);
  const outDir = options.out ?? join(config.dataDir, "ttbl", ttblConfig.season);

  console.log(
    `\nScraping TTBL season ${ttblConfig.season} (${ttblConfig.gamedays} gamedays)...`
  );
  const client = createHttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
  });
  const { matchIds, matches, failed } = await fetchTtblSeason(client, ttblConfig);

  const batch = emptyBatch();
  const summaries: TtblMatchSummary[] = [];
  for (const { matchId, match } of matches) {
    writeJson(join(outDir, "matches", `${matchId}.json`), match);
    appendBatch(batch, normalizeTtblMatch(matchId, match));
    summaries.push(summarizeTtblMatch(matchId, match));
  }

  const matchStates = countMatchStates(summaries);
  console.log(`\n  Fetched ${matches.length} matches, ${failed.length} failed.`);
  for (const { state, count } of matchStates) {
    console.log(`    ${state}: ${count}`);
  }

  writeJson(join(outDir, "match-summaries.json"), summaries);
  writeJson(join(outDir, "players.json"), collectTtblPlayers(matches));

  const run = buildRun("ttbl", batch, leaderboardOptions, {
    season: ttblConfig.season,
    gamedays: ttblConfig.gamedays,
    matchesFound: matchIds.length,
    matchesFetched: matches.length,
    failedMatches: failed,
    matchStates,
  });
  reportRun(run, outDir, options.verbose === true);
}
