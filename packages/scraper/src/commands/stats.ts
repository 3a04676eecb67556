/**
 * stats command: re-aggregates a saved games.json without fetching.
 */

import { dirname, join } from "node:path";
import { leaderboardOptionsFromFlags } from "../options";
import { readGames } from "../output";
import { buildRun, reportRun } from "../pipeline";

export interface StatsCommandOptions {
  input: string;
  minGames?: string;
  top?: string;
  out?: string;
  verbose?: boolean;
}

export function stats(options: StatsCommandOptions) {
  const leaderboardOptions = leaderboardOptionsFromFlags(options);

  const games = readGames(options.input);
  console.log(`\nLoaded ${games.length} games from ${options.input}`);

  const run = buildRun(
    "stats",
    { games, skipped: [], diagnostics: [] },
    leaderboardOptions,
    { input: options.input }
  );
  reportRun(run, options.out ?? join(dirname(options.input), "stats"), options.verbose === true);
}
