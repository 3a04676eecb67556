/**
 * fabrik command: pulls ITTF results for a range of years from the
 * Fabrik list view and writes matches, players, stats and the leaderboard.
 */

import { join } from "node:path";
import { loadScraperConfig } from "../config";
import type { FabrikConfig } from "../config";
import { fetchFabrikYear } from "../fabrik-fetch";
import {
  buildPlayerDirectory,
  buildPlayerMatchIndex,
  normalizeFabrikRows,
} from "../fabrik-normalize";
import type { FabrikRow, FabrikYearResult } from "../fabrik-types";
import { createHttpClient } from "../http";
import { writeJson } from "../output";
import { intOption, leaderboardOptionsFromFlags, parseYears } from "../options";
import { buildRun, reportRun } from "../pipeline";

export interface FabrikCommandOptions {
  years?: string;
  startYear?: string;
  endYear?: string;
  pageSize?: string;
  maxPages?: string;
  delay?: string;
  out?: string;
  minGames?: string;
  top?: string;
  verbose?: boolean;
}

export async function fabrik(options: FabrikCommandOptions) {
  const config = loadScraperConfig();
  const years = parseYears(options);
  const fabrikConfig: FabrikConfig = {
    ...config.fabrik,
    pageSize: intOption(options.pageSize, "--page-size", config.fabrik.pageSize, 1),
    maxPagesPerYear: intOption(options.maxPages, "--max-pages", config.fabrik.maxPagesPerYear, 1),
    delayMs: intOption(options.delay, "--delay", config.fabrik.delayMs),
  };
  const leaderboardOptions = leaderboardOptionsFromFlags(options);
  const label = years.length === 1 ? `${years[0]}` : `${years[0]}-${years[years.length - 1]}`;
  const outDir = options.out ?? join(config.dataDir, "fabrik", label);

  console.log(`\nFetching ITTF results for ${years.join(", ")} (list ${fabrikConfig.listId})...`);
  const client = createHttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
  });

  const rows: FabrikRow[] = [];
  const yearStats: Array<Omit<FabrikYearResult, "rows"> & { rows: number }> = [];
  for (const year of years) {
    const result = await fetchFabrikYear(client, fabrikConfig, year, (page, fresh, total) =>
      console.log(`  ${year} page ${page}: +${fresh} (${total} total)`)
    );
    console.log(
      `  ${year}: ${result.rows.length} rows in ${result.pages} pages (stopped: ${result.stopReason})`
    );
    if (result.invalidRows > 0) {
      console.log(`  ${year}: ${result.invalidRows} rows with an unexpected shape dropped`);
    }
    rows.push(...result.rows);
    yearStats.push({
      year,
      rows: result.rows.length,
      pages: result.pages,
      invalidRows: result.invalidRows,
      stopReason: result.stopReason,
    });
  }

  const batch = normalizeFabrikRows(rows);
  const players = buildPlayerDirectory(batch.matches);
  writeJson(join(outDir, "matches.json"), batch.matches);
  writeJson(join(outDir, "players.json"), Array.from(players.values()));
  writeJson(join(outDir, "player-match-index.json"), buildPlayerMatchIndex(batch.matches));

  const run = buildRun("fabrik", batch, leaderboardOptions, {
    years,
    listId: fabrikConfig.listId,
    rowsFetched: rows.length,
    matches: batch.matches.length,
    directoryPlayers: players.size,
    yearStats,
  });
  reportRun(run, outDir, options.verbose === true);
}
