/**
 * TTBL fetching: gameday schedule pages → match ids → match JSON.
 */

import * as cheerio from "cheerio";
import type { TtblConfig } from "./config";
import type { HttpClient } from "./http";
import { sleep } from "./retry";
import { ttblMatchSchema } from "./ttbl-types";
import type { TtblMatch } from "./ttbl-types";

const MATCH_ID_PATTERN = /[a-f0-9-]{36}$/;

/**
 * Pull match ids out of a gameday schedule page.
 * Match links look like /bundesliga/gameday/<season>/<day>/<uuid>.
 * Returns unique ids, sorted.
 */
export function extractMatchIds(html: string): string[] {
  const $ = cheerio.load(html);
  const ids = new Set<string>();

  $('a[href*="/bundesliga/gameday/"]').each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    const path = href.split(/[?#]/)[0].replace(/\/+$/, "");
    const match = path.match(MATCH_ID_PATTERN);
    if (match) ids.add(match[0]);
  });

  return Array.from(ids).sort();
}

export function scheduleUrl(config: TtblConfig, gameday: number): string {
  return `${config.baseUrl}/bundesliga/gameschedule/${config.season}/${gameday}/all`;
}

export function matchUrl(config: TtblConfig, matchId: string): string {
  return `${config.baseUrl}/api/internal/match/${matchId}`;
}

/** Walk gamedays 1..config.gamedays and collect every match id. */
export async function discoverMatchIds(
  client: HttpClient,
  config: TtblConfig,
  onGameday?: (gameday: number, found: number) => void
): Promise<string[]> {
  const all = new Set<string>();

  for (let gameday = 1; gameday <= config.gamedays; gameday++) {
    const html = await client.getText(scheduleUrl(config, gameday));
    const ids = extractMatchIds(html);
    for (const id of ids) all.add(id);
    onGameday?.(gameday, ids.length);

    if (gameday < config.gamedays) await sleep(config.delayMs);
  }

  return Array.from(all).sort();
}

export function fetchMatch(
  client: HttpClient,
  config: TtblConfig,
  matchId: string
): Promise<TtblMatch> {
  return client.getJson(matchUrl(config, matchId), ttblMatchSchema);
}

export interface TtblSeasonFetch {
  matchIds: string[];
  matches: Array<{ matchId: string; match: TtblMatch }>;
  failed: Array<{ matchId: string; error: string }>;
}

/**
 * Discover the season's matches and fetch each one in turn.
 * A match that still fails after retries is recorded and skipped.
 */
export async function fetchTtblSeason(
  client: HttpClient,
  config: TtblConfig,
  log: (line: string) => void = console.log
): Promise<TtblSeasonFetch> {
  const matchIds = await discoverMatchIds(client, config, (gameday, found) =>
    log(`  Gameday ${gameday}: ${found} matches`)
  );
  log(`  Found ${matchIds.length} unique matches.`);

  const matches: TtblSeasonFetch["matches"] = [];
  const failed: TtblSeasonFetch["failed"] = [];

  for (const [i, matchId] of matchIds.entries()) {
    try {
      const match = await fetchMatch(client, config, matchId);
      matches.push({ matchId, match });
      log(`  [${i + 1}/${matchIds.length}] ${matchId}: ${match.games?.length ?? 0} games`);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      failed.push({ matchId, error });
      log(`  [${i + 1}/${matchIds.length}] ${matchId}: failed (${error})`);
    }
    if (i < matchIds.length - 1) await sleep(config.delayMs);
  }

  return { matchIds, matches, failed };
}
