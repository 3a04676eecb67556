/**
 * Leaderboard projection over an aggregated stats table.
 */

import { compareIds } from "./aggregate";
import { resolveLeaderboardOptions } from "./config";
import type { LeaderboardEntry, LeaderboardOptions, PlayerStats } from "./types";

type RankedStats = PlayerStats & { winRate: number };

function hasWinRate(p: PlayerStats): p is RankedStats {
  return p.winRate !== null && p.gamesPlayed > 0;
}

/** Win rate desc, then games played desc, then player id asc. */
export function compareLeaderboardOrder(a: RankedStats, b: RankedStats): number {
  if (a.winRate !== b.winRate) return b.winRate - a.winRate;
  if (a.gamesPlayed !== b.gamesPlayed) return b.gamesPlayed - a.gamesPlayed;
  return compareIds(a.playerId, b.playerId);
}

/**
 * Rank players by win rate.
 *
 * Players with fewer than `minGames` counted games (or none at all) are
 * left out. Returns at most `topN` entries and never pads; an empty table
 * gives an empty leaderboard.
 *
 * @throws RangeError on a negative/non-integer minGames or a topN below 1
 */
export function leaderboard(
  stats: ReadonlyMap<string, PlayerStats>,
  options?: Partial<LeaderboardOptions>
): LeaderboardEntry[] {
  const { minGames, topN } = resolveLeaderboardOptions(options);

  return Array.from(stats.values())
    .filter(hasWinRate)
    .filter((p) => p.gamesPlayed >= minGames)
    .sort(compareLeaderboardOrder)
    .slice(0, topN)
    .map((p, i) => ({ ...p, rank: i + 1 }));
}
