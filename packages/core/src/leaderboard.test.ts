import { describe, it, expect } from "vitest";
import { computeWinRate } from "./aggregate";
import { DEFAULT_LEADERBOARD_OPTIONS, resolveLeaderboardOptions } from "./config";
import { leaderboard } from "./leaderboard";
import type { PlayerStats } from "./types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeStats(playerId: string, wins: number, losses: number): PlayerStats {
  const gamesPlayed = wins + losses;
  return {
    playerId,
    playerName: `Player ${playerId}`,
    gamesPlayed,
    wins,
    losses,
    winRate: computeWinRate(wins, gamesPlayed),
    lastGameId: gamesPlayed > 0 ? `last-${playerId}` : null,
  };
}

function table(...players: PlayerStats[]): Map<string, PlayerStats> {
  return new Map(players.map((p) => [p.playerId, p]));
}

// ---------------------------------------------------------------------------
// leaderboard
// ---------------------------------------------------------------------------

describe("leaderboard", () => {
  it("keeps only players at or above minGames, sorted by win rate", () => {
    const stats = table(
      makeStats("p01", 1, 0),
      makeStats("p02", 2, 1),
      makeStats("p03", 3, 2), // 5 games, 60%
      makeStats("p04", 0, 2),
      makeStats("p05", 1, 3),
      makeStats("p06", 4, 0),
      makeStats("p07", 6, 1), // 7 games, 86%
      makeStats("p08", 0, 0),
      makeStats("p09", 2, 2),
      makeStats("p10", 3, 1)
    );
    const result = leaderboard(stats, { minGames: 5, topN: 20 });
    expect(result.map((e) => [e.rank, e.playerId, e.winRate])).toEqual([
      [1, "p07", 86],
      [2, "p03", 60],
    ]);
  });

  it("breaks equal win rate and games played by player id, every time", () => {
    const stats = table(
      makeStats("zhang", 3, 3),
      makeStats("alvarez", 3, 3),
      makeStats("moreau", 3, 3)
    );
    const first = leaderboard(stats, { minGames: 0, topN: 10 });
    expect(first.map((e) => e.playerId)).toEqual(["alvarez", "moreau", "zhang"]);
    for (let i = 0; i < 5; i++) {
      expect(leaderboard(stats, { minGames: 0, topN: 10 })).toEqual(first);
    }
  });

  it("breaks equal win rate by more games played", () => {
    const stats = table(makeStats("a", 2, 2), makeStats("b", 5, 5), makeStats("c", 3, 3));
    expect(leaderboard(stats, { minGames: 1 }).map((e) => e.playerId)).toEqual([
      "b",
      "c",
      "a",
    ]);
  });

  it("truncates to topN and returns fewer when fewer qualify", () => {
    const stats = table(
      makeStats("a", 5, 0),
      makeStats("b", 4, 1),
      makeStats("c", 3, 2),
      makeStats("d", 2, 3)
    );
    expect(leaderboard(stats, { minGames: 5, topN: 2 }).map((e) => e.playerId)).toEqual([
      "a",
      "b",
    ]);
    expect(leaderboard(stats, { minGames: 5, topN: 10 })).toHaveLength(4);
  });

  it("copies the stats fields onto each entry", () => {
    const [entry] = leaderboard(table(makeStats("a", 4, 1)), { minGames: 5 });
    expect(entry).toEqual({
      playerId: "a",
      playerName: "Player a",
      gamesPlayed: 5,
      wins: 4,
      losses: 1,
      winRate: 80,
      lastGameId: "last-a",
      rank: 1,
    });
  });

  it("returns nothing for an empty table or when minGames excludes everyone", () => {
    expect(leaderboard(new Map(), { minGames: 0, topN: 5 })).toEqual([]);
    expect(leaderboard(table(makeStats("a", 3, 1)), { minGames: 5 })).toEqual([]);
  });

  it("leaves out players with no counted games even when minGames is 0", () => {
    const stats = table(makeStats("a", 0, 0), makeStats("b", 0, 1));
    expect(leaderboard(stats, { minGames: 0 }).map((e) => e.playerId)).toEqual(["b"]);
  });

  it("uses the defaults when no options are given", () => {
    const players = Array.from({ length: 25 }, (_, i) =>
      makeStats(`p${String(i).padStart(2, "0")}`, i % 6, 5)
    );
    players.push(makeStats("short", 4, 0));
    const result = leaderboard(table(...players));
    expect(result).toHaveLength(DEFAULT_LEADERBOARD_OPTIONS.topN);
    expect(result.some((e) => e.playerId === "short")).toBe(false);
  });

  it("never lists a player under minGames and never breaks the order", () => {
    const players = Array.from({ length: 40 }, (_, i) =>
      makeStats(`id-${i}`, (i * 7) % 9, (i * 5) % 8)
    );
    const result = leaderboard(table(...players), { minGames: 6, topN: 40 });
    expect(result.length).toBeGreaterThan(0);
    for (const entry of result) {
      expect(entry.gamesPlayed).toBeGreaterThanOrEqual(6);
    }
    for (let i = 1; i < result.length; i++) {
      const prev = result[i - 1];
      const next = result[i];
      const ordered =
        prev.winRate > next.winRate ||
        (prev.winRate === next.winRate && prev.gamesPlayed >= next.gamesPlayed);
      expect(ordered).toBe(true);
    }
  });

  it("rejects a topN below 1", () => {
    const stats = table(makeStats("a", 5, 0));
    expect(() => leaderboard(stats, { topN: 0 })).toThrow(RangeError);
    expect(() => leaderboard(stats, { topN: -3 })).toThrow(RangeError);
  });

  it("rejects a negative or fractional minGames", () => {
    const stats = table(makeStats("a", 5, 0));
    expect(() => leaderboard(stats, { minGames: -1 })).toThrow(
      "minGames must be a non-negative integer, got -1"
    );
    expect(() => leaderboard(stats, { minGames: 2.5 })).toThrow(RangeError);
  });
});

describe("resolveLeaderboardOptions", () => {
  it("fills missing fields from the defaults", () => {
    expect(resolveLeaderboardOptions(undefined)).toEqual({ minGames: 5, topN: 20 });
    expect(resolveLeaderboardOptions({ topN: 3 })).toEqual({ minGames: 5, topN: 3 });
  });

  it("rejects a non-integer topN", () => {
    expect(() => resolveLeaderboardOptions({ topN: 1.5 })).toThrow(
      "topN must be a positive integer, got 1.5"
    );
    expect(() => resolveLeaderboardOptions({ topN: Number.NaN })).toThrow(RangeError);
  });
});
