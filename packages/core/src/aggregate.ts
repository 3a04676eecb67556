/**
 * Player aggregation: folds finished games into per-player
 * games played, wins, losses, win rate and most recent game.
 *
 * The fold is order-independent: counts are sums, and the two
 * order-sensitive fields (name, last game) are chosen by
 * (timestamp, gameId) rather than by arrival order.
 */

import type {
  AggregationResult,
  ExcludedGame,
  GameRecord,
  PlayerAccumulator,
  PlayerStats,
  Side,
  StatsSummary,
} from "./types";

export const UNKNOWN_PLAYER_NAME = "Unknown";

/** Code-unit string order, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

interface GamePosition {
  timestamp: number;
  gameId: string;
}

/** True if `a` comes strictly before `b` on the season timeline. */
function isEarlier(a: GamePosition, b: GamePosition): boolean {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp;
  return a.gameId < b.gameId;
}

/**
 * Most recent game wins; on equal timestamps the smaller gameId is kept
 * so the choice never depends on which record arrived first.
 */
function isMoreRecent(candidate: GamePosition, current: GamePosition): boolean {
  if (candidate.timestamp !== current.timestamp) {
    return candidate.timestamp > current.timestamp;
  }
  return candidate.gameId < current.gameId;
}

/** Win rate as a whole percentage, null when nothing was counted. */
export function computeWinRate(wins: number, gamesPlayed: number): number | null {
  return gamesPlayed > 0 ? Math.round((wins / gamesPlayed) * 100) : null;
}

function createAccumulator(playerId: string): PlayerAccumulator {
  return {
    playerId,
    playerName: UNKNOWN_PLAYER_NAME,
    nameFrom: null,
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    lastGame: null,
  };
}

function offerName(
  acc: PlayerAccumulator,
  name: string | undefined,
  from: GamePosition
): void {
  const trimmed = name?.trim();
  if (!trimmed) return;
  if (acc.nameFrom === null || isEarlier(from, acc.nameFrom)) {
    acc.playerName = trimmed;
    acc.nameFrom = from;
  }
}

function offerLastGame(acc: PlayerAccumulator, game: GamePosition): void {
  if (acc.lastGame === null || isMoreRecent(game, acc.lastGame)) {
    acc.lastGame = game;
  }
}

function toPlayerStats(acc: PlayerAccumulator): PlayerStats {
  return {
    playerId: acc.playerId,
    playerName: acc.playerName,
    gamesPlayed: acc.gamesPlayed,
    wins: acc.wins,
    losses: acc.losses,
    winRate: computeWinRate(acc.wins, acc.gamesPlayed),
    lastGameId: acc.lastGame?.gameId ?? null,
  };
}

export interface Aggregator {
  add(game: GameRecord): void;
  addAll(games: Iterable<GameRecord>): void;
  /** Fold another aggregator's partial state into this one. */
  merge(other: Aggregator): void;
  /** Copies of the accumulators, exposed for merging. */
  accumulators(): ReadonlyMap<string, Readonly<PlayerAccumulator>>;
  excluded(): readonly ExcludedGame[];
  result(): AggregationResult;
}

/**
 * Create an incremental aggregator. `aggregate()` is the one-shot form;
 * use this directly to fold partitions separately and merge them.
 */
export function createAggregator(): Aggregator {
  const players = new Map<string, PlayerAccumulator>();
  const excludedGames: ExcludedGame[] = [];

  function getOrCreate(playerId: string): PlayerAccumulator {
    let acc = players.get(playerId);
    if (!acc) {
      acc = createAccumulator(playerId);
      players.set(playerId, acc);
    }
    return acc;
  }

  function countSide(game: GameRecord, side: Side): void {
    const acc = getOrCreate(side === "A" ? game.playerAId : game.playerBId);
    acc.gamesPlayed++;
    if (game.winnerSide === side) acc.wins++;
    else acc.losses++;
    offerLastGame(acc, { timestamp: game.timestamp, gameId: game.gameId });
  }

  const aggregator: Aggregator = {
    add(game) {
      const position = { timestamp: game.timestamp, gameId: game.gameId };
      offerName(getOrCreate(game.playerAId), game.playerAName, position);
      offerName(getOrCreate(game.playerBId), game.playerBName, position);

      if (game.completionState !== "Finished") {
        excludedGames.push({ gameId: game.gameId, reason: "not-finished" });
        return;
      }
      if (game.winnerSide === null) {
        excludedGames.push({ gameId: game.gameId, reason: "indeterminate-winner" });
        return;
      }

      countSide(game, "A");
      countSide(game, "B");
    },

    addAll(games) {
      for (const game of games) aggregator.add(game);
    },

    merge(other) {
      for (const theirs of other.accumulators().values()) {
        const acc = getOrCreate(theirs.playerId);
        acc.gamesPlayed += theirs.gamesPlayed;
        acc.wins += theirs.wins;
        acc.losses += theirs.losses;
        if (theirs.nameFrom) offerName(acc, theirs.playerName, theirs.nameFrom);
        if (theirs.lastGame) offerLastGame(acc, theirs.lastGame);
      }
      excludedGames.push(...other.excluded());
    },

    accumulators() {
      const copies = new Map<string, Readonly<PlayerAccumulator>>();
      for (const [id, acc] of players) copies.set(id, { ...acc });
      return copies;
    },

    excluded() {
      return excludedGames;
    },

    result() {
      const ids = Array.from(players.keys()).sort(compareIds);
      const stats = new Map<string, PlayerStats>();
      for (const id of ids) {
        const acc = players.get(id);
        if (acc) stats.set(id, toPlayerStats(acc));
      }

      const excluded = [...excludedGames].sort(
        (a, b) => compareIds(a.gameId, b.gameId) || compareIds(a.reason, b.reason)
      );

      return { players: stats, excluded };
    },
  };

  return aggregator;
}

/**
 * Aggregate games into per-player statistics.
 *
 * Only finished games with a known winner are counted. Unfinished games
 * and games whose winner is null are listed in `excluded` and change
 * nobody's totals. Every player id that appears is present in `players`,
 * with zero games if none of theirs counted.
 */
export function aggregate(games: Iterable<GameRecord>): AggregationResult {
  const aggregator = createAggregator();
  aggregator.addAll(games);
  return aggregator.result();
}

/** Totals for run metadata. */
export function summarizeStats(players: ReadonlyMap<string, PlayerStats>): StatsSummary {
  let playersWithGames = 0;
  let appearances = 0;
  for (const p of players.values()) {
    if (p.gamesPlayed > 0) playersWithGames++;
    appearances += p.gamesPlayed;
  }
  return {
    players: players.size,
    playersWithGames,
    // every counted game has two appearances
    gamesCounted: appearances / 2,
  };
}
