/* ── Sides & States ───────────────────────────────────────── */

/** Side A is the home / listed player, side B the away / opponent. */
export type Side = "A" | "B";

/** `null` means the result could not be determined (walkover, bad score data). */
export type WinnerSide = Side | null;

export type CompletionState = "Finished" | "NotFinished";

/* ── Score Parser ─────────────────────────────────────────── */

export interface SetResult {
  /** 1-based, in the order sets were parsed */
  setNumber: number;
  sideAPoints: number;
  sideBPoints: number;
}

export interface ParsedGame {
  sets: SetResult[];
  sideASetsWon: number;
  sideBSetsWon: number;
  winnerSide: WinnerSide;
  isWalkover: boolean;
}

export type ScoreDiagnosticKind = "malformed" | "level";

/**
 * A set token the parser could not count. Malformed tokens are dropped;
 * level tokens stay in `sets` but count for neither side.
 */
export interface ScoreDiagnostic {
  kind: ScoreDiagnosticKind;
  token: string;
  /** 1-based index of the token in the raw score string */
  position: number;
  message: string;
}

export interface ScoreParseResult {
  game: ParsedGame;
  diagnostics: ScoreDiagnostic[];
}

/* ── Aggregation ──────────────────────────────────────────── */

/**
 * One singles game, already normalized by a data source.
 * Names are optional: the engine only needs ids.
 */
export interface GameRecord {
  gameId: string;
  playerAId: string;
  playerBId: string;
  playerAName?: string;
  playerBName?: string;
  winnerSide: WinnerSide;
  completionState: CompletionState;
  /** Seconds since epoch */
  timestamp: number;
}

export interface PlayerStats {
  playerId: string;
  playerName: string;
  gamesPlayed: number;
  wins: number;
  losses: number;
  /** 0-100, null while gamesPlayed is 0 */
  winRate: number | null;
  lastGameId: string | null;
}

export type ExclusionReason = "not-finished" | "indeterminate-winner";

export interface ExcludedGame {
  gameId: string;
  reason: ExclusionReason;
}

export interface AggregationResult {
  players: Map<string, PlayerStats>;
  excluded: ExcludedGame[];
}

/** Internal accumulator used during aggregation. */
export interface PlayerAccumulator {
  playerId: string;
  playerName: string;
  /** Position of the record the name came from; null until a named record is seen */
  nameFrom: Readonly<{ timestamp: number; gameId: string }> | null;
  gamesPlayed: number;
  wins: number;
  losses: number;
  lastGame: Readonly<{ timestamp: number; gameId: string }> | null;
}

/* ── Leaderboard ──────────────────────────────────────────── */

export interface LeaderboardOptions {
  /** Players below this many counted games are left out */
  minGames: number;
  /** Maximum number of entries returned */
  topN: number;
}

export interface LeaderboardEntry extends PlayerStats {
  rank: number;
  winRate: number;
}

export interface StatsSummary {
  players: number;
  playersWithGames: number;
  gamesCounted: number;
}
