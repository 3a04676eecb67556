// --- Score parsing ---
export {
  parseGameScore,
  parseSetToken,
  tokenizeScore,
  formatScore,
} from "./score-parser";

// --- Aggregation ---
export {
  aggregate,
  createAggregator,
  computeWinRate,
  summarizeStats,
  compareIds,
  UNKNOWN_PLAYER_NAME,
} from "./aggregate";
export type { Aggregator } from "./aggregate";
export { leaderboard, compareLeaderboardOrder } from "./leaderboard";

// --- Configuration ---
export { DEFAULT_LEADERBOARD_OPTIONS, resolveLeaderboardOptions } from "./config";

// --- Types ---
export type {
  Side,
  WinnerSide,
  CompletionState,
  SetResult,
  ParsedGame,
  ScoreDiagnostic,
  ScoreDiagnosticKind,
  ScoreParseResult,
  GameRecord,
  PlayerStats,
  PlayerAccumulator,
  ExcludedGame,
  ExclusionReason,
  AggregationResult,
  LeaderboardOptions,
  LeaderboardEntry,
  StatsSummary,
} from "./types";
