/**
 * Run artifacts on disk: games, stats, leaderboard, exclusions,
 * diagnostics and run metadata, one JSON file each.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import { compareIds, summarizeStats } from "@ttstats/core";
import type {
  AggregationResult,
  GameRecord,
  LeaderboardEntry,
  LeaderboardOptions,
  PlayerStats,
  StatsSummary,
} from "@ttstats/core";
import type { RecordDiagnostic, SkippedRecord } from "./records";

export type RunSource = "ttbl" | "fabrik" | "stats";

export interface RunOutputs {
  source: RunSource;
  games: GameRecord[];
  result: AggregationResult;
  leaderboard: LeaderboardEntry[];
  options: LeaderboardOptions;
  skipped: SkippedRecord[];
  diagnostics: RecordDiagnostic[];
  /** Source-specific fields merged into metadata.json */
  details?: Record<string, unknown>;
}

export interface RunMetadata {
  source: RunSource;
  generatedAt: string;
  leaderboardOptions: LeaderboardOptions;
  summary: StatsSummary;
  gameRecords: number;
  excludedGames: number;
  skippedRecords: number;
  scoreDiagnostics: number;
  leaderboardEntries: number;
  [key: string]: unknown;
}

export const RUN_FILES = {
  games: "games.json",
  playerStats: "player-stats.json",
  leaderboard: "leaderboard.json",
  excluded: "excluded.json",
  diagnostics: "diagnostics.json",
  metadata: "metadata.json",
} as const;

export function writeJson(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n");
}

/** Stats table as an array: best win rate first, players without games last. */
export function serializeStats(players: ReadonlyMap<string, PlayerStats>): PlayerStats[] {
  return Array.from(players.values()).sort((a, b) => {
    if (a.winRate !== b.winRate) {
      if (a.winRate === null) return 1;
      if (b.winRate === null) return -1;
      return b.winRate - a.winRate;
    }
    return compareIds(a.playerId, b.playerId);
  });
}

export function buildMetadata(run: RunOutputs, now: Date = new Date()): RunMetadata {
  return {
    ...run.details,
    source: run.source,
    generatedAt: now.toISOString(),
    leaderboardOptions: run.options,
    summary: summarizeStats(run.result.players),
    gameRecords: run.games.length,
    excludedGames: run.result.excluded.length,
    skippedRecords: run.skipped.length,
    scoreDiagnostics: run.diagnostics.length,
    leaderboardEntries: run.leaderboard.length,
  };
}

/** Write every run file into `dir` and return the paths written. */
export function writeRunOutputs(dir: string, run: RunOutputs, now?: Date): string[] {
  const files: Array<[string, unknown]> = [
    [RUN_FILES.games, run.games],
    [RUN_FILES.playerStats, serializeStats(run.result.players)],
    [RUN_FILES.leaderboard, run.leaderboard],
    [RUN_FILES.excluded, { games: run.result.excluded, skippedRecords: run.skipped }],
    [RUN_FILES.diagnostics, run.diagnostics],
    [RUN_FILES.metadata, buildMetadata(run, now)],
  ];

  return files.map(([name, value]) => {
    const path = join(dir, name);
    writeJson(path, value);
    return path;
  });
}

const gameRecordSchema = z.object({
  gameId: z.string().min(1),
  playerAId: z.string().min(1),
  playerBId: z.string().min(1),
  playerAName: z.string().optional(),
  playerBName: z.string().optional(),
  winnerSide: z.enum(["A", "B"]).nullable(),
  completionState: z.enum(["Finished", "NotFinished"]),
  timestamp: z.number().nonnegative(),
});

/**
 * Load a games.json written by an earlier run.
 *
 * @throws Error when the file is not JSON or a record does not match
 */
export function readGames(path: string): GameRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${path}: ${reason}`);
  }

  const parsed = z.array(gameRecordSchema).safeParse(data);
  if (!parsed.success) {
    const messages = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid games file ${path}: ${messages.join("; ")}`);
  }
  return parsed.data;
}
