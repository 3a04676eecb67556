/**
 * Shared tail of every command: aggregate the normalized batch, rank it,
 * write the run files and print what happened.
 */

import { aggregate, leaderboard, summarizeStats } from "@ttstats/core";
import type { LeaderboardOptions } from "@ttstats/core";
import { formatLeaderboard, formatRunSummary } from "./format";
import { writeRunOutputs } from "./output";
import type { RunOutputs, RunSource } from "./output";
import type { NormalizedBatch } from "./records";

export function buildRun(
  source: RunSource,
  batch: NormalizedBatch,
  options: LeaderboardOptions,
  details?: Record<string, unknown>
): RunOutputs {
  const result = aggregate(batch.games);
  return {
    source,
    games: batch.games,
    result,
    leaderboard: leaderboard(result.players, options),
    options,
    skipped: batch.skipped,
    diagnostics: batch.diagnostics,
    details,
  };
}

/** Per-record lines for skipped rows and score diagnostics (--verbose). */
export function describeProblems(run: RunOutputs): string[] {
  return [
    ...run.skipped.map((s) => `  Skipped ${s.source} ${s.ref}: ${s.reason}`),
    ...run.diagnostics.map((d) => `  Score ${d.gameId} #${d.position}: ${d.message}`),
  ];
}

export function reportRun(run: RunOutputs, outDir: string, verbose: boolean): void {
  if (verbose) {
    for (const line of describeProblems(run)) console.log(line);
  }

  const paths = writeRunOutputs(outDir, run);

  console.log(
    formatRunSummary(
      summarizeStats(run.result.players),
      {
        gameRecords: run.games.length,
        excluded: run.result.excluded.length,
        skipped: run.skipped.length,
        diagnostics: run.diagnostics.length,
      }
    )
  );
  console.log(formatLeaderboard(run.leaderboard, run.options));
  console.log(`Saved ${paths.length} files to ${outDir}`);
}
