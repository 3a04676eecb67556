/**
 * CLI output formatting: leaderboard table and run summaries.
 */

import type { LeaderboardEntry, LeaderboardOptions, StatsSummary } from "@ttstats/core";
import type { ReadinessReport } from "./verify";

const RULE = "─";

// ── Leaderboard table ───────────────────────────────────────────────

export function formatLeaderboard(
  entries: LeaderboardEntry[],
  options: LeaderboardOptions
): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(`  Leaderboard (min ${options.minGames} games, top ${options.topN})`);
  lines.push("  " + RULE.repeat(60));

  if (entries.length === 0) {
    lines.push("  No players qualify.");
    lines.push("");
    return lines.join("\n");
  }

  lines.push("  Rank  Player                          Games  Wins  Loss   Win%");
  for (const e of entries) {
    lines.push(
      `  ${String(e.rank).padStart(4)}  ${e.playerName.slice(0, 30).padEnd(30)}  ${String(e.gamesPlayed).padStart(5)}  ${String(e.wins).padStart(4)}  ${String(e.losses).padStart(4)}  ${String(e.winRate).padStart(4)}%`
    );
  }
  lines.push("");
  return lines.join("\n");
}

// ── Run summary ─────────────────────────────────────────────────────

export function formatRunSummary(
  summary: StatsSummary,
  counts: { gameRecords: number; excluded: number; skipped: number; diagnostics: number }
): string {
  const lines: string[] = [];
  lines.push("");
  lines.push("  Run Summary");
  lines.push("  " + RULE.repeat(40));
  lines.push(`  Game records:         ${counts.gameRecords}`);
  lines.push(`  Games counted:        ${summary.gamesCounted}`);
  lines.push(`  Games excluded:       ${counts.excluded}`);
  lines.push(`  Records skipped:      ${counts.skipped}`);
  lines.push(`  Score diagnostics:    ${counts.diagnostics}`);
  lines.push(`  Players:              ${summary.players}`);
  lines.push(`  Players with games:   ${summary.playersWithGames}`);
  return lines.join("\n");
}

// ── Rating readiness ────────────────────────────────────────────────

export function formatReadiness(report: ReadinessReport): string {
  const lines: string[] = [];
  lines.push("");
  lines.push("  Valid games for rating calculation");
  lines.push("  " + RULE.repeat(40));
  lines.push(`  Valid:                ${report.ready}`);
  lines.push(`  Total in dataset:     ${report.total}`);
  lines.push(`  Not finished:         ${report.notFinished}`);
  lines.push(`  Winner unknown:       ${report.unknownWinner}`);
  lines.push(`  Player unnamed:       ${report.unnamedPlayers}`);
  lines.push("");
  lines.push(
    report.ready > 0
      ? `  Ready: ${report.ready} games available for rating calculation.`
      : "  Not ready: no valid games for rating calculation."
  );
  return lines.join("\n");
}
