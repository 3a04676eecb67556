/**
 * Which saved games are usable for rating calculations.
 */

import { UNKNOWN_PLAYER_NAME } from "@ttstats/core";
import type { GameRecord } from "@ttstats/core";

export interface ReadinessReport {
  total: number;
  /** Finished, winner known, both players named */
  ready: number;
  notFinished: number;
  unknownWinner: number;
  unnamedPlayers: number;
}

function isNamed(name: string | undefined): boolean {
  const trimmed = name?.trim();
  return !!trimmed && trimmed !== UNKNOWN_PLAYER_NAME;
}

/** Each game is counted once, under the first check it fails. */
export function checkRatingReadiness(games: GameRecord[]): ReadinessReport {
  const report: ReadinessReport = {
    total: games.length,
    ready: 0,
    notFinished: 0,
    unknownWinner: 0,
    unnamedPlayers: 0,
  };

  for (const game of games) {
    if (game.completionState !== "Finished") report.notFinished++;
    else if (game.winnerSide === null) report.unknownWinner++;
    else if (!isNamed(game.playerAName) || !isNamed(game.playerBName)) report.unnamedPlayers++;
    else report.ready++;
  }
  return report;
}
