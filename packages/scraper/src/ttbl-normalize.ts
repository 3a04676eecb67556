/**
 * TTBL match JSON → GameRecords, summaries and lineup players.
 */

import type { GameRecord, WinnerSide } from "@ttstats/core";
import { cleanId, cleanText, emptyBatch, toEpochSeconds } from "./records";
import type { NormalizedBatch } from "./records";
import type {
  TtblLineupPlayer,
  TtblMatch,
  TtblMatchSummary,
  TtblPlayer,
  TtblTeam,
  TtblTeamSummary,
} from "./ttbl-types";

/** "Home" → A, "Away" → B; anything else is undecided. */
export function ttblWinnerSide(winnerSide: string | null | undefined): WinnerSide {
  if (winnerSide === "Home") return "A";
  if (winnerSide === "Away") return "B";
  return null;
}

export function ttblPlayerName(player: TtblPlayer | null | undefined): string | undefined {
  if (!player) return undefined;
  const name = `${player.firstName ?? ""} ${player.lastName ?? ""}`.trim();
  return name || undefined;
}

/**
 * One GameRecord per singles game in the match.
 *
 * Games are keyed "<matchId>:<index>" and stamped with the match time.
 * Games without both player ids (unfilled lineup slots) are skipped.
 */
export function normalizeTtblMatch(matchId: string, match: TtblMatch): NormalizedBatch {
  const batch = emptyBatch();
  const timestamp = toEpochSeconds(match.timeStamp);

  (match.games ?? []).forEach((game, i) => {
    const gameId = `${matchId}:${game.index ?? i + 1}`;
    const home = game.homePlayer ?? game.homeLeaguePlayer;
    const away = game.awayPlayer ?? game.awayLeaguePlayer;
    const homeId = cleanId(home?.id);
    const awayId = cleanId(away?.id);

    if (!homeId || !awayId) {
      batch.skipped.push({
        source: "ttbl",
        ref: gameId,
        reason: !homeId && !awayId ? "missing both player ids" : `missing ${homeId ? "away" : "home"} player id`,
      });
      return;
    }

    const record: GameRecord = {
      gameId,
      playerAId: homeId,
      playerBId: awayId,
      playerAName: ttblPlayerName(home),
      playerBName: ttblPlayerName(away),
      winnerSide: ttblWinnerSide(game.winnerSide),
      completionState: game.gameState === "Finished" ? "Finished" : "NotFinished",
      timestamp,
    };
    batch.games.push(record);
  });

  return batch;
}

function summarizeTeam(
  team: TtblTeam | null | undefined,
  gameWins: number | null | undefined,
  setWins: number | null | undefined
): TtblTeamSummary {
  return {
    id: cleanId(team?.id),
    name: cleanText(team?.name),
    rank: team?.rank ?? null,
    gameWins: gameWins ?? null,
    setWins: setWins ?? null,
  };
}

export function summarizeTtblMatch(matchId: string, match: TtblMatch): TtblMatchSummary {
  return {
    matchId,
    matchState: match.matchState ?? null,
    gameday: cleanText(match.gameday?.name),
    timestamp: match.timeStamp ?? null,
    homeTeam: summarizeTeam(match.homeTeam, match.homeGameWins, match.homeSetWins),
    awayTeam: summarizeTeam(match.awayTeam, match.awayGameWins, match.awaySetWins),
    gamesCount: match.games?.length ?? 0,
    venue: cleanText(match.venue?.name),
  };
}

/** Match count per matchState, most common first. */
export function countMatchStates(
  summaries: TtblMatchSummary[]
): { state: string; count: number }[] {
  const counts = new Map<string, number>();
  for (const s of summaries) {
    const state = s.matchState ?? "Unknown";
    counts.set(state, (counts.get(state) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .map(([state, count]) => ({ state, count }))
    .sort((a, b) => b.count - a.count || a.state.localeCompare(b.state));
}

/**
 * Unique players from the announced lineups (three per team),
 * first appearance wins.
 */
export function collectTtblPlayers(
  matches: Array<{ matchId: string; match: TtblMatch }>
): TtblLineupPlayer[] {
  const players = new Map<string, TtblLineupPlayer>();

  for (const { matchId, match } of matches) {
    const lineup = [
      match.homePlayerOne,
      match.homePlayerTwo,
      match.homePlayerThree,
      match.guestPlayerOne,
      match.guestPlayerTwo,
      match.guestPlayerThree,
    ];
    for (const player of lineup) {
      const id = cleanId(player?.id);
      if (!player || !id || players.has(id)) continue;
      players.set(id, {
        id,
        firstName: cleanText(player.firstName),
        lastName: cleanText(player.lastName),
        imageUrl: cleanText(player.imageUrl),
        matchId,
      });
    }
  }

  return Array.from(players.values());
}
