/**
 * Fabrik match rows → GameRecords, match summaries and a player directory.
 */

import { formatScore, parseGameScore } from "@ttstats/core";
import type { GameRecord } from "@ttstats/core";
import { cleanId, cleanText, emptyBatch } from "./records";
import type { NormalizedBatch, RecordDiagnostic, SkippedRecord } from "./records";
import type { FabrikMatch, FabrikPlayer, FabrikPlayerRef, FabrikRow } from "./fabrik-types";

export type FabrikRowResult =
  | { kind: "game"; record: GameRecord; match: FabrikMatch; diagnostics: RecordDiagnostic[] }
  | { kind: "skipped"; skipped: SkippedRecord };

export interface FabrikBatch extends NormalizedBatch {
  matches: FabrikMatch[];
}

function toInt(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const n = Number.parseInt(String(value).trim(), 10);
  return Number.isNaN(n) ? null : n;
}

/** The wo column arrives as 0/1, "0"/"1", a boolean, or blank. */
export function isWalkoverFlag(value: string | number | boolean | null | undefined): boolean {
  if (typeof value === "boolean") return value;
  if (value === null || value === undefined) return false;
  const str = String(value).trim();
  return str !== "" && str !== "0" && str.toLowerCase() !== "false";
}

const MIN_YEAR = 1900;
const MAX_YEAR = 9999;

/** A four-digit calendar year from a year column, else null. */
export function toYear(value: string | number | null | undefined): number | null {
  const year = toInt(value);
  return year !== null && year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
}

/** 1 January of the year, in UTC seconds; 0 when the year is unknown. */
export function yearTimestamp(year: number | null): number {
  if (year === null) return 0;
  const seconds = Date.UTC(year, 0, 1) / 1000;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : 0;
}

/**
 * A row becomes one GameRecord: player A is side A, player X is side B.
 *
 * The list only holds played results, so every row is Finished. A
 * walkover carries no decided winner and is left for the aggregator
 * to exclude.
 */
export function normalizeFabrikRow(row: FabrikRow): FabrikRowResult {
  const matchId = cleanId(row.vw_matches___id);
  const aId = cleanId(row.vw_matches___player_a_id);
  const xId = cleanId(row.vw_matches___player_x_id);

  if (!matchId) {
    return {
      kind: "skipped",
      skipped: {
        source: "fabrik",
        ref: `${aId ?? "?"} vs ${xId ?? "?"}`,
        reason: "missing match id",
      },
    };
  }
  if (!aId || !xId) {
    return {
      kind: "skipped",
      skipped: {
        source: "fabrik",
        ref: matchId,
        reason: !aId && !xId ? "missing both player ids" : `missing player ${aId ? "X" : "A"} id`,
      },
    };
  }

  const walkover = isWalkoverFlag(row.vw_matches___wo);
  const { game, diagnostics } = parseGameScore(row.vw_matches___games_raw ?? "", { walkover });
  const year = toYear(row.vw_matches___yr_raw) ?? toYear(row.vw_matches___yr);

  const a: FabrikPlayerRef = {
    ittfId: aId,
    name: cleanText(row.vw_matches___name_a),
    association: cleanText(row.vw_matches___assoc_a),
  };
  const x: FabrikPlayerRef = {
    ittfId: xId,
    name: cleanText(row.vw_matches___name_x),
    association: cleanText(row.vw_matches___assoc_x),
  };

  const record: GameRecord = {
    gameId: matchId,
    playerAId: aId,
    playerBId: xId,
    playerAName: a.name ?? undefined,
    playerBName: x.name ?? undefined,
    winnerSide: game.isWalkover ? null : game.winnerSide,
    completionState: "Finished",
    timestamp: yearTimestamp(year),
  };

  const tournament = row.vw_matches___tournament_id;
  const match: FabrikMatch = {
    matchId,
    year,
    tournament: tournament === null || tournament === undefined ? null : String(tournament),
    event: cleanText(row.vw_matches___event),
    stage: cleanText(row.vw_matches___stage),
    round: cleanText(row.vw_matches___round),
    walkover: game.isWalkover,
    winnerRaw: toInt(row.vw_matches___winner),
    winnerInferred: game.winnerSide,
    finalSets: { a: game.sideASetsWon, x: game.sideBSetsWon },
    score: formatScore(game.sets),
    sets: game.sets,
    players: { a, x },
  };

  return {
    kind: "game",
    record,
    match,
    diagnostics: diagnostics.map((d) => ({ ...d, gameId: matchId })),
  };
}

export function normalizeFabrikRows(rows: FabrikRow[]): FabrikBatch {
  const batch: FabrikBatch = { ...emptyBatch(), matches: [] };
  for (const row of rows) {
    const result = normalizeFabrikRow(row);
    if (result.kind === "skipped") {
      batch.skipped.push(result.skipped);
      continue;
    }
    batch.games.push(result.record);
    batch.matches.push(result.match);
    batch.diagnostics.push(...result.diagnostics);
  }
  return batch;
}

function isCapsToken(token: string): boolean {
  return token === token.toUpperCase() && token !== token.toLowerCase();
}

/**
 * Split a results-site name into first and last name.
 * Names are usually "LASTNAME Firstname": the first all-caps token is the
 * last name, otherwise the final token is.
 */
export function splitPlayerName(fullName: string | null | undefined): {
  firstName: string | null;
  lastName: string | null;
  fullName: string | null;
} {
  const full = cleanText(fullName);
  if (!full) return { firstName: null, lastName: null, fullName: null };

  const parts = full.split(/\s+/);
  if (parts.length === 1) return { firstName: null, lastName: parts[0], fullName: full };

  const capsIndex = parts.findIndex(isCapsToken);
  const lastIndex = capsIndex === -1 ? parts.length - 1 : capsIndex;
  const first = parts.filter((_, i) => i !== lastIndex).join(" ");
  return { firstName: first || null, lastName: parts[lastIndex], fullName: full };
}

/**
 * Every player seen in the matches, keyed by ITTF id.
 * The first non-blank name and association seen for a player are kept.
 */
export function buildPlayerDirectory(matches: FabrikMatch[]): Map<string, FabrikPlayer> {
  const players = new Map<string, FabrikPlayer>();

  const upsert = (ref: FabrikPlayerRef) => {
    let player = players.get(ref.ittfId);
    if (!player) {
      player = {
        ittfId: ref.ittfId,
        fullName: null,
        firstName: null,
        lastName: null,
        association: null,
        appearances: 0,
      };
      players.set(ref.ittfId, player);
    }
    player.appearances++;
    if (!player.fullName && ref.name) {
      const split = splitPlayerName(ref.name);
      player.fullName = split.fullName;
      player.firstName = split.firstName;
      player.lastName = split.lastName;
    }
    if (!player.association && ref.association) player.association = ref.association;
  };

  for (const match of matches) {
    upsert(match.players.a);
    upsert(match.players.x);
  }
  return players;
}

/** Player id → ids of the matches they played, in input order. */
export function buildPlayerMatchIndex(matches: FabrikMatch[]): Record<string, string[]> {
  const index = new Map<string, string[]>();
  for (const match of matches) {
    const ids = new Set([match.players.a.ittfId, match.players.x.ittfId]);
    for (const id of ids) {
      const list = index.get(id);
      if (list) list.push(match.matchId);
      else index.set(id, [match.matchId]);
    }
  }
  return Object.fromEntries(index);
}
