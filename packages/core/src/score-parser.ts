/**
 * Set-score parsing: "3:11 3:11 8:11 11:8" → per-set results + winner.
 *
 * Source data has trailing garbage and half-entered scores, so a bad token
 * never aborts the game. It is skipped and reported in `diagnostics`, and
 * the caller decides whether the game is still usable.
 */

import type {
  ParsedGame,
  ScoreDiagnostic,
  ScoreParseResult,
  SetResult,
  WinnerSide,
} from "./types";

const POINTS_PATTERN = /^\d+$/;

/** Split on runs of whitespace, dropping the empty tokens. */
export function tokenizeScore(raw: string): string[] {
  return raw.split(/\s+/).filter((token) => token.length > 0);
}

function parsePoints(part: string): number | null {
  if (!POINTS_PATTERN.test(part)) return null;
  const n = Number(part);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Parse a single "a:b" token. Returns null unless the token has exactly
 * one colon and both halves are non-negative integers.
 */
export function parseSetToken(
  token: string
): { sideAPoints: number; sideBPoints: number } | null {
  const parts = token.split(":");
  if (parts.length !== 2) return null;
  const sideAPoints = parsePoints(parts[0]);
  const sideBPoints = parsePoints(parts[1]);
  if (sideAPoints === null || sideBPoints === null) return null;
  return { sideAPoints, sideBPoints };
}

function decideWinner(sideASetsWon: number, sideBSetsWon: number): WinnerSide {
  if (sideASetsWon > sideBSetsWon) return "A";
  if (sideBSetsWon > sideASetsWon) return "B";
  return null;
}

/**
 * Parse a whitespace-separated score string into a ParsedGame.
 *
 * @param options.walkover Force the walkover flag, e.g. from a source's own
 *   "wo" column. A game with no parseable sets is always a walkover.
 */
export function parseGameScore(
  raw: string,
  options: { walkover?: boolean } = {}
): ScoreParseResult {
  const sets: SetResult[] = [];
  const diagnostics: ScoreDiagnostic[] = [];
  let sideASetsWon = 0;
  let sideBSetsWon = 0;

  const tokens = tokenizeScore(raw);
  tokens.forEach((token, i) => {
    const position = i + 1;
    const points = parseSetToken(token);

    if (!points) {
      diagnostics.push({
        kind: "malformed",
        token,
        position,
        message: `Set token "${token}" is not of the form <points>:<points>`,
      });
      return;
    }

    sets.push({ setNumber: sets.length + 1, ...points });

    if (points.sideAPoints > points.sideBPoints) sideASetsWon++;
    else if (points.sideBPoints > points.sideAPoints) sideBSetsWon++;
    else {
      diagnostics.push({
        kind: "level",
        token,
        position,
        message: `Set token "${token}" has level points and counts for neither side`,
      });
    }
  });

  const game: ParsedGame = {
    sets,
    sideASetsWon,
    sideBSetsWon,
    winnerSide: decideWinner(sideASetsWon, sideBSetsWon),
    isWalkover: options.walkover === true || sets.length === 0,
  };

  return { game, diagnostics };
}

/** Render sets back to "a:b a:b" form. */
export function formatScore(sets: SetResult[]): string {
  return sets.map((s) => `${s.sideAPoints}:${s.sideBPoints}`).join(" ");
}
