/**
 * Shared shapes and helpers for turning source rows into GameRecords.
 */

import type { GameRecord, ScoreDiagnostic } from "@ttstats/core";

/** A source row that could not become a GameRecord. */
export interface SkippedRecord {
  source: "ttbl" | "fabrik";
  /** Best available identifier for the row */
  ref: string;
  reason: string;
}

/** A score diagnostic tied back to the game it came from. */
export interface RecordDiagnostic extends ScoreDiagnostic {
  gameId: string;
}

export interface NormalizedBatch {
  games: GameRecord[];
  skipped: SkippedRecord[];
  diagnostics: RecordDiagnostic[];
}

export function emptyBatch(): NormalizedBatch {
  return { games: [], skipped: [], diagnostics: [] };
}

export function appendBatch(target: NormalizedBatch, batch: NormalizedBatch): void {
  target.games.push(...batch.games);
  target.skipped.push(...batch.skipped);
  target.diagnostics.push(...batch.diagnostics);
}

/**
 * Normalize an id-like value: trims strings, stringifies numbers,
 * and treats "", "0" placeholders and a literal "null" as missing.
 */
export function cleanId(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const str = String(value).trim();
  if (!str || str === "null" || str === "0") return null;
  return str;
}

/** Trimmed text, or null when blank. */
export function cleanText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Source timestamps arrive as seconds or milliseconds since epoch.
 * Anything past 1e11 is taken as milliseconds (1e11 s is year 5138).
 */
export function toEpochSeconds(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value > 1e11 ? value / 1000 : value);
}
