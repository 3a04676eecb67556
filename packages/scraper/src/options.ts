/**
 * Parsing for CLI flag values. commander hands every value over as a string.
 */

import { DEFAULT_LEADERBOARD_OPTIONS, resolveLeaderboardOptions } from "@ttstats/core";
import type { LeaderboardOptions } from "@ttstats/core";

/**
 * @throws RangeError when the value is not an integer of at least `min`
 */
export function parseIntOption(value: string, flag: string, min = 0): number {
  const trimmed = value.trim();
  const n = /^-?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(n) || n < min) {
    throw new RangeError(`${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return n;
}

/** Like parseIntOption, but an absent flag gives `fallback`. */
export function intOption(
  value: string | undefined,
  flag: string,
  fallback: number,
  min = 0
): number {
  return value === undefined ? fallback : parseIntOption(value, flag, min);
}

/** `--min-games` and `--top`, each defaulting to the core leaderboard defaults. */
export function leaderboardOptionsFromFlags(flags: {
  minGames?: string;
  top?: string;
}): LeaderboardOptions {
  return resolveLeaderboardOptions({
    minGames: intOption(flags.minGames, "--min-games", DEFAULT_LEADERBOARD_OPTIONS.minGames),
    topN: intOption(flags.top, "--top", DEFAULT_LEADERBOARD_OPTIONS.topN, 1),
  });
}

export function parseSeason(value: string): string {
  const match = /^(\d{4})-(\d{4})$/.exec(value.trim());
  if (!match || Number(match[2]) !== Number(match[1]) + 1) {
    throw new RangeError(`--season must look like 2025-2026, got "${value}"`);
  }
  return match[0];
}

/**
 * Years from `--years 2023,2024` or an inclusive `--start-year/--end-year`
 * range; a missing bound is the current UTC year. Returns unique years,
 * ascending.
 */
export function parseYears(
  options: { years?: string; startYear?: string; endYear?: string },
  now: Date = new Date()
): number[] {
  if (options.years !== undefined) {
    const years = options.years
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)
      .map((s) => parseIntOption(s, "--years", 1900));
    if (years.length === 0) throw new RangeError("--years must name at least one year");
    return Array.from(new Set(years)).sort((a, b) => a - b);
  }

  const currentYear = now.getUTCFullYear();
  const start = intOption(options.startYear, "--start-year", currentYear, 1900);
  const end = intOption(options.endYear, "--end-year", currentYear, 1900);
  if (end < start) {
    throw new RangeError(`--end-year (${end}) is before --start-year (${start})`);
  }
  return Array.from({ length: end - start + 1 }, (_, i) => start + i);
}
