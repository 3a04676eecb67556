import type { LeaderboardOptions } from "./types";

/**
 * Default leaderboard cut: at least 5 counted games, top 20.
 * Callers pass overrides; nothing in the core reads these implicitly.
 */
export const DEFAULT_LEADERBOARD_OPTIONS: LeaderboardOptions = {
  minGames: 5,
  topN: 20,
};

/**
 * Merge partial options over the defaults and reject values that can
 * only come from a programming error.
 *
 * @throws RangeError if minGames is not a non-negative integer or topN is
 *   not a positive integer
 */
export function resolveLeaderboardOptions(
  partial: Partial<LeaderboardOptions> | undefined
): LeaderboardOptions {
  const options: LeaderboardOptions = {
    minGames: partial?.minGames ?? DEFAULT_LEADERBOARD_OPTIONS.minGames,
    topN: partial?.topN ?? DEFAULT_LEADERBOARD_OPTIONS.topN,
  };

  if (!Number.isInteger(options.minGames) || options.minGames < 0) {
    throw new RangeError(
      `minGames must be a non-negative integer, got ${options.minGames}`
    );
  }
  if (!Number.isInteger(options.topN) || options.topN <= 0) {
    throw new RangeError(`topN must be a positive integer, got ${options.topN}`);
  }

  return options;
}
