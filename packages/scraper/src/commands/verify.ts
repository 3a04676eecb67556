/**
 * verify command: checks how many saved games can feed a rating calculation.
 */

import { formatReadiness } from "../format";
import { readGames } from "../output";
import { checkRatingReadiness } from "../verify";

export function verify(options: { input: string }) {
  const games = readGames(options.input);
  console.log(`\nChecking ${games.length} games from ${options.input}`);
  console.log(formatReadiness(checkRatingReadiness(games)));
}
