/**
 * ITTF results site (Fabrik list view) row shapes.
 *
 * Fabrik serializes the same column as a string on one row and a number
 * on the next, so id-like columns accept both.
 */

import { z } from "zod";
import type { SetResult, WinnerSide } from "@ttstats/core";

const idLike = z.union([z.string(), z.number()]);

export const fabrikRowSchema = z
  .object({
    vw_matches___id: idLike.nullish(),
    vw_matches___player_a_id: idLike.nullish(),
    vw_matches___player_x_id: idLike.nullish(),
    vw_matches___name_a: z.string().nullish(),
    vw_matches___name_x: z.string().nullish(),
    vw_matches___assoc_a: z.string().nullish(),
    vw_matches___assoc_x: z.string().nullish(),
    vw_matches___tournament_id: idLike.nullish(),
    vw_matches___event: z.string().nullish(),
    vw_matches___stage: z.string().nullish(),
    vw_matches___round: z.string().nullish(),
    vw_matches___yr: idLike.nullish(),
    vw_matches___yr_raw: idLike.nullish(),
    vw_matches___games_raw: z.string().nullish(),
    vw_matches___winner: idLike.nullish(),
    vw_matches___wo: z.union([idLike, z.boolean()]).nullish(),
  })
  .passthrough();

export type FabrikRow = z.infer<typeof fabrikRowSchema>;

export interface FabrikPlayerRef {
  ittfId: string;
  name: string | null;
  association: string | null;
}

/** One normalized match row, as written to matches.json. */
export interface FabrikMatch {
  matchId: string;
  year: number | null;
  tournament: string | null;
  event: string | null;
  stage: string | null;
  round: string | null;
  walkover: boolean;
  /** The source's own winner column, unverified */
  winnerRaw: number | null;
  /** Winner according to the parsed set scores */
  winnerInferred: WinnerSide;
  finalSets: { a: number; x: number };
  /** Parsed sets as "a:b a:b", unreadable tokens dropped */
  score: string;
  sets: SetResult[];
  players: { a: FabrikPlayerRef; x: FabrikPlayerRef };
}

export interface FabrikPlayer {
  ittfId: string;
  fullName: string | null;
  firstName: string | null;
  lastName: string | null;
  association: string | null;
  /** Rows the player appears in, counted or not */
  appearances: number;
}

export type FabrikStopReason = "empty-page" | "stagnant" | "max-pages";

export interface FabrikYearResult {
  year: number;
  rows: FabrikRow[];
  pages: number;
  invalidRows: number;
  stopReason: FabrikStopReason;
}
