/**
 * TTBL (German Bundesliga) match API shapes.
 *
 * Only the fields we read are declared; everything else passes through
 * so raw matches can be saved to disk unchanged.
 */

import { z } from "zod";

export const ttblPlayerSchema = z
  .object({
    id: z.string().nullish(),
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
    imageUrl: z.string().nullish(),
  })
  .passthrough();

export const ttblTeamSchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    rank: z.number().nullish(),
  })
  .passthrough();

export const ttblGameSchema = z
  .object({
    index: z.number().nullish(),
    gameState: z.string().nullish(),
    /** "Home" | "Away" once decided */
    winnerSide: z.string().nullish(),
    homePlayer: ttblPlayerSchema.nullish(),
    homeLeaguePlayer: ttblPlayerSchema.nullish(),
    awayPlayer: ttblPlayerSchema.nullish(),
    awayLeaguePlayer: ttblPlayerSchema.nullish(),
  })
  .passthrough();

export const ttblMatchSchema = z
  .object({
    id: z.string().nullish(),
    matchState: z.string().nullish(),
    timeStamp: z.number().nullish(),
    gameday: z.object({ name: z.string().nullish() }).passthrough().nullish(),
    homeTeam: ttblTeamSchema.nullish(),
    awayTeam: ttblTeamSchema.nullish(),
    homeGameWins: z.number().nullish(),
    awayGameWins: z.number().nullish(),
    homeSetWins: z.number().nullish(),
    awaySetWins: z.number().nullish(),
    venue: z.object({ name: z.string().nullish() }).passthrough().nullish(),
    games: z.array(ttblGameSchema).nullish(),
    homePlayerOne: ttblPlayerSchema.nullish(),
    homePlayerTwo: ttblPlayerSchema.nullish(),
    homePlayerThree: ttblPlayerSchema.nullish(),
    guestPlayerOne: ttblPlayerSchema.nullish(),
    guestPlayerTwo: ttblPlayerSchema.nullish(),
    guestPlayerThree: ttblPlayerSchema.nullish(),
  })
  .passthrough();

export type TtblPlayer = z.infer<typeof ttblPlayerSchema>;
export type TtblTeam = z.infer<typeof ttblTeamSchema>;
export type TtblGame = z.infer<typeof ttblGameSchema>;
export type TtblMatch = z.infer<typeof ttblMatchSchema>;

export interface TtblTeamSummary {
  id: string | null;
  name: string | null;
  rank: number | null;
  gameWins: number | null;
  setWins: number | null;
}

export interface TtblMatchSummary {
  matchId: string;
  matchState: string | null;
  gameday: string | null;
  timestamp: number | null;
  homeTeam: TtblTeamSummary;
  awayTeam: TtblTeamSummary;
  gamesCount: number;
  venue: string | null;
}

export interface TtblLineupPlayer {
  id: string;
  firstName: string | null;
  lastName: string | null;
  imageUrl: string | null;
  /** Match the player was first seen in */
  matchId: string;
}
