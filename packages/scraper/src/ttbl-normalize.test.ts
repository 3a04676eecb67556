import { describe, it, expect } from "vitest";
import {
  collectTtblPlayers,
  countMatchStates,
  normalizeTtblMatch,
  summarizeTtblMatch,
  ttblWinnerSide,
} from "./ttbl-normalize";
import type { TtblMatch, TtblMatchSummary } from "./ttbl-types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function player(id: string, firstName: string, lastName: string) {
  return { id, firstName, lastName };
}

const match: TtblMatch = {
  id: "m-1",
  matchState: "Finished",
  timeStamp: 1_700_000_000_000,
  gameday: { name: "3. Spieltag" },
  homeTeam: { id: "t-home", name: "Home Club", rank: 2 },
  awayTeam: { id: "t-away", name: " Away Club ", rank: null },
  homeGameWins: 3,
  awayGameWins: 1,
  homeSetWins: 10,
  awaySetWins: 5,
  venue: { name: "Sporthalle" },
  games: [
    {
      index: 1,
      gameState: "Finished",
      winnerSide: "Home",
      homePlayer: player("p1", "Anna", "Berg"),
      awayPlayer: player("p2", "Carla", "Diaz"),
    },
    {
      index: 2,
      gameState: "Finished",
      winnerSide: "Away",
      homeLeaguePlayer: player("p3", "Eva", ""),
      awayPlayer: player("p4", "Fay", "Gold"),
    },
    {
      index: 3,
      gameState: "Inactive",
      winnerSide: null,
      homePlayer: player("p1", "Anna", "Berg"),
      awayPlayer: player("p4", "Fay", "Gold"),
    },
    {
      index: 4,
      gameState: "Finished",
      winnerSide: "Home",
      homePlayer: { id: null },
      awayPlayer: player("p2", "Carla", "Diaz"),
    },
  ],
  homePlayerOne: { id: "p1", firstName: "Anna", lastName: "Berg", imageUrl: "" },
  homePlayerTwo: { id: "p3", firstName: "Eva", lastName: null },
  guestPlayerOne: { id: "p2", firstName: "Carla", lastName: "Diaz" },
  guestPlayerTwo: null,
};

// ---------------------------------------------------------------------------
// normalizeTtblMatch
// ---------------------------------------------------------------------------

describe("ttblWinnerSide", () => {
  it("maps Home and Away, anything else is undecided", () => {
    expect(ttblWinnerSide("Home")).toBe("A");
    expect(ttblWinnerSide("Away")).toBe("B");
    expect(ttblWinnerSide("Draw")).toBeNull();
    expect(ttblWinnerSide(null)).toBeNull();
  });
});

describe("normalizeTtblMatch", () => {
  const batch = normalizeTtblMatch("m-1", match);

  it("emits one record per game with both players", () => {
    expect(batch.games.map((g) => g.gameId)).toEqual(["m-1:1", "m-1:2", "m-1:3"]);
  });

  it("builds the record from the game and the match time", () => {
    expect(batch.games[0]).toEqual({
      gameId: "m-1:1",
      playerAId: "p1",
      playerBId: "p2",
      playerAName: "Anna Berg",
      playerBName: "Carla Diaz",
      winnerSide: "A",
      completionState: "Finished",
      timestamp: 1_700_000_000,
    });
  });

  it("falls back to the league player and trims the name", () => {
    expect(batch.games[1]).toMatchObject({
      playerAId: "p3",
      playerAName: "Eva",
      winnerSide: "B",
    });
  });

  it("marks games that are not Finished", () => {
    expect(batch.games[2]).toMatchObject({ completionState: "NotFinished", winnerSide: null });
  });

  it("skips a game with a missing player id", () => {
    expect(batch.skipped).toEqual([
      { source: "ttbl", ref: "m-1:4", reason: "missing home player id" },
    ]);
  });

  it("numbers games by position when the index is absent", () => {
    const result = normalizeTtblMatch("m-2", {
      games: [
        {
          gameState: "Finished",
          winnerSide: "Away",
          homePlayer: player("a", "A", "A"),
          awayPlayer: player("b", "B", "B"),
        },
      ],
    });
    expect(result.games[0].gameId).toBe("m-2:1");
    expect(result.games[0].timestamp).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Summaries and lineups
// ---------------------------------------------------------------------------

describe("summarizeTtblMatch", () => {
  it("collects team scores and names", () => {
    expect(summarizeTtblMatch("m-1", match)).toEqual({
      matchId: "m-1",
      matchState: "Finished",
      gameday: "3. Spieltag",
      timestamp: 1_700_000_000_000,
      homeTeam: { id: "t-home", name: "Home Club", rank: 2, gameWins: 3, setWins: 10 },
      awayTeam: { id: "t-away", name: "Away Club", rank: null, gameWins: 1, setWins: 5 },
      gamesCount: 4,
      venue: "Sporthalle",
    });
  });
});

describe("countMatchStates", () => {
  it("counts states, most common first", () => {
    const summaries = ["Finished", "Upcoming", "Finished", null].map(
      (matchState, i): TtblMatchSummary => ({
        ...summarizeTtblMatch(`m-${i}`, {}),
        matchState,
      })
    );
    expect(countMatchStates(summaries)).toEqual([
      { state: "Finished", count: 2 },
      { state: "Unknown", count: 1 },
      { state: "Upcoming", count: 1 },
    ]);
  });
});

describe("collectTtblPlayers", () => {
  it("lists each lineup player once, first match wins", () => {
    const players = collectTtblPlayers([
      { matchId: "m-1", match },
      { matchId: "m-2", match: { homePlayerOne: { id: "p1", firstName: "Other" } } },
    ]);
    expect(players).toEqual([
      { id: "p1", firstName: "Anna", lastName: "Berg", imageUrl: null, matchId: "m-1" },
      { id: "p3", firstName: "Eva", lastName: null, imageUrl: null, matchId: "m-1" },
      { id: "p2", firstName: "Carla", lastName: "Diaz", imageUrl: null, matchId: "m-1" },
    ]);
  });
});
