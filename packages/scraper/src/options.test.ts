import { describe, it, expect } from "vitest";
import {
  intOption,
  leaderboardOptionsFromFlags,
  parseIntOption,
  parseSeason,
  parseYears,
} from "./options";

describe("parseIntOption", () => {
  it("parses integers at or above the minimum", () => {
    expect(parseIntOption("12", "--top", 1)).toBe(12);
    expect(parseIntOption(" 0 ", "--min-games")).toBe(0);
  });

  it("rejects fractions, words and values below the minimum", () => {
    expect(() => parseIntOption("2.5", "--top")).toThrow('--top must be an integer >= 0, got "2.5"');
    expect(() => parseIntOption("ten", "--top")).toThrow(RangeError);
    expect(() => parseIntOption("0", "--top", 1)).toThrow('--top must be an integer >= 1, got "0"');
  });
});

describe("intOption", () => {
  it("falls back when the flag is absent", () => {
    expect(intOption(undefined, "--delay", 400)).toBe(400);
    expect(intOption("0", "--delay", 400)).toBe(0);
  });
});

describe("parseSeason", () => {
  it("accepts consecutive years", () => {
    expect(parseSeason(" 2024-2025 ")).toBe("2024-2025");
  });

  it("rejects other shapes", () => {
    expect(() => parseSeason("2024")).toThrow(RangeError);
    expect(() => parseSeason("2024-2026")).toThrow('--season must look like 2025-2026, got "2024-2026"');
  });
});

describe("parseYears", () => {
  it("reads a comma-separated list, unique and ascending", () => {
    expect(parseYears({ years: "2024, 2022,2024,," })).toEqual([2022, 2024]);
  });

  it("expands an inclusive range", () => {
    expect(parseYears({ startYear: "2020", endYear: "2023" })).toEqual([2020, 2021, 2022, 2023]);
    expect(parseYears({ startYear: "2021", endYear: "2021" })).toEqual([2021]);
  });

  it("prefers --years over a range", () => {
    expect(parseYears({ years: "2019", startYear: "2020", endYear: "2021" })).toEqual([2019]);
  });

  it("fills a missing bound with the current UTC year", () => {
    const now = new Date("2026-12-31T23:30:00.000Z");
    expect(parseYears({}, now)).toEqual([2026]);
    expect(parseYears({ startYear: "2024" }, now)).toEqual([2024, 2025, 2026]);
    expect(() => parseYears({ endYear: "2025" }, now)).toThrow(
      "--end-year (2025) is before --start-year (2026)"
    );
  });

  it("rejects empty and reversed input", () => {
    expect(() => parseYears({ years: " , " })).toThrow("--years must name at least one year");
    expect(() => parseYears({ startYear: "2024", endYear: "2020" })).toThrow(
      "--end-year (2020) is before --start-year (2024)"
    );
  });
});

describe("leaderboardOptionsFromFlags", () => {
  it("defaults to the core leaderboard defaults", () => {
    expect(leaderboardOptionsFromFlags({})).toEqual({ minGames: 5, topN: 20 });
  });

  it("reads both flags", () => {
    expect(leaderboardOptionsFromFlags({ minGames: "0", top: "3" })).toEqual({ minGames: 0, topN: 3 });
    expect(() => leaderboardOptionsFromFlags({ top: "0" })).toThrow('--top must be an integer >= 1, got "0"');
  });
});
