import { describe, it, expect } from "vitest";
import { appendBatch, cleanId, cleanText, emptyBatch, toEpochSeconds } from "./records";

describe("cleanId", () => {
  it("trims strings and stringifies numbers", () => {
    expect(cleanId(" 123 ")).toBe("123");
    expect(cleanId(456)).toBe("456");
  });

  it("treats placeholders as missing", () => {
    expect([null, undefined, "", "  ", "null", "0", 0].map(cleanId)).toEqual([
      null, null, null, null, null, null, null,
    ]);
  });
});

describe("cleanText", () => {
  it("trims, and blank becomes null", () => {
    expect(cleanText("  Home Club ")).toBe("Home Club");
    expect(cleanText(" ")).toBeNull();
    expect(cleanText(undefined)).toBeNull();
  });
});

describe("toEpochSeconds", () => {
  it("converts milliseconds and keeps seconds", () => {
    expect(toEpochSeconds(1_700_000_000_123)).toBe(1_700_000_000);
    expect(toEpochSeconds(1_700_000_000)).toBe(1_700_000_000);
    expect(toEpochSeconds(12.9)).toBe(12);
  });

  it("gives 0 for missing, negative or non-finite values", () => {
    expect([null, undefined, -5, Number.NaN, Number.POSITIVE_INFINITY].map(toEpochSeconds)).toEqual([
      0, 0, 0, 0, 0,
    ]);
  });
});

describe("appendBatch", () => {
  it("concatenates every list", () => {
    const target = emptyBatch();
    appendBatch(target, {
      games: [],
      skipped: [{ source: "ttbl", ref: "m:1", reason: "missing both player ids" }],
      diagnostics: [],
    });
    appendBatch(target, {
      games: [],
      skipped: [{ source: "ttbl", ref: "m:2", reason: "missing away player id" }],
      diagnostics: [],
    });
    expect(target.skipped.map((s) => s.ref)).toEqual(["m:1", "m:2"]);
    expect(target.games).toEqual([]);
  });
});
