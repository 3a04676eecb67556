#!/usr/bin/env node

/**
 * ttstats CLI: scrape table tennis results and rank players by win rate.
 */

import { Command } from "commander";
import { DEFAULT_LEADERBOARD_OPTIONS } from "@ttstats/core";
import { loadEnvFile } from "./config";
import { ttbl } from "./commands/ttbl";
import { fabrik } from "./commands/fabrik";
import { stats } from "./commands/stats";
import { verify } from "./commands/verify";

loadEnvFile();

const MIN_GAMES_DEFAULT = String(DEFAULT_LEADERBOARD_OPTIONS.minGames);
const TOP_DEFAULT = String(DEFAULT_LEADERBOARD_OPTIONS.topN);

/** Print the failure and exit non-zero instead of dumping a stack trace. */
function handleErrors<A extends unknown[]>(action: (...args: A) => void | Promise<void>) {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  };
}

const program = new Command()
  .name("ttstats")
  .description("Table tennis results scraper and win-rate leaderboard")
  .version("0.1.0");

program
  .command("ttbl")
  .description("Scrape a TTBL (Bundesliga) season")
  .option("-s, --season <season>", "Season, e.g. 2025-2026")
  .option("-g, --gamedays <n>", "Number of gamedays to walk")
  .option("--delay <ms>", "Pause between requests")
  .option("-o, --out <dir>", "Output directory")
  .option("--min-games <n>", "Minimum games for the leaderboard", MIN_GAMES_DEFAULT)
  .option("--top <n>", "Leaderboard size", TOP_DEFAULT)
  .option("-v, --verbose", "Print every skipped record and score diagnostic")
  .action(handleErrors(ttbl));

program
  .command("fabrik")
  .description("Fetch ITTF results from the Fabrik list view")
  .option("-y, --years <years>", "Comma-separated years, e.g. 2023,2024")
  .option("--start-year <year>", "First year of a range (default: current year)")
  .option("--end-year <year>", "Last year of a range (default: current year)")
  .option("--page-size <n>", "Rows per page")
  .option("--max-pages <n>", "Page cap per year")
  .option("--delay <ms>", "Pause between pages")
  .option("-o, --out <dir>", "Output directory")
  .option("--min-games <n>", "Minimum games for the leaderboard", MIN_GAMES_DEFAULT)
  .option("--top <n>", "Leaderboard size", TOP_DEFAULT)
  .option("-v, --verbose", "Print every skipped record and score diagnostic")
  .action(handleErrors(fabrik));

program
  .command("stats")
  .description("Re-aggregate a saved games.json")
  .requiredOption("-i, --input <path>", "games.json from an earlier run")
  .option("--min-games <n>", "Minimum games for the leaderboard", MIN_GAMES_DEFAULT)
  .option("--top <n>", "Leaderboard size", TOP_DEFAULT)
  .option("-o, --out <dir>", "Output directory (default: <input dir>/stats)")
  .option("-v, --verbose", "Print every skipped record and score diagnostic")
  .action(handleErrors(stats));

program
  .command("verify")
  .description("Count saved games usable for rating calculations")
  .requiredOption("-i, --input <path>", "games.json from an earlier run")
  .action(handleErrors(verify));

await program.parseAsync();
