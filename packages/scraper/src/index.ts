// --- Configuration ---
export {
  DEFAULT_SCRAPER_CONFIG,
  loadEnvFile,
  loadScraperConfig,
} from "./config";
export type { ScraperConfig, TtblConfig, FabrikConfig } from "./config";

// --- HTTP ---
export { createHttpClient, HttpError, buildUrl, isRetryableError } from "./http";
export type { HttpClient, HttpClientOptions, QueryParams } from "./http";
export { withRetry, sleep } from "./retry";
export type { RetryOptions } from "./retry";

// --- TTBL ---
export {
  extractMatchIds,
  discoverMatchIds,
  fetchMatch,
  fetchTtblSeason,
} from "./ttbl-fetch";
export {
  normalizeTtblMatch,
  summarizeTtblMatch,
  countMatchStates,
  collectTtblPlayers,
} from "./ttbl-normalize";
export { ttblMatchSchema } from "./ttbl-types";
export type { TtblMatch, TtblMatchSummary, TtblLineupPlayer } from "./ttbl-types";

// --- Fabrik ---
export { fabrikParams, unwrapFabrikPage, fetchFabrikYear } from "./fabrik-fetch";
export {
  normalizeFabrikRow,
  normalizeFabrikRows,
  splitPlayerName,
  buildPlayerDirectory,
  buildPlayerMatchIndex,
} from "./fabrik-normalize";
export { fabrikRowSchema } from "./fabrik-types";
export type { FabrikRow, FabrikMatch, FabrikPlayer, FabrikYearResult } from "./fabrik-types";

// --- Output ---
export { writeJson, serializeStats, writeRunOutputs, readGames } from "./output";
export type { RunOutputs, RunMetadata } from "./output";
export { buildRun } from "./pipeline";
export { checkRatingReadiness } from "./verify";
export type { ReadinessReport } from "./verify";
export type { NormalizedBatch, SkippedRecord, RecordDiagnostic } from "./records";
