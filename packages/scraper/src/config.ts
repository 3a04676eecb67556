/**
 * Scraper configuration: defaults, overridden by TTSTATS_* / TTBL_* /
 * FABRIK_* environment variables, overridden again by CLI flags.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { RetryOptions } from "./retry";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const PACKAGE_ROOT = join(__dirname, "..");
export const REPO_ROOT = join(PACKAGE_ROOT, "..", "..");

export interface TtblConfig {
  baseUrl: string;
  season: string;
  gamedays: number;
  /** Pause between requests */
  delayMs: number;
}

export interface FabrikConfig {
  baseUrl: string;
  listId: string;
  pageSize: number;
  maxPagesPerYear: number;
  delayMs: number;
}

export interface ScraperConfig {
  dataDir: string;
  userAgent: string;
  timeoutMs: number;
  retry: Required<RetryOptions>;
  ttbl: TtblConfig;
  fabrik: FabrikConfig;
}

export const DEFAULT_SCRAPER_CONFIG: ScraperConfig = {
  dataDir: join(PACKAGE_ROOT, "data"),
  userAgent: "ttstats-scraper/0.1",
  timeoutMs: 30_000,
  retry: { maxAttempts: 3, delayMs: 1000, backoffMultiplier: 2 },
  ttbl: {
    baseUrl: "https://www.ttbl.de",
    season: "2025-2026",
    gamedays: 18,
    delayMs: 1000,
  },
  fabrik: {
    baseUrl: "https://results.ittf.link/index.php",
    listId: "31",
    pageSize: 500,
    maxPagesPerYear: 500,
    delayMs: 400,
  },
};

/**
 * Load KEY=VALUE lines from .env and .env.local at the repo root.
 * Existing variables are never overridden (e.g., from CI).
 */
export function loadEnvFile(
  root: string = REPO_ROOT,
  env: NodeJS.ProcessEnv = process.env
): void {
  for (const name of [".env", ".env.local"]) {
    const envPath = join(root, name);
    if (!existsSync(envPath)) continue;
    const content = readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = trimmed.slice(eqIdx + 1).trim();
      if (!env[key]) {
        env[key] = value;
      }
    }
  }
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  TTSTATS_DATA_DIR: z.string().min(1).optional(),
  TTSTATS_USER_AGENT: z.string().min(1).optional(),
  TTSTATS_TIMEOUT_MS: positiveInt.optional(),
  TTSTATS_RETRY_ATTEMPTS: positiveInt.optional(),
  TTSTATS_RETRY_DELAY_MS: nonNegativeInt.optional(),
  TTBL_BASE_URL: z.string().url().optional(),
  TTBL_SEASON: z.string().regex(/^\d{4}-\d{4}$/, "expected YYYY-YYYY").optional(),
  TTBL_GAMEDAYS: positiveInt.optional(),
  TTBL_DELAY_MS: nonNegativeInt.optional(),
  FABRIK_BASE_URL: z.string().url().optional(),
  FABRIK_LIST_ID: z.string().min(1).optional(),
  FABRIK_PAGE_SIZE: positiveInt.optional(),
  FABRIK_MAX_PAGES: positiveInt.optional(),
  FABRIK_DELAY_MS: nonNegativeInt.optional(),
});

/**
 * Build the config from environment variables over DEFAULT_SCRAPER_CONFIG.
 * Blank variables count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${messages.join("; ")}`);
  }

  const e = parsed.data;
  const d = DEFAULT_SCRAPER_CONFIG;
  return {
    dataDir: e.TTSTATS_DATA_DIR ?? d.dataDir,
    userAgent: e.TTSTATS_USER_AGENT ?? d.userAgent,
    timeoutMs: e.TTSTATS_TIMEOUT_MS ?? d.timeoutMs,
    retry: {
      ...d.retry,
      maxAttempts: e.TTSTATS_RETRY_ATTEMPTS ?? d.retry.maxAttempts,
      delayMs: e.TTSTATS_RETRY_DELAY_MS ?? d.retry.delayMs,
    },
    ttbl: {
      baseUrl: e.TTBL_BASE_URL ?? d.ttbl.baseUrl,
      season: e.TTBL_SEASON ?? d.ttbl.season,
      gamedays: e.TTBL_GAMEDAYS ?? d.ttbl.gamedays,
      delayMs: e.TTBL_DELAY_MS ?? d.ttbl.delayMs,
    },
    fabrik: {
      baseUrl: e.FABRIK_BASE_URL ?? d.fabrik.baseUrl,
      listId: e.FABRIK_LIST_ID ?? d.fabrik.listId,
      pageSize: e.FABRIK_PAGE_SIZE ?? d.fabrik.pageSize,
      maxPagesPerYear: e.FABRIK_MAX_PAGES ?? d.fabrik.maxPagesPerYear,
      delayMs: e.FABRIK_DELAY_MS ?? d.fabrik.delayMs,
    },
  };
}
