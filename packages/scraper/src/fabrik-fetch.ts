/**
 * Paginated fetch of one year of match rows from the Fabrik list view.
 *
 * The list view does not report a total, and some deployments ignore the
 * offset and keep serving the first page. Rows are de-duplicated by match
 * id and paging stops after two pages in a row bring nothing new.
 */

import { z } from "zod";
import type { FabrikConfig } from "./config";
import type { HttpClient, QueryParams } from "./http";
import { cleanId } from "./records";
import { sleep } from "./retry";
import { fabrikRowSchema } from "./fabrik-types";
import type { FabrikRow, FabrikStopReason, FabrikYearResult } from "./fabrik-types";

const STAGNANT_PAGE_LIMIT = 2;

export function fabrikParams(
  listId: string,
  year: number,
  limit: number,
  offset: number
): QueryParams {
  return {
    option: "com_fabrik",
    view: "list",
    listid: listId,
    format: "json",
    "vw_matches___yr[value]": year,
    limit,
    [`limitstart${listId}`]: offset,
  };
}

/**
 * Accept a page as `[row, ...]` or wrapped once as `[[row, ...]]`.
 * Anything that is not a row object is counted as invalid and dropped.
 */
export function unwrapFabrikPage(data: unknown): { rows: FabrikRow[]; invalid: number } {
  if (!Array.isArray(data)) return { rows: [], invalid: 0 };
  const items: unknown[] = data.length === 1 && Array.isArray(data[0]) ? data[0] : data;

  const rows: FabrikRow[] = [];
  let invalid = 0;
  for (const item of items) {
    const parsed = fabrikRowSchema.safeParse(item);
    if (parsed.success) rows.push(parsed.data);
    else invalid++;
  }
  return { rows, invalid };
}

export async function fetchFabrikYear(
  client: HttpClient,
  config: FabrikConfig,
  year: number,
  onPage?: (page: number, fresh: number, total: number) => void
): Promise<FabrikYearResult> {
  const seen = new Set<string>();
  const rows: FabrikRow[] = [];
  let invalidRows = 0;
  let stagnantPages = 0;
  let pages = 0;
  let stopReason: FabrikStopReason = "max-pages";

  for (let page = 0; page < config.maxPagesPerYear; page++) {
    const offset = page * config.pageSize;
    const data = await client.getJson(
      config.baseUrl,
      z.unknown(),
      fabrikParams(config.listId, year, config.pageSize, offset)
    );
    pages++;

    const { rows: pageRows, invalid } = unwrapFabrikPage(data);
    invalidRows += invalid;
    if (pageRows.length === 0) {
      stopReason = "empty-page";
      break;
    }

    let fresh = 0;
    for (const row of pageRows) {
      const id = cleanId(row.vw_matches___id);
      if (!id || seen.has(id)) continue;
      seen.add(id);
      rows.push(row);
      fresh++;
    }
    onPage?.(page + 1, fresh, rows.length);

    stagnantPages = fresh === 0 ? stagnantPages + 1 : 0;
    if (stagnantPages >= STAGNANT_PAGE_LIMIT) {
      stopReason = "stagnant";
      break;
    }

    if (page + 1 < config.maxPagesPerYear) await sleep(config.delayMs);
  }

  return { year, rows, pages, invalidRows, stopReason };
}
