/**
 * Link-follow with a vacancy_web cache
 *
 * Every fetch outcome is stored per URL. A stored page (200) or a
 * stored 404 is served from the table; anything else is fetched again.
 */

import type { FetchResult, PageFetcher, VacancyWebRecord } from "@/types";
import { getVacancyWebByUrl, upsertVacancyWebPage } from "@/db";
import { CACHED_PAGE_STATUSES } from "@/constants/ingestion";
import * as logger from "@/logger";

export interface LinkFollowStats {
  fetched: number;
  cached: number;
}

function fromCache(row: VacancyWebRecord | undefined): FetchResult | null {
  if (!row || row.status_code === null) {
    return null;
  }
  if (!CACHED_PAGE_STATUSES.includes(row.status_code)) {
    return null;
  }

  if (row.status_code === 200) {
    return row.raw_html !== null
      ? { ok: true, url: row.url, status: 200, html: row.raw_html }
      : null;
  }

  return {
    ok: false,
    url: row.url,
    status: row.status_code,
    error: `Cached status ${row.status_code}`,
  };
}

/**
 * Wrap a page fetcher with the vacancy_web cache.
 *
 * Concurrent requests for the same URL share one network fetch.
 * A storage failure is logged and the fetched result still returned.
 *
 * @param fetchPage - Network fetcher
 * @param stats - Counters updated in place
 */
export function createCachedPageFetcher(
  fetchPage: PageFetcher,
  stats: LinkFollowStats = { fetched: 0, cached: 0 },
): PageFetcher {
  const inFlight = new Map<string, Promise<FetchResult>>();

  const fetchAndStore = async (url: string): Promise<FetchResult> => {
    const result = await fetchPage(url);
    stats.fetched++;

    try {
      upsertVacancyWebPage({
        url,
        raw_html: result.ok ? result.html : null,
        status_code: result.status,
      });
    } catch (err) {
      logger.warn("Failed to store fetched page", {
        url,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    return result;
  };

  return async (url: string): Promise<FetchResult> => {
    const cached = fromCache(getVacancyWebByUrl(url));
    if (cached) {
      stats.cached++;
      logger.debug("Page served from cache", { url, status: cached.status });
      return cached;
    }

    const pending = inFlight.get(url);
    if (pending) {
      return pending;
    }

    const request = fetchAndStore(url).finally(() => inFlight.delete(url));
    inFlight.set(url, request);
    return request;
  };
}
