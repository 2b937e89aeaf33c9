/**
 * Vacancy page fetcher
 *
 * Wraps fetchText into a PageFetcher that never throws: every
 * failure (non-2xx, transport error, timeout, error page) becomes an
 * `ok: false` result carrying the status when one is known.
 */

import type {
  FetchResult,
  PageFetcher,
  PageFetcherOptions,
  TextRequest,
} from "@/types";
import { fetchText } from "./httpClient";
import { HttpError } from "./httpError";
import {
  DEFAULT_PAGE_HEADERS,
  PAGE_FETCH_MAX_ATTEMPTS,
} from "@/constants/clients/http";
import { DEFAULT_FETCH_TIMEOUT_MS } from "@/constants/ingestion";
import {
  ERROR_PAGE_PATTERN,
  ERROR_PAGE_SCAN_LENGTH,
  IP_BLOCKED_PATTERN,
} from "@/constants/parsing";
import * as logger from "@/logger";

/**
 * Detect a soft error page served with a 2xx status.
 *
 * - "Error NNN" near the top of the page: status NNN
 * - "Your IP address ... has been blocked": treated as 429
 *
 * @returns The implied status, or null for a regular page
 */
export function detectErrorPage(html: string): number | null {
  const head = html.slice(0, ERROR_PAGE_SCAN_LENGTH);

  const errorMatch = ERROR_PAGE_PATTERN.exec(head);
  if (errorMatch) {
    return Number(errorMatch[1]);
  }

  if (IP_BLOCKED_PATTERN.test(html)) {
    return 429;
  }

  return null;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "AbortError" ? "Request timed out" : error.message;
  }
  return String(error);
}

/**
 * Create a page fetcher.
 *
 * The timeout bounds each fetch as a whole; a page that has not
 * arrived by then is a failed fetch, with no retry after it.
 *
 * @param options - Timeout, retry, headers, and an injectable request function
 * @returns Fetcher resolving to a FetchResult for any URL
 */
export function createPageFetcher(options: PageFetcherOptions = {}): PageFetcher {
  const request = options.request ?? fetchText;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const retry = options.retry ?? { maxAttempts: PAGE_FETCH_MAX_ATTEMPTS };
  const headers = { ...DEFAULT_PAGE_HEADERS, ...options.headers };

  return async (url: string): Promise<FetchResult> => {
    const req: TextRequest = { url, headers, timeoutMs, retry };

    try {
      const html = await request(req);

      const errorStatus = detectErrorPage(html);
      if (errorStatus !== null) {
        logger.warn("Error page received", { url, status: errorStatus });
        return {
          ok: false,
          url,
          status: errorStatus,
          error: `Error page (status ${errorStatus})`,
        };
      }

      return { ok: true, url, status: 200, html };
    } catch (error) {
      if (error instanceof HttpError) {
        const log = error.isClientError ? logger.debug : logger.warn;
        log("Page fetch failed", { url, status: error.status });
        return { ok: false, url, status: error.status, error: error.message };
      }

      logger.warn("Page fetch failed", { url, error: describeError(error) });
      return { ok: false, url, status: null, error: describeError(error) };
    }
  };
}
