/**
 * Ingestion constants: link-follow defaults
 */

/**
 * Max link-follow fetches in flight
 */
export const DEFAULT_FETCH_CONCURRENCY = 10;

/**
 * Per-fetch timeout (10 seconds)
 */
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/**
 * Stored statuses that are reused without refetching.
 * 200 is served as a page, 404 as a failed fetch.
 */
export const CACHED_PAGE_STATUSES: readonly number[] = [200, 404];
