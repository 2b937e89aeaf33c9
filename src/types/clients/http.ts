/**
 * HTTP client type definitions
 */

/**
 * Retry settings. Waits never extend a request past its timeout.
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts, including the first */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs?: number;
  /** Maximum delay in ms between attempts */
  maxDelayMs?: number;
}

/**
 * A GET for a text body
 */
export interface TextRequest {
  url: string;
  headers?: Record<string, string>;
  /** Deadline for the whole request, retries included */
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * Outcome of following a vacancy link.
 *
 * Non-success statuses, transport errors, timeouts and error pages
 * all come back as `ok: false`; the fetcher never throws.
 */
export type FetchResult =
  | { ok: true; url: string; status: number; html: string }
  | { ok: false; url: string; status: number | null; error: string };

export type PageFetcher = (url: string) => Promise<FetchResult>;

export interface PageFetcherOptions {
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  headers?: Record<string, string>;
  /** Injected text request function (tests) */
  request?: (req: TextRequest) => Promise<string>;
}
