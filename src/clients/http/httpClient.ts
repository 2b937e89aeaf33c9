/**
 * Text fetch client over native fetch
 *
 * One GET per call with a single deadline: `timeoutMs` bounds the whole
 * call, retries and backoff waits included. Transient failures (network
 * errors, 408, 429, 5xx) are retried while the deadline leaves room.
 */

import type { TextRequest } from "@/types/clients/http";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";

async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    // body already unreadable; the status alone describes the failure
    return undefined;
  }
}

/**
 * Network errors and retryable statuses. Aborts never get here: an
 * abort means the deadline has passed.
 */
function isErrorRetryable(error: unknown): boolean {
  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.includes(error.status);
  }
  return error instanceof Error && error.name === "TypeError";
}

/**
 * Retry-After as milliseconds (delay-seconds or HTTP-date), or null
 */
function parseRetryAfter(header: string | null): number | null {
  if (!header) {
    return null;
  }

  const seconds = parseInt(header, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(header);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Retry-After when the server sent one, otherwise exponential backoff
 * with jitter: min(maxDelay, baseDelay * 2^(attempt-1)) * [0.5, 1.0)
 */
function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  error: unknown,
): number {
  if (error instanceof HttpError && error.headers) {
    const retryAfterMs = parseRetryAfter(error.headers.get("retry-after"));
    if (retryAfterMs !== null) {
      return retryAfterMs;
    }
  }

  const exponential = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  return Math.floor(exponential * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function performRequest(req: TextRequest, signal: AbortSignal): Promise<string> {
  const response = await fetch(req.url, {
    method: "GET",
    headers: { ...req.headers },
    signal,
  });

  if (!response.ok) {
    throw new HttpError({
      status: response.status,
      statusText: response.statusText,
      url: req.url,
      bodySnippet: await extractBodySnippet(response),
      headers: response.headers,
    });
  }

  return await response.text();
}

/**
 * GET a URL and return the body text.
 *
 * A retry is skipped when its wait would run past the deadline; the
 * last error is thrown instead.
 *
 * @throws {HttpError} On a non-2xx status once no retry is left
 * @throws {Error} On network errors, or an AbortError at the deadline
 */
export async function fetchText(req: TextRequest): Promise<string> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  const deadline = Date.now() + timeoutMs;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    for (let attempt = 1; ; attempt++) {
      try {
        return await performRequest(req, controller.signal);
      } catch (error) {
        if (
          controller.signal.aborted ||
          attempt >= maxAttempts ||
          !isErrorRetryable(error)
        ) {
          throw error;
        }

        const delayMs = computeRetryDelay(attempt, baseDelayMs, maxDelayMs, error);
        if (Date.now() + delayMs >= deadline) {
          logger.debug("Retry skipped, deadline too close", { url: req.url, delayMs });
          throw error;
        }

        logger.debug("Retrying request", {
          url: req.url,
          attempt,
          maxAttempts,
          delayMs,
          reason: error instanceof HttpError ? `status ${error.status}` : String(error),
        });
        await sleep(delayMs);
      }
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
