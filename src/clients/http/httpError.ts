/**
 * HttpError class: structured error for non-2xx responses
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Carries status, URL, and an optional response body snippet
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  /** 4xx: the page is gone or refused; retrying will not help */
  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}
