/**
 * HTTP client public API
 */

export { fetchText } from "./httpClient";
export { HttpError } from "./httpError";
export { createPageFetcher, detectErrorPage } from "./pageFetcher";
export type {
  TextRequest,
  HttpErrorDetails,
  HttpRetryConfig,
  FetchResult,
  PageFetcher,
  PageFetcherOptions,
} from "@/types";
