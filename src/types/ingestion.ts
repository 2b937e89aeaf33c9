/**
 * Ingestion type definitions
 *
 * Types for the per-message pipeline and the batch driver.
 */

import type {
  SourceRecordInput,
  VacancyRecordInput,
  StatisticRecordInput,
  ServiceRecord,
} from "./db";
import type { FetchResult, PageFetcher } from "./clients/http";
import type { SignRegistry } from "./signs";

/**
 * Pipeline states of a single message.
 * Rejected is reached only on a persistence failure.
 */
export type PipelineState =
  | "Received"
  | "Classified"
  | "TextExtracted"
  | "LinkFollowed"
  | "FieldsResolved"
  | "Persisted"
  | "Rejected";

/**
 * Assembled output of processMessage, ready for persistence
 */
export type ProcessedMessage =
  | {
      kind: "vacancy";
      source: SourceRecordInput;
      record: VacancyRecordInput;
      /** null when the message carried no URL */
      fetch: FetchResult | null;
    }
  | { kind: "statistic"; source: SourceRecordInput; record: StatisticRecordInput }
  | { kind: "service"; source: SourceRecordInput; record: ServiceRecord }
  | { kind: "unclassified"; source: SourceRecordInput };

export interface ProcessMessageDeps {
  registry: SignRegistry;
  fetchPage: PageFetcher;
}

export interface IngestMessagesOptions {
  registry: SignRegistry;
  /** Defaults to the native-fetch page fetcher */
  fetchPage?: PageFetcher;
  /** Max link-follow fetches in flight */
  concurrency?: number;
  /** Per-fetch timeout for the default fetcher */
  fetchTimeoutMs?: number;
}

/**
 * Counters for one ingestion batch
 */
export type IngestMessagesResult = {
  processed: number;
  persisted: number;
  vacancies: number;
  statistics: number;
  services: number;
  unclassified: number;
  /** Messages that reached Rejected */
  failed: number;
  /** Pages fetched over the network */
  pagesFetched: number;
  /** Pages served from vacancy_web */
  pagesCached: number;
};

/**
 * Reconciliation outcome
 */
export type ReconcileResult = {
  /** URLs present in both vacancy_web and the backup */
  matched: number;
  /** Rows rewritten */
  updated: number;
};
