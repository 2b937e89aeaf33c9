/**
 * Batch ingestion
 *
 * Runs messages through processMessage with a bounded number of
 * link-follow fetches in flight, then persists each one. Per-message
 * failures are logged and counted; the batch always completes.
 */

import type {
  IngestMessagesOptions,
  IngestMessagesResult,
  PipelineState,
  ProcessedMessage,
  RawMessage,
} from "@/types";
import { createPageFetcher } from "@/clients/http";
import {
  DEFAULT_FETCH_CONCURRENCY,
  DEFAULT_FETCH_TIMEOUT_MS,
} from "@/constants/ingestion";
import { mapWithConcurrency } from "@/utils/concurrency";
import { processMessage } from "./processMessage";
import { persistProcessedMessage } from "./persistence";
import { createCachedPageFetcher } from "./linkFollow";
import type { LinkFollowStats } from "./linkFollow";
import * as logger from "@/logger";

function emptyResult(): IngestMessagesResult {
  return {
    processed: 0,
    persisted: 0,
    vacancies: 0,
    statistics: 0,
    services: 0,
    unclassified: 0,
    failed: 0,
    pagesFetched: 0,
    pagesCached: 0,
  };
}

function countCategory(
  result: IngestMessagesResult,
  processed: ProcessedMessage,
): void {
  switch (processed.kind) {
    case "vacancy":
      result.vacancies++;
      break;
    case "statistic":
      result.statistics++;
      break;
    case "service":
      result.services++;
      break;
    case "unclassified":
      result.unclassified++;
      break;
  }
}

/**
 * Ingest a batch of messages.
 *
 * Steps per message:
 * 1. Classify, extract and follow the vacancy link (concurrent)
 * 2. Persist in one transaction
 * 3. On any error, mark the message Rejected and continue
 *
 * @param messages - Inbound messages
 * @param options - Registry, fetcher and concurrency settings
 * @returns Batch counters
 */
export async function ingestMessages(
  messages: readonly RawMessage[],
  options: IngestMessagesOptions,
): Promise<IngestMessagesResult> {
  const result = emptyResult();
  const stats: LinkFollowStats = { fetched: 0, cached: 0 };

  const network =
    options.fetchPage ??
    createPageFetcher({
      timeoutMs: options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    });
  const fetchPage = createCachedPageFetcher(network, stats);
  const concurrency = options.concurrency ?? DEFAULT_FETCH_CONCURRENCY;

  logger.info("Ingestion started", { messages: messages.length, concurrency });

  const states = await mapWithConcurrency(
    messages,
    concurrency,
    async (message): Promise<PipelineState> => {
      try {
        const processed = await processMessage(message, {
          registry: options.registry,
          fetchPage,
        });
        result.processed++;
        countCategory(result, processed);

        persistProcessedMessage(processed);
        result.persisted++;
        return "Persisted";
      } catch (err) {
        result.failed++;
        logger.error("Message rejected", {
          messageId: message.messageId,
          error: err instanceof Error ? err.message : String(err),
        });
        return "Rejected";
      }
    },
  );

  result.pagesFetched = stats.fetched;
  result.pagesCached = stats.cached;

  logger.info("Ingestion finished", {
    ...result,
    rejected: states.filter((state) => state === "Rejected").length,
  });

  return result;
}
