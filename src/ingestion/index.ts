/**
 * Ingestion module barrel exports
 */

export {
  processMessage,
  buildVacancyRecord,
  buildStatisticRecord,
} from "./processMessage";

export { createCachedPageFetcher } from "./linkFollow";
export type { LinkFollowStats } from "./linkFollow";

export { persistProcessedMessage } from "./persistence";

export { ingestMessages } from "./ingestMessages";

export {
  loadMessagesFromFile,
  parseMessages,
  toRawMessage,
  MessageSourceError,
} from "./messageSource";
