/**
 * Record persistence
 *
 * One transaction per message: the ingest log row, then the record of
 * the message's category. Rows of other categories for the same
 * message ID are removed, so a reclassified message keeps exactly one
 * structured record.
 */

import type { ProcessedMessage } from "@/types";
import {
  withTransaction,
  upsertSourceMessage,
  upsertVacancy,
  upsertStatistic,
  upsertServiceMessage,
  deleteVacancy,
  deleteStatistic,
  deleteServiceMessage,
} from "@/db";

/**
 * Persist an assembled message.
 *
 * @throws Database errors; the transaction is rolled back
 */
export function persistProcessedMessage(processed: ProcessedMessage): void {
  const messageId = processed.source.message_id;

  withTransaction(() => {
    upsertSourceMessage(processed.source);

    if (processed.kind !== "vacancy") deleteVacancy(messageId);
    if (processed.kind !== "statistic") deleteStatistic(messageId);
    if (processed.kind !== "service") deleteServiceMessage(messageId);

    switch (processed.kind) {
      case "vacancy":
        upsertVacancy(processed.record);
        break;
      case "statistic":
        upsertStatistic(processed.record);
        break;
      case "service":
        upsertServiceMessage(processed.record);
        break;
      case "unclassified":
        break;
    }
  });
}
