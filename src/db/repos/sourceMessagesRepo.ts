/**
 * Source messages repository
 *
 * Data access layer for the source_messages ingest log.
 */

import type { MessageCategory, SourceRecord, SourceRecordInput } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Insert or refresh the ingest log row of a message.
 * Re-ingesting a message overwrites its date, type and text.
 */
export function upsertSourceMessage(input: SourceRecordInput): void {
  getDb()
    .prepare(
      `
    INSERT INTO source_messages (message_id, date, message_type, text)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(message_id) DO UPDATE SET
      date = excluded.date,
      message_type = excluded.message_type,
      text = excluded.text,
      ingested_at = datetime('now')
  `,
    )
    .run(input.message_id, input.date, input.message_type, input.text);
}

export function getSourceMessage(messageId: number): SourceRecord | undefined {
  return getDb()
    .prepare("SELECT * FROM source_messages WHERE message_id = ?")
    .get(messageId) as SourceRecord | undefined;
}

/**
 * List ingest log rows in message order, optionally for one category
 */
export function listSourceMessages(type?: MessageCategory): SourceRecord[] {
  const db = getDb();
  if (type === undefined) {
    return db
      .prepare("SELECT * FROM source_messages ORDER BY message_id")
      .all() as SourceRecord[];
  }
  return db
    .prepare(
      "SELECT * FROM source_messages WHERE message_type = ? ORDER BY message_id",
    )
    .all(type) as SourceRecord[];
}

export function countSourceMessages(): number {
  const row = getDb()
    .prepare("SELECT COUNT(*) AS count FROM source_messages")
    .get() as { count: number };
  return row.count;
}
