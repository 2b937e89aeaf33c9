/**
 * Service messages repository
 */

import type { ServiceRecord } from "@/types";
import { getDb } from "@/db/connection";

export function upsertServiceMessage(input: ServiceRecord): void {
  getDb()
    .prepare(
      `
    INSERT INTO service_messages (message_id, text)
    VALUES (?, ?)
    ON CONFLICT(message_id) DO UPDATE SET text = excluded.text
  `,
    )
    .run(input.message_id, input.text);
}

export function getServiceMessage(messageId: number): ServiceRecord | undefined {
  return getDb()
    .prepare("SELECT message_id, text FROM service_messages WHERE message_id = ?")
    .get(messageId) as ServiceRecord | undefined;
}

export function listServiceMessages(): ServiceRecord[] {
  return getDb()
    .prepare("SELECT message_id, text FROM service_messages ORDER BY message_id")
    .all() as ServiceRecord[];
}

export function deleteServiceMessage(messageId: number): void {
  getDb()
    .prepare("DELETE FROM service_messages WHERE message_id = ?")
    .run(messageId);
}
