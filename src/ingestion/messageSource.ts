/**
 * Message source: chat export files
 *
 * Accepts either a bare array of messages or a chat export object with
 * a `messages` array. Entry text may be a string or a list of plain
 * strings and formatted entities (`{ text }`), which are concatenated.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import type { RawMessage } from "@/types";
import * as logger from "@/logger";

export class MessageSourceError extends Error {
  constructor(message: string) {
    super(`Message source error: ${message}`);
    this.name = "MessageSourceError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readText(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (!Array.isArray(value)) {
    return null;
  }

  let text = "";
  for (const part of value) {
    if (typeof part === "string") {
      text += part;
    } else if (isRecord(part) && typeof part.text === "string") {
      text += part.text;
    }
  }
  return text;
}

/**
 * Map one export entry to a RawMessage.
 *
 * @returns null for non-message entries (joins, pins) and entries
 *   without an integer ID, a date or text
 */
export function toRawMessage(entry: unknown): RawMessage | null {
  if (!isRecord(entry)) {
    return null;
  }
  if (entry.type !== undefined && entry.type !== "message") {
    return null;
  }

  const id = entry.id ?? entry.message_id;
  if (typeof id !== "number" || !Number.isInteger(id)) {
    return null;
  }

  const timestamp = entry.date ?? entry.timestamp;
  if (typeof timestamp !== "string" || timestamp.length === 0) {
    return null;
  }

  const text = readText(entry.text);
  if (text === null) {
    return null;
  }

  return { messageId: id, timestamp, text };
}

/**
 * Parse exported JSON into messages, skipping unusable entries
 *
 * @throws {MessageSourceError} When the payload has no message list
 */
export function parseMessages(raw: unknown): RawMessage[] {
  const entries = Array.isArray(raw)
    ? raw
    : isRecord(raw) && Array.isArray(raw.messages)
      ? raw.messages
      : null;

  if (entries === null) {
    throw new MessageSourceError(
      "expected an array of messages or an object with a 'messages' array",
    );
  }

  const messages: RawMessage[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const message = toRawMessage(entry);
    if (message) {
      messages.push(message);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.warn("Skipped unusable export entries", { skipped });
  }

  return messages;
}

/**
 * Load messages from a JSON export file (path relative to cwd)
 *
 * @throws {MessageSourceError} When the file cannot be read or parsed
 */
export function loadMessagesFromFile(path: string): RawMessage[] {
  const fullPath = resolve(process.cwd(), path);

  let content: string;
  try {
    content = readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new MessageSourceError(
      `cannot read ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new MessageSourceError(
      `invalid JSON in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const messages = parseMessages(raw);
  logger.debug("Messages loaded", { path: fullPath, count: messages.length });
  return messages;
}
