/**
 * Message classifier
 *
 * Assigns exactly one category to a message by scanning the category
 * sign sets in a fixed priority order.
 */

import type {
  ClassifiedMessage,
  MessageCategory,
  RawMessage,
  SignRegistry,
} from "@/types";
import { CATEGORY_PRIORITY } from "@/constants/parsing";
import { matchesAnySign } from "../signMatching";

/**
 * Determine the category of a message text.
 *
 * Categories are tested in CATEGORY_PRIORITY order (vacancy, statistic,
 * service); the first one with any matching sign wins, so a text
 * carrying signs of several categories resolves by priority alone.
 * No match at all gives "unclassified". Matching is case-sensitive.
 * Never throws.
 *
 * @example
 * classifyMessage("Python Developer в Acme\n__Подписка:__ Python", registry)
 * // "vacancy"
 */
export function classifyMessage(
  text: string,
  registry: SignRegistry,
): MessageCategory {
  for (const category of CATEGORY_PRIORITY) {
    if (matchesAnySign(text, registry.messageSigns[category])) {
      return category;
    }
  }

  return "unclassified";
}

/**
 * Classify an inbound message into its tagged variant
 */
export function classify(
  message: RawMessage,
  registry: SignRegistry,
): ClassifiedMessage {
  return {
    kind: classifyMessage(message.text, registry),
    messageId: message.messageId,
    timestamp: message.timestamp,
    rawText: message.text,
  };
}
