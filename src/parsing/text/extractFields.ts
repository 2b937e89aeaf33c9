/**
 * Field extraction dispatch over the classified message variant
 */

import type { ClassifiedMessage, ExtractedFields, SignRegistry } from "@/types";
import { extractVacancyText } from "./vacancyText";
import { extractStatisticText } from "./statisticText";

/**
 * Run the extractor that belongs to the message category.
 *
 * Each variant carries only its own fields; service messages pass
 * their text through verbatim and unclassified ones yield nothing.
 */
export function extractFields(
  message: ClassifiedMessage,
  registry: SignRegistry,
): ExtractedFields {
  switch (message.kind) {
    case "vacancy":
      return {
        kind: "vacancy",
        fields: extractVacancyText(message.rawText, registry),
      };
    case "statistic":
      return {
        kind: "statistic",
        fields: extractStatisticText(message.rawText, registry),
      };
    case "service":
      return { kind: "service", text: message.rawText };
    case "unclassified":
      return { kind: "unclassified" };
  }
}
