/**
 * Unit tests for message classification
 *
 * Pure: registry loaded from the bundled configuration, no DB, no network
 */

import { describe, it, expect } from "vitest";
import { loadSignRegistry } from "@/signs";
import { classify, classifyMessage } from "@/parsing/classifier";

const registry = loadSignRegistry("data/signs.json");

const VACANCY_TEXT =
  "**Go Engineer** at Cloud Works\nBerlin, 5 years of experience\n\n__Подписка:__ Go";
const STATISTIC_TEXT =
  "Статистика на Джинне по запросу Python\nВакансий за 30 дней: 120";

describe("classifyMessage", () => {
  describe("sign matching", () => {
    it("should classify a text with a subscription footer as vacancy", () => {
      expect(classifyMessage("Some heading\n\n__Подписка:__ Go", registry)).toBe(
        "vacancy",
      );
    });

    it("should classify statistic digests", () => {
      expect(classifyMessage(STATISTIC_TEXT, registry)).toBe("statistic");
    });

    it("should classify subscription listings as service", () => {
      expect(
        classifyMessage("Активні підписки:\n1. Python\n2. Go", registry),
      ).toBe("service");
    });

    it("should classify known bot commands as service", () => {
      expect(classifyMessage("/pause Python developer", registry)).toBe("service");
    });

    it("should match signs case-sensitively", () => {
      expect(
        classifyMessage("a note about the subscription: nothing else", registry),
      ).toBe("unclassified");
    });
  });

  describe("priority order", () => {
    it("should prefer vacancy over statistic when both signs are present", () => {
      expect(
        classifyMessage(`${STATISTIC_TEXT}\nSubscription: Python`, registry),
      ).toBe("vacancy");
    });

    it("should prefer statistic over service when both signs are present", () => {
      expect(classifyMessage(`${STATISTIC_TEXT}\n/list`, registry)).toBe(
        "statistic",
      );
    });

    it("should prefer vacancy over service when both signs are present", () => {
      expect(classifyMessage(`${VACANCY_TEXT}\n/help`, registry)).toBe("vacancy");
    });
  });

  describe("bot commands", () => {
    it("should classify a bare command as service through the command sign", () => {
      expect(classifyMessage("/start", registry)).toBe("service");
      expect(classifyMessage("  /stop \n", registry)).toBe("service");
      expect(classifyMessage("/subscribe", registry)).toBe("service");
    });

    it("should not treat a command followed by text as a bare command", () => {
      expect(classifyMessage("/start now", registry)).toBe("unclassified");
    });
  });

  describe("unclassified", () => {
    it("should classify a text with no signs as unclassified", () => {
      expect(
        classifyMessage("Weekly reminder: update your profile today", registry),
      ).toBe("unclassified");
    });

    it("should classify a short single word as unclassified", () => {
      expect(classifyMessage("Hello", registry)).toBe("unclassified");
      expect(classifyMessage("ok", registry)).toBe("unclassified");
    });

    it("should classify an empty text as unclassified", () => {
      expect(classifyMessage("", registry)).toBe("unclassified");
      expect(classifyMessage("   ", registry)).toBe("unclassified");
    });
  });
});

describe("classify", () => {
  it("should carry the message identity into the tagged variant", () => {
    const classified = classify(
      { messageId: 42, timestamp: "2024-03-01T09:15:00", text: VACANCY_TEXT },
      registry,
    );

    expect(classified).toEqual({
      kind: "vacancy",
      messageId: 42,
      timestamp: "2024-03-01T09:15:00",
      rawText: VACANCY_TEXT,
    });
  });
});
