/**
 * Unit tests for sign registry loading, validation and compilation
 */

import { readFileSync } from "fs";
import { join } from "path";
import { describe, it, expect } from "vitest";
import {
  createSignRegistry,
  loadSignRegistry,
  SignRegistryCompilationError,
} from "@/signs";
import {
  SignRegistryValidationError,
  validateSignConfigRaw,
  validateTechTokens,
} from "@/utils/signValidation";

function readBundledConfig() {
  return JSON.parse(
    readFileSync(join(process.cwd(), "data", "signs.json"), "utf-8"),
  );
}

describe("loadSignRegistry", () => {
  it("should load and compile the bundled configuration", () => {
    const registry = loadSignRegistry("data/signs.json");

    expect(registry.version).toBe("1.0.0");
    expect(registry.messageSigns.vacancy.map((sign) => sign.raw)).toEqual([
      "Subscription:",
      "Подписка:",
      "Підписка:",
    ]);
    expect(registry.vacancyText.experience[0].years).toBe(0);
    expect(registry.vacancyText.experience[1].years).toBeNull();
    expect(registry.techTokens).toHaveLength(51);
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it("should throw when the configuration file does not exist", () => {
    expect(() => loadSignRegistry("data/missing-signs.json")).toThrow();
  });
});

describe("createSignRegistry", () => {
  it("should treat plain signs as literals", () => {
    const registry = createSignRegistry(validateSignConfigRaw(readBundledConfig()), [
      "Python",
    ]);
    const add = registry.messageSigns.service.find((sign) => sign.raw === "/add");

    expect(add?.pattern.test("/add Python")).toBe(true);
    expect(add?.pattern.test("add Python")).toBe(false);
  });

  it("should treat slash-delimited signs as regex fragments", () => {
    const registry = createSignRegistry(validateSignConfigRaw(readBundledConfig()), [
      "Python",
    ]);
    const [splitter] = registry.vacancyText.splitter;

    expect(splitter.source).toBe("[*_`]*(?:Subscription|Подписка|Підписка):");
    expect(splitter.pattern.exec("text __Подписка:__ Go")?.index).toBe(5);
  });

  it("should substitute the numeric pattern into the salary grammar", () => {
    const registry = createSignRegistry(validateSignConfigRaw(readBundledConfig()), [
      "Python",
    ]);

    expect(registry.salary.singleSource).toBe("\\$?\\s?([-+]?\\d+(?:[.,]\\d+)?)");
    expect(registry.salary.range.exec("$1000-2000")?.slice(1)).toEqual([
      "1000",
      "2000",
    ]);
  });

  it("should word-bound technology tokens", () => {
    const registry = createSignRegistry(validateSignConfigRaw(readBundledConfig()), [
      "Java",
      "SQL",
      "C++",
    ]);
    const [java, sql, cpp] = registry.techTokens;

    expect(java.pattern.test("JavaScript")).toBe(false);
    expect(java.pattern.test("Java, Spring")).toBe(true);
    expect(sql.pattern.test("PostgreSQL")).toBe(false);
    expect(cpp.pattern.test("Modern C++ and Qt")).toBe(true);
  });

  it("should throw SignRegistryCompilationError for an invalid regex sign", () => {
    const raw = readBundledConfig();
    raw.vacancyText.splitter = ["/(unclosed/"];

    expect(() => createSignRegistry(validateSignConfigRaw(raw), ["Python"])).toThrow(
      SignRegistryCompilationError,
    );
  });

  it("should throw when the range pattern captures fewer than two bounds", () => {
    const raw = readBundledConfig();
    raw.patterns.salary_range = "\\$?({numeric_pattern})";

    expect(() => createSignRegistry(validateSignConfigRaw(raw), ["Python"])).toThrow(
      "Sign registry compilation failed: patterns.salary_range must capture both bounds",
    );
  });
});

describe("validateSignConfigRaw", () => {
  it("should accept the bundled configuration", () => {
    const config = validateSignConfigRaw(readBundledConfig());

    expect(config.techTokensPath).toBe("data/tech_tokens.json");
    expect(config.html.fields.map((entry) => entry.field)).toEqual([
      "lingvo",
      "experience",
      "work_type",
      "domain",
      "company_type",
      "offices",
    ]);
  });

  it("should reject an empty category sign set", () => {
    const raw = readBundledConfig();
    raw.messageSigns.statistic = [];

    expect(() => validateSignConfigRaw(raw)).toThrow(
      "Sign registry validation failed: messageSigns.statistic cannot be empty",
    );
  });

  it("should reject a missing statistic field", () => {
    const raw = readBundledConfig();
    delete raw.statisticText.candidatesOnline;

    expect(() => validateSignConfigRaw(raw)).toThrow(SignRegistryValidationError);
  });

  it("should reject a blank sign", () => {
    const raw = readBundledConfig();
    raw.vacancyText.positionCompany = [" в ", "   "];

    expect(() => validateSignConfigRaw(raw)).toThrow(
      "vacancyText.positionCompany[1] cannot be empty or whitespace-only",
    );
  });

  it("should reject an unknown html field", () => {
    const raw = readBundledConfig();
    raw.html.fields[0].field = "salary";

    expect(() => validateSignConfigRaw(raw)).toThrow(
      'html.fields[0].field must be one of lingvo, experience, work_type, domain, company_type, offices, got "salary"',
    );
  });

  it("should reject a negative experience value", () => {
    const raw = readBundledConfig();
    raw.vacancyText.experience[0].years = -1;

    expect(() => validateSignConfigRaw(raw)).toThrow(
      "vacancyText.experience[0].years must be a non-negative number",
    );
  });

  it("should reject a non-object configuration", () => {
    expect(() => validateSignConfigRaw([])).toThrow(
      "sign configuration must be an object",
    );
  });
});

describe("validateTechTokens", () => {
  it("should reject duplicate tokens", () => {
    expect(() => validateTechTokens(["Go", "Rust", "Go"])).toThrow(
      'techTokens has duplicate token "Go"',
    );
  });

  it("should return the tokens in order", () => {
    expect(validateTechTokens(["Go", "Rust"])).toEqual(["Go", "Rust"]);
  });
});
