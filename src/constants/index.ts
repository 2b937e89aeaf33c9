/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./signs";
export * from "./parsing";
export * from "./ingestion";
export * from "./export";
export * from "./runner";
export * from "./db";
export * from "./clients/http";
