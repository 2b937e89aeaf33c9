export * from "./logger";
export * from "./messages";
export * from "./signs";
export * from "./db";
export * from "./ingestion";
export * from "./export";
export * from "./runner";
export * from "./clients/http";
