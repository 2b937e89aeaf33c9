/**
 * Parsing barrel exports
 */

export * from "./signMatching";
export * from "./classifier";
export * from "./text";
export * from "./salary";
export * from "./html";
export * from "./status";
