/**
 * Sign registry barrel exports
 */

export * from "./loader";
