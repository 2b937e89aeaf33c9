/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./text/htmlToText";
export * from "./numeric";
export * from "./concurrency";
export * from "./signValidation";
