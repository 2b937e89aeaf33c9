export * from "./htmlFieldExtractor";
export * from "./techTokens";
