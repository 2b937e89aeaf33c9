export * from "./parsingStatus";
