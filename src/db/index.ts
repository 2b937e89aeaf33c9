/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/sourceMessagesRepo";
export * from "./repos/vacanciesRepo";
export * from "./repos/statisticsRepo";
export * from "./repos/serviceMessagesRepo";
export * from "./repos/vacancyWebRepo";
