export * from "./salaryParser";
