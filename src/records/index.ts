export * from "./resultRecords";
