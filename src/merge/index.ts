export * from "./consolidate";
export * from "./masterDataset";
export * from "./mergeEngine";
export * from "./mergeLock";
