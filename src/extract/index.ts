export * from "./extractionService";
export * from "./normalizeOutput";
export * from "./prompt";
