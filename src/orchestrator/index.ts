export * from "./extractionPass";
export * from "./orchestrator";
