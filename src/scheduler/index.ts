export * from "./scheduler";
export * from "./stateMachine";
