export * from "./stagingArea";
