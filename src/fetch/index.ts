export * from "./documentFetcher";
