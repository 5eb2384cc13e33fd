export * from "./contentHasher";
