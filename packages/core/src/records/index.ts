export * from "./key-value";
export * from "./record-metadata";
