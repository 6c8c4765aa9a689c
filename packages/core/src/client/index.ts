export * from "./client.types";
