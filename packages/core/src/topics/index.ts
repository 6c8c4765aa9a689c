export * from "./topic.types";
