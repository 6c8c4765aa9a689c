export * from "./consume-builders";
export * from "./request-builder";
export * from "./request.types";
export * from "./send-transactional";
export * from "./send-values";
