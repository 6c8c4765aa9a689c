export * from "./codec.types";
export * from "./json.codec";
export * from "./string.codec";
