export * from "./properties";
