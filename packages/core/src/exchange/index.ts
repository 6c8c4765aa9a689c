export * from "./record-exchange";
