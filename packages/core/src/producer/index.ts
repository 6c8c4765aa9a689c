export * from "./record-producer";
