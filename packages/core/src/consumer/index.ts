export * from "./clock";
export * from "./record-consumer";
