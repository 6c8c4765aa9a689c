/**
 * kafkaprobe
 *
 * Awaitable record exchange with a Kafka cluster for integration tests.
 * Sends return once every record is acknowledged; reads and observations
 * return once enough matching records arrived or a deadline passed.
 *
 * Broker clients come from an adapter package:
 * - @kafkaprobe/adapter-kafka - KafkaJS
 *
 * @example
 * ```typescript
 * import { ObserveKeyValues, RecordExchange, SendKeyValues, KeyValue } from "kafkaprobe";
 * import { KafkaAdapter } from "@kafkaprobe/adapter-kafka";
 *
 * const adapter = new KafkaAdapter({ brokers: ["localhost:9092"] });
 * const exchange = new RecordExchange({ factory: adapter, cluster: adapter, topics: adapter });
 *
 * await exchange.send(SendKeyValues.to("orders", [new KeyValue("o-1", "created")]).useDefaults());
 * const records = await exchange.observe(
 *   ObserveKeyValues.on("orders", 1).filterOnKeys((key) => key === "o-1").observeFor(5, "seconds").build()
 * );
 * ```
 */

// Client, cluster and topic interfaces implemented by adapters
export * from "./client";
export * from "./topics";
// Records, codecs and filters
export * from "./codecs";
export * from "./filters";
export * from "./records";
// Configuration and requests
export * from "./config";
export * from "./requests";
// Engines
export * from "./consumer";
export * from "./exchange";
export * from "./producer";
// Errors and logging
export * from "./errors";
export * from "./logging";
export * from "./utils";
