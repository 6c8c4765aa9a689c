/**
 * @kafkaprobe/adapter-kafka
 *
 * KafkaJS clients for kafkaprobe record exchanges.
 *
 * @example
 * ```typescript
 * import { ObserveKeyValues, SendValues } from "kafkaprobe";
 * import { createKafkaExchange } from "@kafkaprobe/adapter-kafka";
 *
 * const exchange = createKafkaExchange({ brokers: ["localhost:9092"], testMode: true });
 *
 * await exchange.send(SendValues.to("events", ["user.created"]).useDefaults());
 * const values = await exchange.observeValues(ObserveKeyValues.on("events", 1).useDefaults());
 *
 * await exchange.dispose();
 * ```
 *
 * @packageDocumentation
 */

import { type Clock, RecordExchange } from "kafkaprobe";
import { KafkaAdapter } from "./kafka.adapter";
import type { KafkaAdapterConfig, KafkaFactory } from "./kafka.types";

// Main adapter
export { KafkaAdapter } from "./kafka.adapter";

// Building blocks (for advanced use cases)
export { KafkaConsumerClient, fromKafkaHeaders } from "./kafka.consumer-client";
export { KafkaProducerClient, toKafkaHeaders, toRecordMetadata } from "./kafka.producer-client";
export { KafkaTopicManager } from "./kafka.topic-manager";
export { toConsumerOptions, toProducerOptions } from "./kafka.config";
export { createKafkaLogCreator } from "./kafka.logging";
export { KafkaEnvSchema, kafkaConfigFromEnv } from "./kafka.env";

// Types
export type { KafkaConsumerClientOptions } from "./kafka.consumer-client";
export type { KafkaConsumerOptions, KafkaProducerOptions, KafkaSendOptions } from "./kafka.config";
export type { KafkaEnv } from "./kafka.env";
export type {
	KafkaAdapterConfig,
	KafkaAdminLike,
	KafkaConsumerLike,
	KafkaFactory,
	KafkaLike,
	KafkaProducerLike,
	KafkaTransactionLike,
} from "./kafka.types";

export interface KafkaExchangeOptions {
	clock?: Clock;
	pollIntervalMs?: number;
	transactionalId?: string;
	kafkaFactory?: KafkaFactory;
}

/**
 * Record exchange backed by a {@link KafkaAdapter} that also serves topic administration.
 */
export function createKafkaExchange(config: KafkaAdapterConfig, options: KafkaExchangeOptions = {}): RecordExchange {
	const adapter = new KafkaAdapter(config, options.kafkaFactory);
	return new RecordExchange({
		factory: adapter,
		cluster: adapter,
		topics: adapter,
		logger: config.logger,
		clock: options.clock,
		pollIntervalMs: options.pollIntervalMs,
		transactionalId: options.transactionalId,
	});
}
