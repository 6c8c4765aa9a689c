/**
 * Client Interfaces
 *
 * The engines drive broker clients only through these interfaces.
 * Broker-specific implementations live in adapter packages
 * (e.g., @kafkaprobe/adapter-kafka).
 */

import type { Properties } from "../config";
import type { Header, RecordMetadata } from "../records";

/**
 * Encoded record handed to a producer client.
 */
export interface OutgoingRecord {
	readonly key: string | Buffer | null;
	readonly value: string | Buffer | null;
	readonly headers: readonly Header[];
}

/**
 * Raw record returned by a consumer poll.
 */
export interface IncomingRecord {
	readonly topic: string;
	readonly partition: number;
	readonly offset: number;
	readonly key: Buffer | null;
	readonly value: Buffer | null;
	readonly headers: readonly Header[];
}

/**
 * An open transaction on a transactional producer.
 */
export interface ProducerTransaction {
	/**
	 * Send one record and wait for its acknowledgement.
	 */
	send(topic: string, record: OutgoingRecord): Promise<RecordMetadata>;
	commit(): Promise<void>;
	abort(): Promise<void>;
}

/**
 * Connected producer bound to one effective configuration.
 */
export interface ProducerClient {
	/**
	 * Send one record and wait for its acknowledgement.
	 */
	send(topic: string, record: OutgoingRecord): Promise<RecordMetadata>;

	/**
	 * Begin a transaction. Requires a transactional configuration.
	 */
	beginTransaction(): Promise<ProducerTransaction>;

	close(): Promise<void>;
}

/**
 * Connected consumer bound to one effective configuration. Used for one call only.
 */
export interface ConsumerClient {
	/**
	 * Subscribe to a topic. Partitions listed in `positions` start at the given
	 * offset; records below it are never returned by poll().
	 */
	subscribe(topic: string, positions: ReadonlyMap<number, number>): Promise<void>;

	/**
	 * Return the records that arrived since the last poll, waiting at most
	 * `maxWaitMs` for the first one. Offsets never repeat within one client.
	 */
	poll(maxWaitMs: number): Promise<IncomingRecord[]>;

	close(): Promise<void>;
}

/**
 * Creates broker clients from effective configurations.
 *
 * @example
 * ```typescript
 * class KafkaAdapter implements ExchangeClientFactory {
 *   readonly type = "kafka";
 *   // ...
 * }
 * ```
 */
export interface ExchangeClientFactory {
	/**
	 * Adapter type identifier (e.g., "kafka")
	 */
	readonly type: string;

	/**
	 * Create and connect a producer.
	 *
	 * @throws ConfigError if the properties are rejected
	 */
	createProducer(properties: Properties): Promise<ProducerClient>;

	/**
	 * Create and connect a consumer.
	 *
	 * @throws ConfigError if the properties are rejected
	 */
	createConsumer(properties: Properties): Promise<ConsumerClient>;

	/**
	 * Release every resource the factory still holds.
	 */
	dispose(): Promise<void>;
}
