/**
 * Kafka Adapter Types
 *
 * Configuration and the slices of the KafkaJS API the adapter drives.
 */

import type {
	Admin,
	ConsumerConfig,
	ConsumerCrashEvent,
	ConsumerRunConfig,
	ConsumerSubscribeTopics,
	KafkaConfig,
	logLevel,
	ProducerConfig,
	ProducerRecord,
	RecordMetadata as KafkaRecordMetadata,
} from "kafkajs";
import type { Logger } from "kafkaprobe";

/**
 * Kafka adapter configuration
 */
export interface KafkaAdapterConfig {
	/**
	 * Kafka broker addresses
	 * @example ["localhost:9092", "localhost:9093"]
	 */
	brokers: string[];

	/**
	 * Client ID used unless a request sets "client.id"
	 * @default "kafkaprobe"
	 */
	clientId?: string;

	/**
	 * Log level for KafkaJS
	 * @default logLevel.WARN
	 */
	logLevel?: logLevel;

	/**
	 * Shorter connection, request and retry timings for local test clusters
	 * @default false
	 */
	testMode?: boolean;

	/**
	 * Additional KafkaJS client options (ssl, sasl, ...). The broker list always
	 * comes from the request properties.
	 */
	kafkaOptions?: Partial<KafkaConfig>;

	/**
	 * Receives adapter warnings and KafkaJS logs
	 */
	logger?: Logger;
}

/**
 * Transaction handle as returned by `producer.transaction()`
 */
export interface KafkaTransactionLike {
	send(record: ProducerRecord): Promise<KafkaRecordMetadata[]>;
	commit(): Promise<void>;
	abort(): Promise<void>;
}

/**
 * Producer operations used by {@link KafkaProducerClient}
 */
export interface KafkaProducerLike {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	send(record: ProducerRecord): Promise<KafkaRecordMetadata[]>;
	transaction(): Promise<KafkaTransactionLike>;
}

/**
 * Consumer operations used by {@link KafkaConsumerClient}
 */
export interface KafkaConsumerLike {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	subscribe(subscription: ConsumerSubscribeTopics): Promise<void>;
	run(config?: ConsumerRunConfig): Promise<void>;
	seek(position: { topic: string; partition: number; offset: string }): void;
	stop(): Promise<void>;
	on(event: "consumer.crash", listener: (event: ConsumerCrashEvent) => void): () => void;
}

/**
 * Admin operations used by {@link KafkaTopicManager}
 */
export type KafkaAdminLike = Pick<
	Admin,
	"connect" | "disconnect" | "createTopics" | "deleteTopics" | "listTopics" | "fetchTopicMetadata"
>;

/**
 * Client factory of one KafkaJS configuration
 */
export interface KafkaLike {
	producer(config?: ProducerConfig): KafkaProducerLike;
	consumer(config: ConsumerConfig): KafkaConsumerLike;
	admin(): KafkaAdminLike;
}

/**
 * Creates a {@link KafkaLike} per effective configuration. Replaced in tests.
 */
export type KafkaFactory = (config: KafkaConfig) => KafkaLike;
