/**
 * Kafka Adapter
 *
 * Client factory, cluster provider and topic manager for kafkaprobe using KafkaJS.
 */

import { Kafka, type KafkaConfig, logLevel as KafkaLogLevel } from "kafkajs";
import {
	type ClusterProvider,
	ConfigError,
	createLogger,
	type ExchangeClientFactory,
	type LeaderAndIsr,
	type Logger,
	type Properties,
	type TopicConfig,
	type TopicManager,
} from "kafkaprobe";
import { toConsumerOptions, toProducerOptions } from "./kafka.config";
import { KafkaConsumerClient } from "./kafka.consumer-client";
import { createKafkaLogCreator } from "./kafka.logging";
import { KafkaProducerClient } from "./kafka.producer-client";
import { KafkaTopicManager } from "./kafka.topic-manager";
import type { KafkaAdapterConfig, KafkaFactory } from "./kafka.types";

const DEFAULT_CLIENT_ID = "kafkaprobe";

const defaultKafkaFactory: KafkaFactory = (config) => new Kafka(config);

/**
 * Kafka adapter for kafkaprobe.
 *
 * @example
 * ```typescript
 * import { RecordExchange } from "kafkaprobe";
 * import { KafkaAdapter } from "@kafkaprobe/adapter-kafka";
 *
 * const adapter = new KafkaAdapter({ brokers: ["localhost:9092"], testMode: true });
 * const exchange = new RecordExchange({ factory: adapter, cluster: adapter, topics: adapter });
 * ```
 */
export class KafkaAdapter implements ExchangeClientFactory, ClusterProvider, TopicManager {
	readonly type = "kafka";
	private readonly config: KafkaAdapterConfig;
	private readonly logger: Logger;
	private readonly kafkaFactory: KafkaFactory;
	private producers: KafkaProducerClient[] = [];
	private consumers: KafkaConsumerClient[] = [];
	private topicManager?: KafkaTopicManager;

	constructor(config: KafkaAdapterConfig, kafkaFactory: KafkaFactory = defaultKafkaFactory) {
		if (config.brokers.length === 0) {
			throw new ConfigError("At least one broker is required");
		}
		this.config = config;
		this.logger = config.logger ?? createLogger("kafkaprobe:kafka");
		this.kafkaFactory = kafkaFactory;
	}

	/**
	 * Consumers created by this adapter that are still open
	 */
	get openConsumerCount(): number {
		return this.consumers.length;
	}

	brokerList(): string {
		return this.config.brokers.join(",");
	}

	async createProducer(properties: Properties): Promise<KafkaProducerClient> {
		const options = toProducerOptions(properties, this.baseConfig());
		this.warnIgnored("producer", options.ignored);

		const kafka = this.kafkaFactory(options.kafka);
		const client = new KafkaProducerClient(kafka.producer(options.producer), options.send);
		await client.connect();
		this.producers.push(client);
		return client;
	}

	async createConsumer(properties: Properties): Promise<KafkaConsumerClient> {
		const options = toConsumerOptions(properties, this.baseConfig());
		this.warnIgnored("consumer", options.ignored);

		// Apply test mode optimizations for faster consumer coordination
		const testModeConfig = this.config.testMode
			? {
					heartbeatInterval: 500,
					sessionTimeout: 6000,
					rebalanceTimeout: 10000,
					maxWaitTimeInMs: 100,
				}
			: {};

		const kafka = this.kafkaFactory(options.kafka);
		const consumer = kafka.consumer({ ...testModeConfig, ...options.consumer });
		const client = new KafkaConsumerClient(consumer, {
			fromBeginning: options.fromBeginning,
			autoCommit: options.autoCommit,
			logger: this.logger,
			onClose: (closed) => {
				this.consumers = this.consumers.filter((open) => open !== closed);
			},
		});
		await client.connect();
		this.consumers.push(client);
		return client;
	}

	// =========================================================================
	// Topics
	// =========================================================================

	async createTopic(config: TopicConfig): Promise<void> {
		return this.topics().createTopic(config);
	}

	async deleteTopic(name: string): Promise<void> {
		return this.topics().deleteTopic(name);
	}

	async exists(name: string): Promise<boolean> {
		return this.topics().exists(name);
	}

	async fetchLeaderAndIsr(name: string): Promise<Map<number, LeaderAndIsr>> {
		return this.topics().fetchLeaderAndIsr(name);
	}

	/**
	 * Close every client this adapter created that is still open, then the admin.
	 */
	async dispose(): Promise<void> {
		for (const producer of this.producers) {
			await producer.close();
		}
		this.producers = [];

		for (const consumer of [...this.consumers]) {
			await consumer.close();
		}
		this.consumers = [];

		await this.topicManager?.close();
		this.topicManager = undefined;
	}

	private topics(): KafkaTopicManager {
		if (!this.topicManager) {
			const kafka = this.kafkaFactory({ ...this.baseConfig(), brokers: this.config.brokers });
			this.topicManager = new KafkaTopicManager(kafka.admin());
		}
		return this.topicManager;
	}

	private baseConfig(): Partial<KafkaConfig> {
		// Apply test mode optimizations for faster connections
		const testModeKafkaConfig: Partial<KafkaConfig> = this.config.testMode
			? {
					connectionTimeout: 3000,
					requestTimeout: 5000,
					enforceRequestTimeout: true,
					retry: {
						initialRetryTime: 100,
						retries: 3,
						maxRetryTime: 1000,
					},
				}
			: {};

		return {
			clientId: this.config.clientId ?? DEFAULT_CLIENT_ID,
			logLevel: this.config.logLevel ?? KafkaLogLevel.WARN,
			logCreator: createKafkaLogCreator(this.logger),
			...testModeKafkaConfig,
			...this.config.kafkaOptions,
		};
	}

	private warnIgnored(kind: "producer" | "consumer", names: string[]): void {
		for (const name of names) {
			this.logger.warn('Ignoring %s property "%s": no KafkaJS equivalent', kind, name);
		}
	}
}
