/**
 * Record Exchange
 *
 * Single entry point for tests: one producer engine, one observation engine and
 * optional topic administration over a shared client factory and cluster.
 *
 * @example
 * ```typescript
 * const exchange = new RecordExchange({ factory: adapter, cluster: adapter, topics: adapter });
 *
 * await exchange.send(SendValues.to("orders", ['{"id":1}']).useDefaults());
 * const values = await exchange.observeValues(ObserveKeyValues.on("orders", 1).useDefaults());
 *
 * await exchange.dispose();
 * ```
 */

import type { ExchangeClientFactory } from "../client";
import { type Clock, RecordConsumer } from "../consumer";
import { ConfigError } from "../errors";
import { createLogger, type Logger } from "../logging";
import { RecordProducer } from "../producer";
import type { KeyValue, RecordMetadata } from "../records";
import type { ObserveKeyValuesRequest, ReadKeyValuesRequest, SendRequest } from "../requests";
import type { ClusterProvider, LeaderAndIsr, TopicConfig, TopicManager } from "../topics";

export interface RecordExchangeOptions {
	factory: ExchangeClientFactory;
	cluster: ClusterProvider;

	/**
	 * Required for the topic administration methods only
	 */
	topics?: TopicManager;

	logger?: Logger;
	clock?: Clock;
	pollIntervalMs?: number;
	transactionalId?: string;
}

export class RecordExchange {
	private readonly factory: ExchangeClientFactory;
	private readonly topics?: TopicManager;
	private readonly producer: RecordProducer;
	private readonly consumer: RecordConsumer;
	private readonly logger: Logger;
	private disposed = false;

	constructor(options: RecordExchangeOptions) {
		this.factory = options.factory;
		this.topics = options.topics;
		this.logger = options.logger ?? createLogger("kafkaprobe");
		this.producer = new RecordProducer({
			factory: options.factory,
			cluster: options.cluster,
			logger: this.logger,
			transactionalId: options.transactionalId,
		});
		this.consumer = new RecordConsumer({
			factory: options.factory,
			cluster: options.cluster,
			logger: this.logger,
			clock: options.clock,
			pollIntervalMs: options.pollIntervalMs,
		});
	}

	// =========================================================================
	// Records
	// =========================================================================

	send<K, V>(request: SendRequest<K, V>): Promise<RecordMetadata[]> {
		return this.producer.send(request);
	}

	read<K, V>(request: ReadKeyValuesRequest<K, V>): Promise<KeyValue<K, V | null>[]> {
		return this.consumer.read(request);
	}

	readValues<K, V>(request: ReadKeyValuesRequest<K, V>): Promise<(V | null)[]> {
		return this.consumer.readValues(request);
	}

	observe<K, V>(request: ObserveKeyValuesRequest<K, V>): Promise<KeyValue<K, V | null>[]> {
		return this.consumer.observe(request);
	}

	observeValues<K, V>(request: ObserveKeyValuesRequest<K, V>): Promise<(V | null)[]> {
		return this.consumer.observeValues(request);
	}

	// =========================================================================
	// Topics
	// =========================================================================

	async createTopic(config: TopicConfig): Promise<void> {
		return this.topicManager().createTopic(config);
	}

	async deleteTopic(name: string): Promise<void> {
		return this.topicManager().deleteTopic(name);
	}

	async exists(name: string): Promise<boolean> {
		return this.topicManager().exists(name);
	}

	async fetchLeaderAndIsr(name: string): Promise<Map<number, LeaderAndIsr>> {
		return this.topicManager().fetchLeaderAndIsr(name);
	}

	/**
	 * Close cached producers, then release the client factory. Safe to call twice.
	 */
	async dispose(): Promise<void> {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		try {
			await this.producer.close();
		} finally {
			await this.factory.dispose();
		}
		this.logger.debug("Exchange disposed");
	}

	private topicManager(): TopicManager {
		if (!this.topics) {
			throw new ConfigError("No topic manager configured for this exchange");
		}
		return this.topics;
	}
}
