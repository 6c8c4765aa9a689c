/**
 * Cluster and Topic Interfaces
 *
 * Brokers and topics are managed outside the engines; the engines only see
 * the broker list and an optional topic administration handle.
 */

import type { Properties } from "../config";
import { ConfigError } from "../errors";

/**
 * Supplies the broker list of a running cluster.
 */
export interface ClusterProvider {
	/**
	 * Comma-separated broker addresses, e.g. "localhost:9092,localhost:9093"
	 */
	brokerList(): string;
}

/**
 * Leader and in-sync replicas of one partition.
 */
export interface LeaderAndIsr {
	readonly leader: number;
	readonly isr: readonly number[];
}

/**
 * Topic administration.
 */
export interface TopicManager {
	createTopic(config: TopicConfig): Promise<void>;

	/**
	 * Mark a topic for deletion. The broker may finish deleting it later.
	 */
	deleteTopic(name: string): Promise<void>;

	/**
	 * Whether the broker lists the topic, including topics pending deletion.
	 */
	exists(name: string): Promise<boolean>;

	/**
	 * Partition to leader/ISR of a topic.
	 */
	fetchLeaderAndIsr(name: string): Promise<Map<number, LeaderAndIsr>>;
}

/**
 * Description of a topic to create.
 */
export interface TopicConfig {
	readonly name: string;
	readonly partitions: number;
	readonly replicationFactor: number;
	/**
	 * Topic-level settings, e.g. "cleanup.policy"
	 */
	readonly properties: Properties;
}

/**
 * Builder for {@link TopicConfig}. One partition and one replica unless told otherwise.
 *
 * @example
 * ```typescript
 * await exchange.createTopic(
 *   TopicConfigBuilder.withName("orders").withNumberOfPartitions(3).with("cleanup.policy", "compact").build()
 * );
 * ```
 */
export class TopicConfigBuilder {
	private partitions = 1;
	private replicationFactor = 1;
	private readonly overrides: Record<string, string> = {};

	private constructor(private readonly name: string) {}

	static withName(name: string): TopicConfigBuilder {
		return new TopicConfigBuilder(name);
	}

	withNumberOfPartitions(partitions: number): this {
		this.partitions = partitions;
		return this;
	}

	withNumberOfReplicas(replicationFactor: number): this {
		this.replicationFactor = replicationFactor;
		return this;
	}

	with(name: string, value: string): this {
		this.overrides[name] = value;
		return this;
	}

	build(): TopicConfig {
		if (this.name.trim().length === 0) {
			throw new ConfigError("Topic name must not be empty");
		}
		if (!Number.isInteger(this.partitions) || this.partitions < 1) {
			throw new ConfigError(`Number of partitions must be at least 1, got ${this.partitions}`);
		}
		if (!Number.isInteger(this.replicationFactor) || this.replicationFactor < 1) {
			throw new ConfigError(`Number of replicas must be at least 1, got ${this.replicationFactor}`);
		}
		return Object.freeze({
			name: this.name,
			partitions: this.partitions,
			replicationFactor: this.replicationFactor,
			properties: Object.freeze({ ...this.overrides }),
		});
	}

	useDefaults(): TopicConfig {
		return this.build();
	}
}
