/**
 * Kafka Topic Manager
 *
 * Topic administration through the KafkaJS admin client. The admin connects
 * on first use.
 */

import { ExchangeError, type LeaderAndIsr, type TopicConfig, type TopicManager, toError } from "kafkaprobe";
import type { KafkaAdminLike } from "./kafka.types";

export class KafkaTopicManager implements TopicManager {
	private connection?: Promise<void>;

	constructor(private readonly admin: KafkaAdminLike) {}

	async createTopic(config: TopicConfig): Promise<void> {
		const admin = await this.connected();
		let created: boolean;
		try {
			created = await admin.createTopics({
				waitForLeaders: true,
				topics: [
					{
						topic: config.name,
						numPartitions: config.partitions,
						replicationFactor: config.replicationFactor,
						configEntries: Object.entries(config.properties).map(([name, value]) => ({ name, value })),
					},
				],
			});
		} catch (error) {
			throw new ExchangeError(`Failed to create topic "${config.name}": ${toError(error).message}`, { cause: error });
		}
		if (!created) {
			throw new ExchangeError(`Topic "${config.name}" already exists`);
		}
	}

	async deleteTopic(name: string): Promise<void> {
		const admin = await this.connected();
		try {
			await admin.deleteTopics({ topics: [name] });
		} catch (error) {
			throw new ExchangeError(`Failed to delete topic "${name}": ${toError(error).message}`, { cause: error });
		}
	}

	async exists(name: string): Promise<boolean> {
		const admin = await this.connected();
		const topics = await admin.listTopics();
		return topics.includes(name);
	}

	async fetchLeaderAndIsr(name: string): Promise<Map<number, LeaderAndIsr>> {
		const admin = await this.connected();
		const metadata = await admin.fetchTopicMetadata({ topics: [name] });
		const topic = metadata.topics.find((candidate) => candidate.name === name);
		if (!topic) {
			throw new ExchangeError(`Topic "${name}" has no metadata`);
		}

		const partitions = new Map<number, LeaderAndIsr>();
		for (const partition of topic.partitions) {
			partitions.set(partition.partitionId, { leader: partition.leader, isr: [...partition.isr] });
		}
		return partitions;
	}

	async close(): Promise<void> {
		if (this.connection) {
			this.connection = undefined;
			await this.admin.disconnect();
		}
	}

	private async connected(): Promise<KafkaAdminLike> {
		if (!this.connection) {
			this.connection = this.admin.connect();
		}
		await this.connection;
		return this.admin;
	}
}
