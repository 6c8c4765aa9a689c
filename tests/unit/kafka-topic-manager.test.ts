/**
 * Kafka Topic Manager Unit Tests
 */

import { type KafkaAdminLike, KafkaTopicManager } from "@kafkaprobe/adapter-kafka";
import type { ITopicMetadata } from "kafkajs";
import { ExchangeError, TopicConfigBuilder } from "kafkaprobe";
import { beforeEach, describe, expect, it, vi } from "vitest";

function createAdmin(topics: ITopicMetadata[] = []) {
	return {
		connect: vi.fn(async () => {}),
		disconnect: vi.fn(async () => {}),
		createTopics: vi.fn(async () => true),
		deleteTopics: vi.fn(async () => {}),
		listTopics: vi.fn(async () => topics.map((topic) => topic.name)),
		fetchTopicMetadata: vi.fn(async () => ({ topics })),
	} satisfies KafkaAdminLike;
}

describe("KafkaTopicManager", () => {
	let admin: ReturnType<typeof createAdmin>;
	let manager: KafkaTopicManager;

	beforeEach(() => {
		admin = createAdmin([
			{
				name: "orders",
				partitions: [
					{ partitionErrorCode: 0, partitionId: 0, leader: 1, replicas: [1, 2], isr: [1, 2] },
					{ partitionErrorCode: 0, partitionId: 1, leader: 2, replicas: [2, 1], isr: [2] },
				],
			},
		]);
		manager = new KafkaTopicManager(admin);
	});

	it("should create a topic and wait for leaders", async () => {
		await manager.createTopic(
			TopicConfigBuilder.withName("t1").withNumberOfPartitions(3).with("cleanup.policy", "compact").build()
		);

		expect(admin.createTopics).toHaveBeenCalledWith({
			waitForLeaders: true,
			topics: [
				{
					topic: "t1",
					numPartitions: 3,
					replicationFactor: 1,
					configEntries: [{ name: "cleanup.policy", value: "compact" }],
				},
			],
		});
	});

	it("should report an existing topic on create", async () => {
		admin.createTopics.mockResolvedValueOnce(false);

		await expect(manager.createTopic(TopicConfigBuilder.withName("orders").useDefaults())).rejects.toThrow(
			new ExchangeError('Topic "orders" already exists')
		);
	});

	it("should wrap admin failures", async () => {
		admin.deleteTopics.mockRejectedValueOnce(new Error("Not controller"));

		await expect(manager.deleteTopic("orders")).rejects.toThrow('Failed to delete topic "orders": Not controller');
	});

	it("should answer existence from the topic list", async () => {
		expect(await manager.exists("orders")).toBe(true);
		expect(await manager.exists("missing")).toBe(false);
	});

	it("should map partitions to leader and in-sync replicas", async () => {
		const leaders = await manager.fetchLeaderAndIsr("orders");

		expect([...leaders]).toEqual([
			[0, { leader: 1, isr: [1, 2] }],
			[1, { leader: 2, isr: [2] }],
		]);
	});

	it("should connect once and disconnect on close", async () => {
		await manager.exists("orders");
		await manager.exists("orders");
		await manager.close();
		await manager.close();

		expect(admin.connect).toHaveBeenCalledTimes(1);
		expect(admin.disconnect).toHaveBeenCalledTimes(1);
	});

	it("should not connect on close when never used", async () => {
		await manager.close();

		expect(admin.connect).not.toHaveBeenCalled();
		expect(admin.disconnect).not.toHaveBeenCalled();
	});
});
