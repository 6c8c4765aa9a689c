/**
 * Record Consumer Unit Tests
 *
 * Tests for the observe and read poll loops, deadlines, filters, seeking,
 * metadata and consumer lifecycle, driven by a manual clock.
 */

import {
	bytesCodec,
	ConfigError,
	ConsumeError,
	createLogger,
	header,
	JsonCodec,
	ObservationTimeoutError,
	ObserveKeyValues,
	ReadKeyValues,
	RecordConsumer,
} from "kafkaprobe";
import { beforeEach, describe, expect, it } from "vitest";
import {
	BROKER_LIST,
	createInMemoryKafka,
	FakeClientFactory,
	type FakeKafkaOptions,
	fakeCluster,
	type InMemoryKafka,
	ManualClock,
} from "../mocks/fakeKafka";

const logger = createLogger("test", { silent: true });

describe("RecordConsumer", () => {
	let broker: InMemoryKafka;
	let clock: ManualClock;

	beforeEach(() => {
		broker = createInMemoryKafka();
		clock = new ManualClock();
	});

	function createConsumer(options: FakeKafkaOptions = {}) {
		const factory = new FakeClientFactory(broker, options);
		const consumer = new RecordConsumer({ factory, cluster: fakeCluster, logger, clock });
		return { factory, consumer };
	}

	describe("observe", () => {
		it("should return records in publish order once the count is reached", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a");
			broker.publish("t1", "b");
			broker.publish("t1", "c");

			const values = await consumer.observeValues(ObserveKeyValues.on("t1", 3).observeFor(5, "seconds").build());

			expect(values).toEqual(["a", "b", "c"]);
			expect(clock.now()).toBe(0);
		});

		it("should return every admitted record when a poll overshoots the count", async () => {
			const { consumer } = createConsumer();
			for (const value of ["a", "b", "c", "d", "e"]) {
				broker.publish("t1", value);
			}

			const values = await consumer.observeValues(ObserveKeyValues.on("t1", 3).useDefaults());

			expect(values).toEqual(["a", "b", "c", "d", "e"]);
		});

		it("should wait for records published while polling", async () => {
			const { consumer } = createConsumer();
			broker.onPoll((pollNumber) => {
				if (pollNumber === 4) {
					broker.publish("t1", "late");
				}
			});

			const values = await consumer.observeValues(ObserveKeyValues.on("t1", 1).observeFor(1, "seconds").build());

			expect(values).toEqual(["late"]);
			expect(clock.sleeps).toEqual([100, 100, 100]);
		});

		it("should raise ObservationTimeoutError when too few records arrive", async () => {
			const { factory, consumer } = createConsumer();
			broker.publish("t1", "a");
			broker.publish("t1", "b");

			const error = await consumer
				.observe(ObserveKeyValues.on("t1", 5).observeFor(1, "seconds").build())
				.catch((e) => e);

			expect(error).toBeInstanceOf(ObservationTimeoutError);
			expect(error.message).toBe('Expected to observe 5 record(s) on topic "t1" within 1000ms, but observed 2');
			expect(error.observedCount).toBe(2);
			expect(clock.now()).toBe(1000);
			expect(factory.consumers[0].closeCount).toBe(1);
		});

		it("should cap the last poll wait by the remaining time", async () => {
			const { factory, consumer } = createConsumer();

			await expect(
				consumer.observe(ObserveKeyValues.on("t1", 1).observeFor(250, "milliseconds").build())
			).rejects.toBeInstanceOf(ObservationTimeoutError);

			expect(factory.consumers[0].pollWaits).toEqual([100, 100, 50]);
			expect(clock.sleeps).toEqual([100, 100, 50]);
		});

		it("should wait out the timeout for a desired count of zero", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a");

			const values = await consumer.observeValues(ObserveKeyValues.on("t1", 0).observeFor(500, "milliseconds").build());

			expect(values).toEqual(["a"]);
			expect(clock.now()).toBe(500);
		});

		it("should only count records that pass every filter", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a", "k1", [header("source", "checkout")]);
			broker.publish("t1", "b", "k2", [header("source", "checkout")]);
			broker.publish("t1", "c", "k1");
			broker.publish("t1", "d", "k1", [header("source", "checkout")]);

			const records = await consumer.observe(
				ObserveKeyValues.on("t1", 2)
					.filterOnKeys((key) => key === "k1")
					.filterOnHeaders((headers) => headers.some((h) => h.name === "source"))
					.build()
			);

			expect(records.map((r) => [r.key, r.value])).toEqual([
				["k1", "a"],
				["k1", "d"],
			]);
			expect(records[0].headerValue("source")).toBe("checkout");
		});

		it("should decode values with the request codec", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", '{"amount":3}');

			const values = await consumer.observeValues(
				ObserveKeyValues.on("t1", 1)
					.withValueCodec(new JsonCodec<{ amount: number }>())
					.filterOnValues((value) => value !== null && value.amount > 1)
					.build()
			);

			expect(values).toEqual([{ amount: 3 }]);
		});
	});

	describe("read", () => {
		it("should poll for the whole bound and never past it", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a");

			const values = await consumer.readValues(ReadKeyValues.from("t1").useDefaults());

			expect(values).toEqual(["a"]);
			expect(clock.now()).toBe(2000);
		});

		it("should return an empty list when nothing is available", async () => {
			const { consumer } = createConsumer();

			const records = await consumer.read(ReadKeyValues.from("t1").withMaxTotalPollTime(300, "milliseconds").build());

			expect(records).toEqual([]);
			expect(clock.now()).toBe(300);
		});

		it("should stop at the limit and truncate to it", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a");
			broker.publish("t1", "b");
			broker.publish("t1", "c");

			const values = await consumer.readValues(ReadKeyValues.from("t1").withLimit(2).build());

			expect(values).toEqual(["a", "b"]);
			expect(clock.now()).toBe(0);
		});

		it("should keep polling until the limit is reached", async () => {
			const { factory, consumer } = createConsumer({ maxPollRecords: 1 });
			broker.publish("t1", "a");
			broker.publish("t1", "b");

			const values = await consumer.readValues(ReadKeyValues.from("t1").withLimit(2).build());

			expect(values).toEqual(["a", "b"]);
			expect(factory.consumers[0].pollWaits).toEqual([100, 100]);
		});

		it("should start at the sought offset", async () => {
			const { consumer } = createConsumer();
			for (const value of ["a", "b", "c", "d"]) {
				broker.publish("t1", value);
			}

			const records = await consumer.read(ReadKeyValues.from("t1").seekTo(0, 2).includeMetadata().build());

			expect(records.map((r) => r.value)).toEqual(["c", "d"]);
			expect(records.map((r) => r.metadata)).toEqual([
				{ topic: "t1", partition: 0, offset: 2 },
				{ topic: "t1", partition: 0, offset: 3 },
			]);
		});

		it("should read only the sought partitions", async () => {
			const { consumer } = createConsumer();
			broker.createTopic("t1", 2);
			for (const value of ["a", "b", "c", "d"]) {
				broker.publishTo("t1", 0, value);
			}
			broker.publishTo("t1", 1, "other");

			const records = await consumer.read(ReadKeyValues.from("t1").seekTo(0, 2).includeMetadata().build());

			expect(records.map((r) => r.value)).toEqual(["c", "d"]);
			expect(records.map((r) => r.metadata)).toEqual([
				{ topic: "t1", partition: 0, offset: 2 },
				{ topic: "t1", partition: 0, offset: 3 },
			]);
		});

		it("should read raw bytes with the bytes codec", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "raw");

			const values = await consumer.readValues(ReadKeyValues.from("t1").withValueCodec(bytesCodec).withLimit(1).build());

			expect(values).toEqual([Buffer.from("raw")]);
		});

		it("should leave metadata empty unless requested", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a");

			const [record] = await consumer.read(ReadKeyValues.from("t1").withLimit(1).build());

			expect(record.metadata).toBeUndefined();
		});

		it("should decode null keys and values as null", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", null);

			const [record] = await consumer.read(ReadKeyValues.from("t1").withLimit(1).build());

			expect(record.key).toBeNull();
			expect(record.value).toBeNull();
		});
	});

	describe("consumer lifecycle", () => {
		it("should create and close one consumer per call", async () => {
			const { factory, consumer } = createConsumer();
			broker.publish("t1", "a");

			await consumer.read(ReadKeyValues.from("t1").withLimit(1).build());
			await consumer.observe(ObserveKeyValues.on("t1", 1).build());

			expect(factory.consumers).toHaveLength(2);
			expect(factory.consumers.map((c) => c.closeCount)).toEqual([1, 1]);
			expect(factory.consumers[0].properties["group.id"]).not.toBe(factory.consumers[1].properties["group.id"]);
		});

		it("should merge request properties over consumer defaults", async () => {
			const { factory, consumer } = createConsumer();
			broker.publish("t1", "a");

			await consumer.read(ReadKeyValues.from("t1").with("isolation.level", "read_committed").withLimit(1).build());

			const properties = factory.consumers[0].properties;
			expect(properties["isolation.level"]).toBe("read_committed");
			expect(properties["enable.auto.commit"]).toBe("false");
			expect(properties["bootstrap.servers"]).toBe(BROKER_LIST);
			expect(properties["group.id"]).toMatch(/^kafkaprobe-group-/);
		});
	});

	describe("failures", () => {
		it("should raise ConfigError when the consumer cannot be created", async () => {
			const { consumer } = createConsumer({ failOnCreateConsumer: true });

			await expect(consumer.read(ReadKeyValues.from("t1").build())).rejects.toThrow(
				new ConfigError("Failed to create consumer: Invalid consumer configuration")
			);
		});

		it("should raise ConsumeError when subscribing fails", async () => {
			const { factory, consumer } = createConsumer({ failOnSubscribe: true });

			const error = await consumer.read(ReadKeyValues.from("t1").build()).catch((e) => e);

			expect(error).toBeInstanceOf(ConsumeError);
			expect(error.message).toBe('Failed to subscribe to topic "t1": Subscribe failed');
			expect(factory.consumers[0].closeCount).toBe(1);
		});

		it("should raise ConsumeError when polling fails", async () => {
			const { factory, consumer } = createConsumer({ failOnPoll: true });

			const error = await consumer.observe(ObserveKeyValues.on("t1", 1).build()).catch((e) => e);

			expect(error).toBeInstanceOf(ConsumeError);
			expect(error.message).toBe('Failed to poll topic "t1": Poll failed');
			expect(factory.consumers[0].closeCount).toBe(1);
		});

		it("should keep the original error when closing after it also fails", async () => {
			const { consumer } = createConsumer({ failOnPoll: true, failOnConsumerClose: true });

			await expect(consumer.read(ReadKeyValues.from("t1").build())).rejects.toThrow('Failed to poll topic "t1"');
		});

		it("should raise ConsumeError when closing after success fails", async () => {
			const { consumer } = createConsumer({ failOnConsumerClose: true });
			broker.publish("t1", "a");

			await expect(consumer.observe(ObserveKeyValues.on("t1", 1).build())).rejects.toThrow(
				'Failed to close consumer of topic "t1": Close failed'
			);
		});

		it("should wrap decode failures as ConsumeError", async () => {
			const { factory, consumer } = createConsumer();
			broker.publish("t1", "not json");

			const error = await consumer
				.observe(ObserveKeyValues.on("t1", 1).withValueCodec(new JsonCodec()).build())
				.catch((e) => e);

			expect(error).toBeInstanceOf(ConsumeError);
			expect(error.message).toMatch(/^Failed to decode record t1-0@0: Failed to decode record with json codec: /);
			expect(factory.consumers[0].closeCount).toBe(1);
		});

		it("should propagate predicate exceptions unchanged", async () => {
			const { consumer } = createConsumer();
			broker.publish("t1", "a");
			const failure = new Error("predicate failed");

			const error = await consumer
				.observe(
					ObserveKeyValues.on("t1", 1)
						.filterOnValues(() => {
							throw failure;
						})
						.build()
				)
				.catch((e) => e);

			expect(error).toBe(failure);
		});
	});
});
