/**
 * Kafka Environment Unit Tests
 */

import { kafkaConfigFromEnv } from "@kafkaprobe/adapter-kafka";
import { logLevel } from "kafkajs";
import { ConfigError } from "kafkaprobe";
import { describe, expect, it } from "vitest";

describe("kafkaConfigFromEnv", () => {
	it("should read brokers and optional settings", () => {
		const config = kafkaConfigFromEnv({
			KAFKAPROBE_BROKERS: "broker-1:9092, broker-2:9092",
			KAFKAPROBE_CLIENT_ID: "orders-suite",
			KAFKAPROBE_LOG_LEVEL: "debug",
			KAFKAPROBE_TEST_MODE: "1",
		});

		expect(config).toEqual({
			brokers: ["broker-1:9092", "broker-2:9092"],
			clientId: "orders-suite",
			logLevel: logLevel.DEBUG,
			testMode: true,
		});
	});

	it("should leave optional settings unset", () => {
		const config = kafkaConfigFromEnv({ KAFKAPROBE_BROKERS: "localhost:9092" });

		expect(config.clientId).toBeUndefined();
		expect(config.logLevel).toBeUndefined();
		expect(config.testMode).toBe(false);
	});

	it("should require brokers", () => {
		expect(() => kafkaConfigFromEnv({})).toThrow(new ConfigError("Invalid Kafka environment: KAFKAPROBE_BROKERS: Required"));
	});

	it("should reject an empty broker list", () => {
		expect(() => kafkaConfigFromEnv({ KAFKAPROBE_BROKERS: " , " })).toThrow(
			"Invalid Kafka environment: KAFKAPROBE_BROKERS: must list at least one broker"
		);
	});

	it("should list every invalid variable", () => {
		expect(() =>
			kafkaConfigFromEnv({ KAFKAPROBE_BROKERS: "localhost:9092", KAFKAPROBE_LOG_LEVEL: "loud", KAFKAPROBE_TEST_MODE: "yes" })
		).toThrow(/^Invalid Kafka environment: KAFKAPROBE_LOG_LEVEL: .+; KAFKAPROBE_TEST_MODE: /);
	});
});
