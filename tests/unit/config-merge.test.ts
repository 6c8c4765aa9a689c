/**
 * Config Merge Unit Tests
 *
 * Tests for property defaults, override precedence and the forced broker list.
 */

import {
	BOOTSTRAP_SERVERS,
	CONSUMER_DEFAULTS,
	consumerDefaults,
	mergeProperties,
	PRODUCER_DEFAULTS,
	propertiesKey,
	transactionalProducerDefaults,
} from "kafkaprobe";
import { describe, expect, it } from "vitest";

describe("mergeProperties", () => {
	it("should let overrides win over defaults", () => {
		const merged = mergeProperties({ acks: "all", retries: "5" }, { retries: "0", "client.id": "orders" }, "b:9092");

		expect(merged).toEqual({
			acks: "all",
			retries: "0",
			"client.id": "orders",
			"bootstrap.servers": "b:9092",
		});
	});

	it("should force the cluster broker list over an override", () => {
		const merged = mergeProperties(PRODUCER_DEFAULTS, { [BOOTSTRAP_SERVERS]: "elsewhere:9092" }, "b1:9092,b2:9092");

		expect(merged[BOOTSTRAP_SERVERS]).toBe("b1:9092,b2:9092");
	});

	it("should pass unknown keys through untouched", () => {
		const merged = mergeProperties({}, { "not.a.kafka.property": "x" }, "b:9092");

		expect(merged["not.a.kafka.property"]).toBe("x");
	});

	it("should return a frozen result and leave inputs unchanged", () => {
		const overrides = { acks: "1" };
		const merged = mergeProperties(PRODUCER_DEFAULTS, overrides, "b:9092");

		expect(Object.isFrozen(merged)).toBe(true);
		expect(overrides).toEqual({ acks: "1" });
		expect(PRODUCER_DEFAULTS.acks).toBe("all");
	});
});

describe("default property sets", () => {
	it("should make transactional producers idempotent with the given id", () => {
		const defaults = transactionalProducerDefaults("tx-orders");

		expect(defaults["transactional.id"]).toBe("tx-orders");
		expect(defaults["enable.idempotence"]).toBe("true");
		expect(defaults["max.in.flight.requests.per.connection"]).toBe("1");
		expect(defaults.acks).toBe("all");
	});

	it("should give every consumer call its own group", () => {
		const first = consumerDefaults();
		const second = consumerDefaults();

		expect(first["group.id"]).toMatch(/^kafkaprobe-group-/);
		expect(first["group.id"]).not.toBe(second["group.id"]);
		expect(first["auto.offset.reset"]).toBe(CONSUMER_DEFAULTS["auto.offset.reset"]);
	});
});

describe("propertiesKey", () => {
	it("should not depend on key order", () => {
		expect(propertiesKey({ a: "1", b: "2" })).toBe(propertiesKey({ b: "2", a: "1" }));
	});

	it("should differ when a value differs", () => {
		expect(propertiesKey({ a: "1" })).not.toBe(propertiesKey({ a: "2" }));
	});
});
