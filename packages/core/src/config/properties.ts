/**
 * Client Properties
 *
 * Clients are configured with flat Kafka property maps ("acks", "group.id", ...).
 * Requests carry overrides; the engines merge them over a working baseline and
 * always inject the cluster's broker list.
 */

import { generateId } from "../utils";

/**
 * Flat client configuration, Kafka property name to value.
 */
export type Properties = Readonly<Record<string, string>>;

/**
 * Property that carries the broker list. Always taken from the cluster provider.
 */
export const BOOTSTRAP_SERVERS = "bootstrap.servers";

export const PRODUCER_DEFAULTS: Properties = Object.freeze({
	acks: "all",
	"allow.auto.create.topics": "true",
	"request.timeout.ms": "30000",
	retries: "5",
});

export const CONSUMER_DEFAULTS: Properties = Object.freeze({
	"auto.offset.reset": "earliest",
	"enable.auto.commit": "false",
	"isolation.level": "read_uncommitted",
	"fetch.max.wait.ms": "100",
	"session.timeout.ms": "10000",
	"heartbeat.interval.ms": "1000",
});

/**
 * Baseline for transactional producers.
 *
 * @param transactionalId - stable id, so repeated transactional sends reuse one client
 */
export function transactionalProducerDefaults(transactionalId: string): Properties {
	return Object.freeze({
		...PRODUCER_DEFAULTS,
		"enable.idempotence": "true",
		"max.in.flight.requests.per.connection": "1",
		"transaction.timeout.ms": "60000",
		"transactional.id": transactionalId,
	});
}

/**
 * Baseline for one consumer call. Each call joins its own fresh group.
 */
export function consumerDefaults(): Properties {
	return Object.freeze({
		...CONSUMER_DEFAULTS,
		"group.id": generateId("kafkaprobe-group-"),
	});
}

/**
 * Merge overrides over defaults and force the broker list.
 *
 * Override keys are not validated here; the client rejects what it cannot use.
 */
export function mergeProperties(defaults: Properties, overrides: Properties, brokerList: string): Properties {
	return Object.freeze({
		...defaults,
		...overrides,
		[BOOTSTRAP_SERVERS]: brokerList,
	});
}

/**
 * Stable identity of an effective configuration, independent of key order.
 */
export function propertiesKey(properties: Properties): string {
	const sorted = Object.keys(properties)
		.sort()
		.map((name) => [name, properties[name]]);
	return JSON.stringify(sorted);
}
