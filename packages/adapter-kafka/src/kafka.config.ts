/**
 * Kafka Property Translation
 *
 * Maps flat Kafka client properties onto KafkaJS options. Names KafkaJS has no
 * equivalent for are reported back as ignored; values that cannot be parsed
 * raise ConfigError.
 */

import { CompressionTypes, type ConsumerConfig, type KafkaConfig, type ProducerConfig, type RetryOptions } from "kafkajs";
import { BOOTSTRAP_SERVERS, ConfigError, type Properties } from "kafkaprobe";

/**
 * Options applied to every `producer.send()`
 */
export interface KafkaSendOptions {
	acks: number;
	compression?: CompressionTypes;
}

export interface KafkaProducerOptions {
	kafka: KafkaConfig;
	producer: ProducerConfig;
	send: KafkaSendOptions;
	/**
	 * Property names without a KafkaJS equivalent
	 */
	ignored: string[];
}

export interface KafkaConsumerOptions {
	kafka: KafkaConfig;
	consumer: ConsumerConfig;
	/**
	 * Start from the earliest offset when the group has no committed position
	 */
	fromBeginning: boolean;
	autoCommit: boolean;
	ignored: string[];
}

const ACKS: Record<string, number> = { all: -1, "-1": -1, "0": 0, "1": 1 };

const COMPRESSION: Record<string, CompressionTypes> = {
	none: CompressionTypes.None,
	gzip: CompressionTypes.GZIP,
	snappy: CompressionTypes.Snappy,
	lz4: CompressionTypes.LZ4,
	zstd: CompressionTypes.ZSTD,
};

/**
 * Translate producer properties.
 *
 * @param base - client options the properties are layered on (clientId, logging, ssl, ...)
 */
export function toProducerOptions(properties: Properties, base: Partial<KafkaConfig> = {}): KafkaProducerOptions {
	const reader = new PropertyReader(properties);
	const kafka = readKafkaConfig(reader, base);

	const producer: ProducerConfig = {};
	assign(producer, "idempotent", reader.boolean("enable.idempotence"));
	assign(producer, "transactionalId", reader.string("transactional.id"));
	assign(producer, "maxInFlightRequests", reader.integer("max.in.flight.requests.per.connection"));
	assign(producer, "transactionTimeout", reader.integer("transaction.timeout.ms"));
	assign(producer, "allowAutoTopicCreation", reader.boolean("allow.auto.create.topics"));

	const send: KafkaSendOptions = { acks: reader.lookup("acks", ACKS) ?? -1 };
	assign(send, "compression", reader.lookup("compression.type", COMPRESSION));

	return { kafka, producer, send, ignored: reader.unused() };
}

/**
 * Translate consumer properties. "group.id" is required.
 */
export function toConsumerOptions(properties: Properties, base: Partial<KafkaConfig> = {}): KafkaConsumerOptions {
	const reader = new PropertyReader(properties);
	const kafka = readKafkaConfig(reader, base);

	const groupId = reader.string("group.id");
	if (groupId === undefined || groupId.length === 0) {
		throw new ConfigError('Consumer property "group.id" is required');
	}

	const consumer: ConsumerConfig = { groupId };
	const isolation = reader.choice("isolation.level", ["read_committed", "read_uncommitted"] as const);
	assign(consumer, "readUncommitted", isolation === undefined ? undefined : isolation === "read_uncommitted");
	assign(consumer, "sessionTimeout", reader.integer("session.timeout.ms"));
	assign(consumer, "heartbeatInterval", reader.integer("heartbeat.interval.ms"));
	assign(consumer, "rebalanceTimeout", reader.integer("rebalance.timeout.ms"));
	assign(consumer, "maxWaitTimeInMs", reader.integer("fetch.max.wait.ms"));
	assign(consumer, "minBytes", reader.integer("fetch.min.bytes"));
	assign(consumer, "maxBytes", reader.integer("fetch.max.bytes"));
	assign(consumer, "maxBytesPerPartition", reader.integer("max.partition.fetch.bytes"));
	assign(consumer, "allowAutoTopicCreation", reader.boolean("allow.auto.create.topics"));

	const reset = reader.choice("auto.offset.reset", ["earliest", "latest"] as const);
	const autoCommit = reader.boolean("enable.auto.commit") ?? false;

	return { kafka, consumer, fromBeginning: reset !== "latest", autoCommit, ignored: reader.unused() };
}

/**
 * Client-level options shared by producers and consumers
 */
function readKafkaConfig(reader: PropertyReader, base: Partial<KafkaConfig>): KafkaConfig {
	const servers = reader.string(BOOTSTRAP_SERVERS) ?? "";
	const brokers = servers
		.split(",")
		.map((broker) => broker.trim())
		.filter((broker) => broker.length > 0);
	if (brokers.length === 0) {
		throw new ConfigError(`Property "${BOOTSTRAP_SERVERS}" must list at least one broker`);
	}

	const kafka: KafkaConfig = { ...base, brokers };
	assign(kafka, "clientId", reader.string("client.id"));
	assign(kafka, "requestTimeout", reader.integer("request.timeout.ms"));
	assign(kafka, "connectionTimeout", reader.integer("socket.connection.setup.timeout.ms"));

	const protocol = reader.choice("security.protocol", ["PLAINTEXT", "SSL", "SASL_PLAINTEXT", "SASL_SSL"] as const);
	if (protocol !== undefined) {
		kafka.ssl = protocol === "SSL" || protocol === "SASL_SSL" ? (base.ssl ?? true) : false;
	}

	const retry: RetryOptions = { ...base.retry };
	assign(retry, "retries", reader.integer("retries"));
	assign(retry, "initialRetryTime", reader.integer("retry.backoff.ms"));
	if (Object.keys(retry).length > 0) {
		kafka.retry = retry;
	}
	return kafka;
}

function assign<T, Key extends keyof T>(target: T, key: Key, value: T[Key] | undefined): void {
	if (value !== undefined) {
		target[key] = value;
	}
}

/**
 * Typed access to string properties, remembering which names were read.
 */
class PropertyReader {
	private readonly used = new Set<string>();

	constructor(private readonly properties: Properties) {}

	string(name: string): string | undefined {
		this.used.add(name);
		return this.properties[name];
	}

	integer(name: string): number | undefined {
		const raw = this.string(name);
		if (raw === undefined) {
			return undefined;
		}
		const value = Number(raw);
		if (raw.trim().length === 0 || !Number.isInteger(value)) {
			throw new ConfigError(`Property "${name}" must be an integer, got "${raw}"`);
		}
		return value;
	}

	boolean(name: string): boolean | undefined {
		const raw = this.string(name);
		if (raw === undefined) {
			return undefined;
		}
		if (raw !== "true" && raw !== "false") {
			throw new ConfigError(`Property "${name}" must be "true" or "false", got "${raw}"`);
		}
		return raw === "true";
	}

	choice<T extends string>(name: string, choices: readonly T[]): T | undefined {
		const raw = this.string(name);
		if (raw === undefined) {
			return undefined;
		}
		const match = choices.find((choice) => choice === raw);
		if (match === undefined) {
			throw new ConfigError(`Property "${name}" must be one of ${choices.join(", ")}, got "${raw}"`);
		}
		return match;
	}

	lookup<T>(name: string, table: Record<string, T>): T | undefined {
		const raw = this.string(name);
		if (raw === undefined) {
			return undefined;
		}
		if (!Object.hasOwn(table, raw)) {
			throw new ConfigError(`Property "${name}" must be one of ${Object.keys(table).join(", ")}, got "${raw}"`);
		}
		return table[raw];
	}

	unused(): string[] {
		return Object.keys(this.properties).filter((name) => !this.used.has(name));
	}
}
