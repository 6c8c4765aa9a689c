/**
 * Record Producer
 *
 * Awaitable sends: plain sends acknowledge every record before returning;
 * transactional sends commit, or deliberately abort, every entry as a unit.
 *
 * Producer clients are cached per effective configuration and reused across
 * calls until close().
 */

import type { ExchangeClientFactory, OutgoingRecord, ProducerClient, ProducerTransaction } from "../client";
import type { Codec } from "../codecs";
import {
	mergeProperties,
	PRODUCER_DEFAULTS,
	type Properties,
	propertiesKey,
	transactionalProducerDefaults,
} from "../config";
import { ConfigError, ExchangeError, ProduceError, toError, TransactionError } from "../errors";
import { createLogger, type Logger } from "../logging";
import type { Header, KeyValue, RecordMetadata } from "../records";
import type { SendRequest } from "../requests";
import type { ClusterProvider } from "../topics";
import { generateId } from "../utils";

export interface RecordProducerOptions {
	factory: ExchangeClientFactory;
	cluster: ClusterProvider;
	logger?: Logger;

	/**
	 * Base transactional id. The first transactional configuration uses it as is,
	 * later distinct configurations get "-1", "-2", ... appended, so no two
	 * cached clients fence each other. A request's own "transactional.id" wins.
	 * @default generated once per producer
	 */
	transactionalId?: string;
}

const TRANSACTIONAL_ID = "transactional.id";

/**
 * Encoded records for one topic
 */
interface TopicBatch {
	topic: string;
	records: OutgoingRecord[];
}

/**
 * Producer engine.
 *
 * Cached clients are shared by sequential calls; concurrent calls that map to
 * the same configuration are not supported.
 */
export class RecordProducer {
	private readonly factory: ExchangeClientFactory;
	private readonly cluster: ClusterProvider;
	private readonly logger: Logger;
	private readonly transactionalId: string;
	private readonly clients = new Map<string, ProducerClient>();
	private readonly transactionalIds = new Map<string, string>();

	constructor(options: RecordProducerOptions) {
		this.factory = options.factory;
		this.cluster = options.cluster;
		this.logger = options.logger ?? createLogger("kafkaprobe:producer");
		this.transactionalId = options.transactionalId ?? generateId("kafkaprobe-tx-");
	}

	/**
	 * Send a request and return one acknowledgement per record, in send order.
	 *
	 * @throws ProduceError if a record is not acknowledged
	 * @throws TransactionError if a transaction cannot begin, commit or abort
	 * @throws ConfigError if the client rejects the configuration
	 */
	async send<K, V>(request: SendRequest<K, V>): Promise<RecordMetadata[]> {
		switch (request.kind) {
			case "values": {
				const batch = { topic: request.topic, records: await encodeValues(request.topic, request.values, request.valueCodec) };
				return this.sendPlain(batch, request.properties);
			}
			case "keyValues": {
				const batch = {
					topic: request.topic,
					records: await encodeKeyValues(request.topic, request.records, request.keyCodec, request.valueCodec),
				};
				return this.sendPlain(batch, request.properties);
			}
			case "valuesTransactional": {
				const batches: TopicBatch[] = [];
				for (const entry of request.entries) {
					batches.push({ topic: entry.topic, records: await encodeValues(entry.topic, entry.values, request.valueCodec) });
				}
				return this.sendTransactional(batches, request.properties, request.abortOnCompletion);
			}
			case "keyValuesTransactional": {
				const batches: TopicBatch[] = [];
				for (const entry of request.entries) {
					batches.push({
						topic: entry.topic,
						records: await encodeKeyValues(entry.topic, entry.records, request.keyCodec, request.valueCodec),
					});
				}
				return this.sendTransactional(batches, request.properties, request.abortOnCompletion);
			}
		}
	}

	/**
	 * Close every cached client.
	 */
	async close(): Promise<void> {
		const clients = [...this.clients.values()];
		this.clients.clear();
		for (const client of clients) {
			await client.close();
		}
	}

	// =========================================================================
	// Send Protocols
	// =========================================================================

	private async sendPlain(batch: TopicBatch, overrides: Properties): Promise<RecordMetadata[]> {
		const client = await this.clientFor(mergeProperties(PRODUCER_DEFAULTS, overrides, this.cluster.brokerList()));
		this.logger.debug("Sending %d record(s) to %s", batch.records.length, batch.topic);

		const acknowledged: RecordMetadata[] = [];
		for (const record of batch.records) {
			try {
				acknowledged.push(await client.send(batch.topic, record));
			} catch (error) {
				throw asProduceError(error, batch.topic);
			}
		}
		return acknowledged;
	}

	private async sendTransactional(
		batches: TopicBatch[],
		overrides: Properties,
		abortOnCompletion: boolean
	): Promise<RecordMetadata[]> {
		const client = await this.clientFor(this.transactionalProperties(overrides));

		let transaction: ProducerTransaction;
		try {
			transaction = await client.beginTransaction();
		} catch (error) {
			throw asTransactionError(error, "begin");
		}

		const acknowledged: RecordMetadata[] = [];
		for (const batch of batches) {
			this.logger.debug("Sending %d record(s) to %s in a transaction", batch.records.length, batch.topic);
			for (const record of batch.records) {
				try {
					acknowledged.push(await transaction.send(batch.topic, record));
				} catch (error) {
					await this.abortAfterFailure(transaction);
					throw asProduceError(error, batch.topic);
				}
			}
		}

		if (abortOnCompletion) {
			try {
				await transaction.abort();
			} catch (error) {
				throw asTransactionError(error, "abort");
			}
			this.logger.debug("Aborted transaction with %d record(s) as requested", acknowledged.length);
		} else {
			try {
				await transaction.commit();
			} catch (error) {
				throw asTransactionError(error, "commit");
			}
		}
		return acknowledged;
	}

	private transactionalProperties(overrides: Properties): Properties {
		const defaults = transactionalProducerDefaults(this.transactionalId);
		const merged = mergeProperties(defaults, overrides, this.cluster.brokerList());
		if (Object.hasOwn(overrides, TRANSACTIONAL_ID)) {
			return merged;
		}

		const key = propertiesKey({ ...merged, [TRANSACTIONAL_ID]: "" });
		let id = this.transactionalIds.get(key);
		if (id === undefined) {
			const count = this.transactionalIds.size;
			id = count === 0 ? this.transactionalId : `${this.transactionalId}-${count}`;
			this.transactionalIds.set(key, id);
		}
		return Object.freeze({ ...merged, [TRANSACTIONAL_ID]: id });
	}

	private async abortAfterFailure(transaction: ProducerTransaction): Promise<void> {
		try {
			await transaction.abort();
		} catch (error) {
			this.logger.warn("Failed to abort transaction after a send failure: %s", toError(error).message);
		}
	}

	private async clientFor(properties: Properties): Promise<ProducerClient> {
		const key = propertiesKey(properties);
		const cached = this.clients.get(key);
		if (cached) {
			return cached;
		}

		let client: ProducerClient;
		try {
			client = await this.factory.createProducer(properties);
		} catch (error) {
			if (error instanceof ExchangeError) {
				throw error;
			}
			throw new ConfigError(`Failed to create producer: ${toError(error).message}`, { cause: error });
		}
		this.clients.set(key, client);
		return client;
	}
}

// =============================================================================
// Encoding
// =============================================================================

async function encodeValues<V>(
	topic: string,
	values: readonly V[],
	codec: Codec<V> | undefined
): Promise<OutgoingRecord[]> {
	const records: OutgoingRecord[] = [];
	for (const value of values) {
		records.push({ key: null, value: await encode(topic, value, codec, "value"), headers: [] });
	}
	return records;
}

async function encodeKeyValues<K, V>(
	topic: string,
	keyValues: readonly KeyValue<K, V>[],
	keyCodec: Codec<K> | undefined,
	valueCodec: Codec<V> | undefined
): Promise<OutgoingRecord[]> {
	const records: OutgoingRecord[] = [];
	for (const keyValue of keyValues) {
		const key = keyValue.key === null ? null : await encode(topic, keyValue.key, keyCodec, "key");
		const value = await encode(topic, keyValue.value, valueCodec, "value");
		const headers: readonly Header[] = keyValue.headers;
		records.push({ key, value, headers });
	}
	return records;
}

/**
 * Encode with the request codec; without one, strings and bytes pass through.
 */
async function encode<T>(
	topic: string,
	data: T,
	codec: Codec<T> | undefined,
	part: "key" | "value"
): Promise<string | Buffer | null> {
	if (codec) {
		try {
			return toWire(await codec.encode(data));
		} catch (error) {
			throw new ProduceError(`Failed to encode ${part} for topic "${topic}": ${toError(error).message}`, topic, {
				cause: error,
			});
		}
	}
	if (data === null || data === undefined) {
		return null;
	}
	if (typeof data === "string") {
		return data;
	}
	if (data instanceof Uint8Array) {
		return toWire(data);
	}
	throw new ConfigError(
		`Cannot send a ${part} of type ${typeof data} without a codec; set one with with${part === "key" ? "Key" : "Value"}Codec()`
	);
}

function toWire(encoded: string | Uint8Array): string | Buffer {
	if (typeof encoded === "string" || Buffer.isBuffer(encoded)) {
		return encoded;
	}
	return Buffer.from(encoded);
}

function asProduceError(error: unknown, topic: string): ExchangeError {
	if (error instanceof ExchangeError) {
		return error;
	}
	return new ProduceError(`Record to topic "${topic}" was not acknowledged: ${toError(error).message}`, topic, {
		cause: error,
	});
}

function asTransactionError(error: unknown, operation: TransactionError["operation"]): ExchangeError {
	if (error instanceof ExchangeError) {
		return error;
	}
	return new TransactionError(`Failed to ${operation} transaction: ${toError(error).message}`, operation, {
		cause: error,
	});
}
