/**
 * Record Consumer
 *
 * Turns a poll-based consumer client into bounded, awaitable read and observe
 * calls. Each call creates one consumer client, drives one poll loop on it and
 * closes it before the call settles.
 *
 * Observe runs through the phases:
 * - seeking (only with explicit offsets): subscribe with start positions
 * - polling: poll, decode, filter, accumulate; stop once satisfied or past the deadline
 * - satisfied: return everything admitted, possibly more than the desired count
 * - timedOut: raise ObservationTimeoutError, no partial result
 */

import type { ConsumerClient, ExchangeClientFactory, IncomingRecord } from "../client";
import { consumerDefaults, mergeProperties, type Properties } from "../config";
import { ConfigError, ConsumeError, ExchangeError, ObservationTimeoutError, toError } from "../errors";
import { admits } from "../filters";
import { createLogger, type Logger } from "../logging";
import { KeyValue } from "../records";
import type { ConsumeRequest, ObserveKeyValuesRequest, ReadKeyValuesRequest } from "../requests";
import type { ClusterProvider } from "../topics";
import { type Clock, systemClock } from "./clock";

/**
 * Observation phase
 */
export type ObservationState = "seeking" | "polling" | "satisfied" | "timedOut";

export interface RecordConsumerOptions {
	factory: ExchangeClientFactory;
	cluster: ClusterProvider;
	logger?: Logger;
	clock?: Clock;

	/**
	 * Longest single poll wait, and the pause after a poll that returned nothing
	 * @default 100
	 */
	pollIntervalMs?: number;
}

const DEFAULT_POLL_INTERVAL_MS = 100;

/**
 * Observation engine.
 *
 * Not safe for concurrent calls on the same instance from interleaved tests;
 * issue calls one after another.
 */
export class RecordConsumer {
	private readonly factory: ExchangeClientFactory;
	private readonly cluster: ClusterProvider;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly pollIntervalMs: number;

	constructor(options: RecordConsumerOptions) {
		this.factory = options.factory;
		this.cluster = options.cluster;
		this.logger = options.logger ?? createLogger("kafkaprobe:consumer");
		this.clock = options.clock ?? systemClock;
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
	}

	/**
	 * Drain the matching records currently available, for at most the request's
	 * total poll time. An empty result is not an error.
	 */
	async read<K, V>(request: ReadKeyValuesRequest<K, V>): Promise<KeyValue<K, V | null>[]> {
		return this.withConsumer(request, async (client) => {
			const admitted: KeyValue<K, V | null>[] = [];
			const startedAt = this.clock.now();

			while (admitted.length < request.limit) {
				const remaining = request.maxTotalPollTimeMs - (this.clock.now() - startedAt);
				if (remaining <= 0) {
					break;
				}
				await this.pollCycle(client, request, admitted, remaining);
			}

			this.logger.debug("Read %d record(s) from %s", admitted.length, request.topic);
			return admitted.slice(0, request.limit);
		});
	}

	/**
	 * Values of {@link read}, in the same order.
	 */
	async readValues<K, V>(request: ReadKeyValuesRequest<K, V>): Promise<(V | null)[]> {
		const records = await this.read(request);
		return records.map((record) => record.value);
	}

	/**
	 * Wait until at least `desiredCount` matching records arrived.
	 *
	 * Returns every record admitted up to that point, which may be more than
	 * `desiredCount` when the last poll delivered several. With a desired count
	 * of zero the whole timeout is waited out and the admitted records returned.
	 *
	 * @throws ObservationTimeoutError if the deadline passes first
	 */
	async observe<K, V>(request: ObserveKeyValuesRequest<K, V>): Promise<KeyValue<K, V | null>[]> {
		return this.withConsumer(request, async (client) => {
			const admitted: KeyValue<K, V | null>[] = [];
			let state = this.transition(request.topic, "polling");
			const startedAt = this.clock.now();

			while (state === "polling") {
				const remaining = request.timeoutMs - (this.clock.now() - startedAt);
				await this.pollCycle(client, request, admitted, remaining);
				const next = nextState(request, admitted.length, this.clock.now() - startedAt);
				if (next !== state) {
					state = this.transition(request.topic, next);
				}
			}

			if (state === "timedOut") {
				throw new ObservationTimeoutError(request.topic, request.desiredCount, admitted.length, request.timeoutMs);
			}
			return admitted;
		});
	}

	/**
	 * Values of {@link observe}, in the same order.
	 */
	async observeValues<K, V>(request: ObserveKeyValuesRequest<K, V>): Promise<(V | null)[]> {
		const records = await this.observe(request);
		return records.map((record) => record.value);
	}

	// =========================================================================
	// Polling Core
	// =========================================================================

	private async pollCycle<K, V>(
		client: ConsumerClient,
		request: ConsumeRequest<K, V>,
		admitted: KeyValue<K, V | null>[],
		remainingMs: number
	): Promise<void> {
		const waitMs = Math.max(0, Math.min(this.pollIntervalMs, remainingMs));
		const polledAt = this.clock.now();
		const records = await this.poll(client, request.topic, waitMs);

		for (const record of records) {
			const keyValue = await decode(request, record);
			if (admits(request, keyValue.key, keyValue.value, keyValue.headers)) {
				admitted.push(keyValue);
			}
		}

		if (records.length === 0) {
			const rest = waitMs - (this.clock.now() - polledAt);
			if (rest > 0) {
				await this.clock.sleep(rest);
			}
		}
	}

	private async poll(client: ConsumerClient, topic: string, waitMs: number): Promise<IncomingRecord[]> {
		try {
			return await client.poll(waitMs);
		} catch (error) {
			throw asConsumeError(error, topic, `Failed to poll topic "${topic}"`);
		}
	}

	private transition(topic: string, state: ObservationState): ObservationState {
		this.logger.debug("Observation of %s entered %s", topic, state);
		return state;
	}

	// =========================================================================
	// Client Lifecycle
	// =========================================================================

	private async withConsumer<K, V, T>(
		request: ConsumeRequest<K, V>,
		body: (client: ConsumerClient) => Promise<T>
	): Promise<T> {
		const properties = mergeProperties(consumerDefaults(), request.properties, this.cluster.brokerList());
		const client = await this.createClient(properties);

		let result: T;
		try {
			if (request.seekPositions.size > 0) {
				this.transition(request.topic, "seeking");
			}
			await this.subscribe(client, request);
			result = await body(client);
		} catch (error) {
			await this.closeAfterFailure(client, request.topic);
			throw error;
		}

		try {
			await client.close();
		} catch (error) {
			throw asConsumeError(error, request.topic, `Failed to close consumer of topic "${request.topic}"`);
		}
		return result;
	}

	private async createClient(properties: Properties): Promise<ConsumerClient> {
		try {
			return await this.factory.createConsumer(properties);
		} catch (error) {
			if (error instanceof ExchangeError) {
				throw error;
			}
			throw new ConfigError(`Failed to create consumer: ${toError(error).message}`, { cause: error });
		}
	}

	private async subscribe<K, V>(client: ConsumerClient, request: ConsumeRequest<K, V>): Promise<void> {
		try {
			await client.subscribe(request.topic, request.seekPositions);
		} catch (error) {
			throw asConsumeError(error, request.topic, `Failed to subscribe to topic "${request.topic}"`);
		}
	}

	private async closeAfterFailure(client: ConsumerClient, topic: string): Promise<void> {
		try {
			await client.close();
		} catch (error) {
			this.logger.warn("Failed to close consumer of %s after an error: %s", topic, toError(error).message);
		}
	}
}

function nextState<K, V>(
	request: ObserveKeyValuesRequest<K, V>,
	admittedCount: number,
	elapsedMs: number
): ObservationState {
	if (request.desiredCount > 0 && admittedCount >= request.desiredCount) {
		return "satisfied";
	}
	if (elapsedMs >= request.timeoutMs) {
		return request.desiredCount === 0 ? "satisfied" : "timedOut";
	}
	return "polling";
}

async function decode<K, V>(request: ConsumeRequest<K, V>, record: IncomingRecord): Promise<KeyValue<K, V | null>> {
	try {
		const key = record.key === null ? null : await request.keyCodec.decode(record.key);
		const value = record.value === null ? null : await request.valueCodec.decode(record.value);
		const metadata = request.includeMetadata
			? { topic: record.topic, partition: record.partition, offset: record.offset }
			: undefined;
		return new KeyValue<K, V | null>(key, value, record.headers, metadata);
	} catch (error) {
		throw new ConsumeError(
			`Failed to decode record ${record.topic}-${record.partition}@${record.offset}: ${toError(error).message}`,
			request.topic,
			{ cause: error }
		);
	}
}

function asConsumeError(error: unknown, topic: string, message: string): ExchangeError {
	if (error instanceof ExchangeError) {
		return error;
	}
	return new ConsumeError(`${message}: ${toError(error).message}`, topic, { cause: error });
}
