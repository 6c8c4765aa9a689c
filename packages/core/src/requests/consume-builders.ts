/**
 * Read and Observe Builders
 *
 * Keys and values are decoded as UTF-8 strings unless a codec is given.
 * Codecs must be chosen before filters on the same part of the record, since a
 * filter is typed by what the codec produces.
 */

import { type Codec, stringCodec } from "../codecs";
import { ConfigError } from "../errors";
import { allOf, type Predicate } from "../filters";
import type { Header } from "../records";
import { type TimeUnit, toMillis } from "../utils";
import {
	RequestBuilder,
	requireNonNegativeInteger,
	requirePositiveDuration,
	requireTopic,
} from "./request-builder";
import {
	type ConsumeRequest,
	DEFAULT_MAX_TOTAL_POLL_TIME_MS,
	DEFAULT_OBSERVATION_TIMEOUT_MS,
	type ObserveKeyValuesRequest,
	type ReadKeyValuesRequest,
} from "./request.types";

/**
 * Settings shared by read and observe builders.
 *
 * @template K - Decoded key type
 * @template V - Decoded value type
 * @template R - Request type produced by build()
 */
abstract class ConsumeRequestBuilder<K, V, R> extends RequestBuilder<R> {
	protected keyFilters: Predicate<K | null>[] = [];
	protected valueFilters: Predicate<V | null>[] = [];
	protected headerFilters: Predicate<readonly Header[]>[] = [];
	protected seekPositions = new Map<number, number>();
	protected metadata = false;

	protected constructor(
		protected readonly topic: string,
		protected readonly keyCodec: Codec<K>,
		protected readonly valueCodec: Codec<V>
	) {
		super();
	}

	/**
	 * Admit only records whose decoded key passes. Repeated calls are ANDed.
	 */
	filterOnKeys(predicate: Predicate<K | null>): this {
		this.keyFilters.push(predicate);
		return this;
	}

	/**
	 * Admit only records whose decoded value passes. Repeated calls are ANDed.
	 */
	filterOnValues(predicate: Predicate<V | null>): this {
		this.valueFilters.push(predicate);
		return this;
	}

	/**
	 * Admit only records whose headers pass. Repeated calls are ANDed.
	 */
	filterOnHeaders(predicate: Predicate<readonly Header[]>): this {
		this.headerFilters.push(predicate);
		return this;
	}

	/**
	 * Start reading a partition at an explicit offset instead of the group position.
	 */
	seekTo(partition: number, offset: number): this;
	seekTo(positions: ReadonlyMap<number, number>): this;
	seekTo(partitionOrPositions: number | ReadonlyMap<number, number>, offset?: number): this {
		const positions =
			typeof partitionOrPositions === "number"
				? new Map([[partitionOrPositions, offset ?? 0]])
				: partitionOrPositions;

		for (const [partition, position] of positions) {
			this.seekPositions.set(
				requireNonNegativeInteger(partition, "Partition"),
				requireNonNegativeInteger(position, "Offset")
			);
		}
		return this;
	}

	/**
	 * Attach topic, partition and offset to every returned record.
	 */
	includeMetadata(): this {
		this.metadata = true;
		return this;
	}

	protected assertNoKeyFilters(): void {
		if (this.keyFilters.length > 0) {
			throw new ConfigError("withKeyCodec() must be called before filterOnKeys()");
		}
	}

	protected assertNoValueFilters(): void {
		if (this.valueFilters.length > 0) {
			throw new ConfigError("withValueCodec() must be called before filterOnValues()");
		}
	}

	/**
	 * Copy the settings that do not depend on the key or value type.
	 */
	protected copySharedTo<K2, V2, R2>(target: ConsumeRequestBuilder<K2, V2, R2>): void {
		Object.assign(target.overrides, this.overrides);
		target.headerFilters.push(...this.headerFilters);
		target.seekPositions = new Map(this.seekPositions);
		target.metadata = this.metadata;
	}

	protected buildConsumeRequest(): ConsumeRequest<K, V> {
		return {
			topic: requireTopic(this.topic),
			keyCodec: this.keyCodec,
			valueCodec: this.valueCodec,
			properties: this.properties(),
			keyFilter: allOf(this.keyFilters),
			valueFilter: allOf(this.valueFilters),
			headersFilter: allOf(this.headerFilters),
			seekPositions: new Map(this.seekPositions),
			includeMetadata: this.metadata,
		};
	}
}

/**
 * Builder for bounded reads: return whatever matching records are available.
 *
 * @example
 * ```typescript
 * const records = await exchange.read(
 *   ReadKeyValues.from("orders").with("isolation.level", "read_committed").seekTo(0, 2).build()
 * );
 * ```
 */
export class ReadKeyValues<K, V> extends ConsumeRequestBuilder<K, V, ReadKeyValuesRequest<K, V>> {
	private limit = Number.POSITIVE_INFINITY;
	private maxTotalPollTimeMs = DEFAULT_MAX_TOTAL_POLL_TIME_MS;

	private constructor(topic: string, keyCodec: Codec<K>, valueCodec: Codec<V>) {
		super(topic, keyCodec, valueCodec);
	}

	static from(topic: string): ReadKeyValues<string, string> {
		return new ReadKeyValues(topic, stringCodec, stringCodec);
	}

	withKeyCodec<K2>(codec: Codec<K2>): ReadKeyValues<K2, V> {
		this.assertNoKeyFilters();
		const next = new ReadKeyValues<K2, V>(this.topic, codec, this.valueCodec);
		next.valueFilters.push(...this.valueFilters);
		this.copyTo(next);
		return next;
	}

	withValueCodec<V2>(codec: Codec<V2>): ReadKeyValues<K, V2> {
		this.assertNoValueFilters();
		const next = new ReadKeyValues<K, V2>(this.topic, this.keyCodec, codec);
		next.keyFilters.push(...this.keyFilters);
		this.copyTo(next);
		return next;
	}

	/**
	 * Return at most this many records.
	 */
	withLimit(limit: number): this {
		this.limit = requireNonNegativeInteger(limit, "Limit");
		return this;
	}

	/**
	 * Total time the read keeps polling for available records.
	 */
	withMaxTotalPollTime(amount: number, unit: TimeUnit): this {
		this.maxTotalPollTimeMs = requirePositiveDuration(toMillis(amount, unit), "Max total poll time");
		return this;
	}

	build(): ReadKeyValuesRequest<K, V> {
		const request: ReadKeyValuesRequest<K, V> = {
			...this.buildConsumeRequest(),
			kind: "read",
			limit: this.limit,
			maxTotalPollTimeMs: this.maxTotalPollTimeMs,
		};
		return Object.freeze(request);
	}

	private copyTo<K2, V2>(next: ReadKeyValues<K2, V2>): void {
		this.copySharedTo(next);
		next.limit = this.limit;
		next.maxTotalPollTimeMs = this.maxTotalPollTimeMs;
	}
}

/**
 * Builder for blocking observations: wait until enough matching records arrived.
 *
 * @example
 * ```typescript
 * const records = await exchange.observe(
 *   ObserveKeyValues.on("orders", 3)
 *     .observeFor(5, "seconds")
 *     .filterOnKeys((key) => key === "customer-1")
 *     .useDefaults()
 * );
 * ```
 */
export class ObserveKeyValues<K, V> extends ConsumeRequestBuilder<K, V, ObserveKeyValuesRequest<K, V>> {
	private timeoutMs = DEFAULT_OBSERVATION_TIMEOUT_MS;

	private constructor(
		topic: string,
		private readonly desiredCount: number,
		keyCodec: Codec<K>,
		valueCodec: Codec<V>
	) {
		super(topic, keyCodec, valueCodec);
	}

	static on(topic: string, desiredCount: number): ObserveKeyValues<string, string> {
		return new ObserveKeyValues(topic, desiredCount, stringCodec, stringCodec);
	}

	withKeyCodec<K2>(codec: Codec<K2>): ObserveKeyValues<K2, V> {
		this.assertNoKeyFilters();
		const next = new ObserveKeyValues<K2, V>(this.topic, this.desiredCount, codec, this.valueCodec);
		next.valueFilters.push(...this.valueFilters);
		this.copyTo(next);
		return next;
	}

	withValueCodec<V2>(codec: Codec<V2>): ObserveKeyValues<K, V2> {
		this.assertNoValueFilters();
		const next = new ObserveKeyValues<K, V2>(this.topic, this.desiredCount, this.keyCodec, codec);
		next.keyFilters.push(...this.keyFilters);
		this.copyTo(next);
		return next;
	}

	/**
	 * Override the default 30 second observation window.
	 */
	observeFor(amount: number, unit: TimeUnit): this {
		this.timeoutMs = requirePositiveDuration(toMillis(amount, unit), "Observation timeout");
		return this;
	}

	build(): ObserveKeyValuesRequest<K, V> {
		const request: ObserveKeyValuesRequest<K, V> = {
			...this.buildConsumeRequest(),
			kind: "observe",
			desiredCount: requireNonNegativeInteger(this.desiredCount, "Desired count"),
			timeoutMs: this.timeoutMs,
		};
		return Object.freeze(request);
	}

	private copyTo<K2, V2>(next: ObserveKeyValues<K2, V2>): void {
		this.copySharedTo(next);
		next.timeoutMs = this.timeoutMs;
	}
}
