/**
 * Transactional Send Builders
 *
 * All entries of a request are written in one transaction, committed or
 * deliberately aborted as a unit.
 */

import type { Codec } from "../codecs";
import { ConfigError } from "../errors";
import type { KeyValue } from "../records";
import { RequestBuilder, requireNonEmpty, requireTopic } from "./request-builder";
import type {
	SendKeyValuesTransactionalRequest,
	SendValuesTransactionalRequest,
	TopicRecords,
	TopicValues,
} from "./request.types";

/**
 * Append items to the entry of a topic, creating it in first-seen order.
 */
function appendEntry<T>(entries: Map<string, T[]>, topic: string, items: readonly T[]): void {
	const existing = entries.get(requireTopic(topic));
	if (existing) {
		existing.push(...items);
	} else {
		entries.set(topic, [...items]);
	}
}

function requireEntries<T>(entries: Map<string, T[]>): void {
	if (entries.size === 0) {
		throw new ConfigError("A transactional request needs at least one topic");
	}
}

/**
 * Builder for un-keyed transactional sends.
 *
 * @example
 * ```typescript
 * const request = SendValuesTransactional.inTransaction("orders", ["a", "b"])
 *   .inTransaction("audit", ["order a", "order b"])
 *   .failTransaction()
 *   .useDefaults();
 * ```
 */
export class SendValuesTransactional<V> extends RequestBuilder<SendValuesTransactionalRequest<V>> {
	private readonly entries = new Map<string, V[]>();
	private abortOnCompletion = false;
	private valueCodec?: Codec<V>;

	private constructor() {
		super();
	}

	static inTransaction<V>(topic: string, values: readonly V[]): SendValuesTransactional<V> {
		return new SendValuesTransactional<V>().inTransaction(topic, values);
	}

	/**
	 * Add values for another (or the same) topic to the transaction.
	 */
	inTransaction(topic: string, values: readonly V[]): this {
		appendEntry(this.entries, topic, values);
		return this;
	}

	/**
	 * Abort the transaction after every record was acknowledged.
	 * Committed-only consumers will never see the records.
	 */
	failTransaction(): this {
		this.abortOnCompletion = true;
		return this;
	}

	withValueCodec(codec: Codec<V>): this {
		this.valueCodec = codec;
		return this;
	}

	build(): SendValuesTransactionalRequest<V> {
		requireEntries(this.entries);
		const entries: TopicValues<V>[] = [...this.entries].map(([topic, values]) =>
			Object.freeze({ topic, values: requireNonEmpty(values, `Values for topic "${topic}"`) })
		);
		const request: SendValuesTransactionalRequest<V> = {
			kind: "valuesTransactional",
			entries: Object.freeze(entries),
			valueCodec: this.valueCodec,
			properties: this.properties(),
			abortOnCompletion: this.abortOnCompletion,
		};
		return Object.freeze(request);
	}
}

/**
 * Builder for keyed transactional sends.
 *
 * @example
 * ```typescript
 * const request = SendKeyValuesTransactional.inTransaction("orders", [new KeyValue("k1", "a")])
 *   .failTransaction()
 *   .useDefaults();
 * ```
 */
export class SendKeyValuesTransactional<K, V> extends RequestBuilder<SendKeyValuesTransactionalRequest<K, V>> {
	private readonly entries = new Map<string, KeyValue<K, V>[]>();
	private abortOnCompletion = false;
	private keyCodec?: Codec<K>;
	private valueCodec?: Codec<V>;

	private constructor() {
		super();
	}

	static inTransaction<K, V>(topic: string, records: readonly KeyValue<K, V>[]): SendKeyValuesTransactional<K, V> {
		return new SendKeyValuesTransactional<K, V>().inTransaction(topic, records);
	}

	/**
	 * Add records for another (or the same) topic to the transaction.
	 */
	inTransaction(topic: string, records: readonly KeyValue<K, V>[]): this {
		appendEntry(this.entries, topic, records);
		return this;
	}

	/**
	 * Abort the transaction after every record was acknowledged.
	 */
	failTransaction(): this {
		this.abortOnCompletion = true;
		return this;
	}

	withKeyCodec(codec: Codec<K>): this {
		this.keyCodec = codec;
		return this;
	}

	withValueCodec(codec: Codec<V>): this {
		this.valueCodec = codec;
		return this;
	}

	build(): SendKeyValuesTransactionalRequest<K, V> {
		requireEntries(this.entries);
		const entries: TopicRecords<K, V>[] = [...this.entries].map(([topic, records]) =>
			Object.freeze({ topic, records: requireNonEmpty(records, `Records for topic "${topic}"`) })
		);
		const request: SendKeyValuesTransactionalRequest<K, V> = {
			kind: "keyValuesTransactional",
			entries: Object.freeze(entries),
			keyCodec: this.keyCodec,
			valueCodec: this.valueCodec,
			properties: this.properties(),
			abortOnCompletion: this.abortOnCompletion,
		};
		return Object.freeze(request);
	}
}
