/**
 * Send Builders
 *
 * Plain (non-transactional) sends to a single topic.
 */

import type { Codec } from "../codecs";
import type { KeyValue } from "../records";
import { RequestBuilder, requireNonEmpty, requireTopic } from "./request-builder";
import type { SendKeyValuesRequest, SendValuesRequest } from "./request.types";

/**
 * Builder for un-keyed sends.
 *
 * Values without a codec must be strings, byte buffers or null.
 *
 * @example
 * ```typescript
 * await exchange.send(SendValues.to("orders", ["a", "b", "c"]).useDefaults());
 * ```
 */
export class SendValues<V> extends RequestBuilder<SendValuesRequest<V>> {
	private valueCodec?: Codec<V>;

	private constructor(
		private readonly topic: string,
		private readonly values: readonly V[]
	) {
		super();
	}

	static to<V>(topic: string, values: readonly V[]): SendValues<V> {
		return new SendValues(topic, values);
	}

	withValueCodec(codec: Codec<V>): this {
		this.valueCodec = codec;
		return this;
	}

	build(): SendValuesRequest<V> {
		const request: SendValuesRequest<V> = {
			kind: "values",
			topic: requireTopic(this.topic),
			values: requireNonEmpty(this.values, "Values"),
			valueCodec: this.valueCodec,
			properties: this.properties(),
		};
		return Object.freeze(request);
	}
}

/**
 * Builder for keyed sends.
 *
 * @example
 * ```typescript
 * const records = [new KeyValue("k1", "a"), new KeyValue("k1", "b")];
 * await exchange.send(SendKeyValues.to("orders", records).with("acks", "1").build());
 * ```
 */
export class SendKeyValues<K, V> extends RequestBuilder<SendKeyValuesRequest<K, V>> {
	private keyCodec?: Codec<K>;
	private valueCodec?: Codec<V>;

	private constructor(
		private readonly topic: string,
		private readonly records: readonly KeyValue<K, V>[]
	) {
		super();
	}

	static to<K, V>(topic: string, records: readonly KeyValue<K, V>[]): SendKeyValues<K, V> {
		return new SendKeyValues(topic, records);
	}

	withKeyCodec(codec: Codec<K>): this {
		this.keyCodec = codec;
		return this;
	}

	withValueCodec(codec: Codec<V>): this {
		this.valueCodec = codec;
		return this;
	}

	build(): SendKeyValuesRequest<K, V> {
		const request: SendKeyValuesRequest<K, V> = {
			kind: "keyValues",
			topic: requireTopic(this.topic),
			records: requireNonEmpty(this.records, "Records"),
			keyCodec: this.keyCodec,
			valueCodec: this.valueCodec,
			properties: this.properties(),
		};
		return Object.freeze(request);
	}
}
