/**
 * Key/Value Record Model
 *
 * The unit of exchange for keyed sends and for everything read back.
 */

/**
 * A single record header. Names may repeat within a record.
 */
export interface Header {
	readonly name: string;
	readonly value: Buffer;
}

/**
 * Coordinates of a consumed record.
 * Only attached when the read/observe request asked for metadata.
 */
export interface KeyValueMetadata {
	readonly topic: string;
	readonly partition: number;
	readonly offset: number;
}

/**
 * Build a header from a string (UTF-8) or raw bytes.
 */
export function header(name: string, value: string | Uint8Array): Header {
	return {
		name,
		value: typeof value === "string" ? Buffer.from(value, "utf8") : Buffer.from(value),
	};
}

/**
 * Immutable record: key, value, ordered headers and optional metadata.
 *
 * @template K - Key type (the key itself may be null for un-keyed records)
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const record = new KeyValue("order-1", '{"amount":10}').withHeader("source", "checkout");
 * record.headerValue("source"); // "checkout"
 * ```
 */
export class KeyValue<K, V> {
	readonly key: K | null;
	readonly value: V;
	readonly headers: readonly Header[];
	readonly metadata?: KeyValueMetadata;

	constructor(key: K | null, value: V, headers: readonly Header[] = [], metadata?: KeyValueMetadata) {
		this.key = key;
		this.value = value;
		this.headers = Object.freeze([...headers]);
		this.metadata = metadata;
		Object.freeze(this);
	}

	/**
	 * Copy of this record with one more header appended.
	 */
	withHeader(name: string, value: string | Uint8Array): KeyValue<K, V> {
		return new KeyValue(this.key, this.value, [...this.headers, header(name, value)], this.metadata);
	}

	/**
	 * First header with the given name, decoded as UTF-8.
	 */
	headerValue(name: string): string | undefined {
		return this.headers.find((h) => h.name === name)?.value.toString("utf8");
	}
}
