/**
 * Request Types
 *
 * Immutable descriptions of what to send or read. Built with the fluent
 * builders in this directory, passed once to an engine call, then discarded.
 */

import type { Codec } from "../codecs";
import type { Properties } from "../config";
import type { RecordFilters } from "../filters";
import type { KeyValue } from "../records";

// =============================================================================
// Send Requests
// =============================================================================

/**
 * Values bound for one topic inside a transaction.
 */
export interface TopicValues<V> {
	readonly topic: string;
	readonly values: readonly V[];
}

/**
 * Keyed records bound for one topic inside a transaction.
 */
export interface TopicRecords<K, V> {
	readonly topic: string;
	readonly records: readonly KeyValue<K, V>[];
}

/**
 * Un-keyed values sent to a single topic.
 */
export interface SendValuesRequest<V> {
	readonly kind: "values";
	readonly topic: string;
	readonly values: readonly V[];
	readonly valueCodec?: Codec<V>;
	readonly properties: Properties;
}

/**
 * Keyed records sent to a single topic.
 */
export interface SendKeyValuesRequest<K, V> {
	readonly kind: "keyValues";
	readonly topic: string;
	readonly records: readonly KeyValue<K, V>[];
	readonly keyCodec?: Codec<K>;
	readonly valueCodec?: Codec<V>;
	readonly properties: Properties;
}

/**
 * Un-keyed values sent to one or more topics in a single transaction.
 */
export interface SendValuesTransactionalRequest<V> {
	readonly kind: "valuesTransactional";
	readonly entries: readonly TopicValues<V>[];
	readonly valueCodec?: Codec<V>;
	readonly properties: Properties;
	/**
	 * Abort instead of commit once every record is acknowledged
	 */
	readonly abortOnCompletion: boolean;
}

/**
 * Keyed records sent to one or more topics in a single transaction.
 */
export interface SendKeyValuesTransactionalRequest<K, V> {
	readonly kind: "keyValuesTransactional";
	readonly entries: readonly TopicRecords<K, V>[];
	readonly keyCodec?: Codec<K>;
	readonly valueCodec?: Codec<V>;
	readonly properties: Properties;
	/**
	 * Abort instead of commit once every record is acknowledged
	 */
	readonly abortOnCompletion: boolean;
}

/**
 * Everything the producer engine accepts, tagged by `kind`.
 */
export type SendRequest<K, V> =
	| SendValuesRequest<V>
	| SendKeyValuesRequest<K, V>
	| SendValuesTransactionalRequest<V>
	| SendKeyValuesTransactionalRequest<K, V>;

// =============================================================================
// Consume Requests
// =============================================================================

/**
 * Settings shared by read and observe requests.
 */
export interface ConsumeRequest<K, V> extends RecordFilters<K, V> {
	readonly topic: string;
	readonly keyCodec: Codec<K>;
	readonly valueCodec: Codec<V>;
	readonly properties: Properties;
	/**
	 * Explicit start offsets, partition to offset. Empty reads from the group position.
	 */
	readonly seekPositions: ReadonlyMap<number, number>;
	readonly includeMetadata: boolean;
}

/**
 * Drain whatever is currently available, within a short bound.
 */
export interface ReadKeyValuesRequest<K, V> extends ConsumeRequest<K, V> {
	readonly kind: "read";
	/**
	 * Maximum number of records returned
	 */
	readonly limit: number;
	readonly maxTotalPollTimeMs: number;
}

/**
 * Block until the desired number of matching records arrived, or fail at the deadline.
 */
export interface ObserveKeyValuesRequest<K, V> extends ConsumeRequest<K, V> {
	readonly kind: "observe";
	readonly desiredCount: number;
	readonly timeoutMs: number;
}

export const DEFAULT_MAX_TOTAL_POLL_TIME_MS = 2000;
export const DEFAULT_OBSERVATION_TIMEOUT_MS = 30_000;
