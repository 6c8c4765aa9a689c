/**
 * Record Filter Pipeline
 *
 * Read and observe requests carry three independent pipelines (key, value,
 * headers). A consumed record is admitted only if all three pass.
 */

import type { Header } from "../records";

/**
 * Single-method capability deciding whether a value passes.
 */
export type Predicate<T> = (value: T) => boolean;

/**
 * Predicate that admits everything. Used when no filter was given.
 */
export function alwaysTrue(): boolean {
	return true;
}

/**
 * Compose predicates with short-circuiting AND, in the given order.
 * An empty list composes to {@link alwaysTrue}.
 */
export function allOf<T>(predicates: readonly Predicate<T>[]): Predicate<T> {
	if (predicates.length === 0) {
		return alwaysTrue;
	}
	if (predicates.length === 1) {
		return predicates[0];
	}
	const chain = [...predicates];
	return (value: T) => chain.every((predicate) => predicate(value));
}

/**
 * The three pipelines of a read or observe request.
 */
export interface RecordFilters<K, V> {
	readonly keyFilter: Predicate<K | null>;
	readonly valueFilter: Predicate<V | null>;
	readonly headersFilter: Predicate<readonly Header[]>;
}

/**
 * Evaluate a record against key, value and headers pipelines, in that order.
 */
export function admits<K, V>(
	filters: RecordFilters<K, V>,
	key: K | null,
	value: V | null,
	headers: readonly Header[]
): boolean {
	return filters.keyFilter(key) && filters.valueFilter(value) && filters.headersFilter(headers);
}
