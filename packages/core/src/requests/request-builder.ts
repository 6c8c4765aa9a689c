/**
 * Request Builder Base
 *
 * Property overrides and input checks shared by every request builder.
 */

import type { Properties } from "../config";
import { ConfigError } from "../errors";

/**
 * Builder with chained client property overrides.
 *
 * @template R - Request type produced by build()
 */
export abstract class RequestBuilder<R> {
	protected readonly overrides: Record<string, string> = {};

	/**
	 * Override one client property for this request.
	 *
	 * @example
	 * ```typescript
	 * ReadKeyValues.from("orders").with("isolation.level", "read_committed").build();
	 * ```
	 */
	with(name: string, value: string): this {
		this.overrides[name] = value;
		return this;
	}

	/**
	 * Override several client properties at once.
	 */
	withAll(properties: Properties): this {
		Object.assign(this.overrides, properties);
		return this;
	}

	/**
	 * Finalize the request.
	 *
	 * @throws ConfigError if the request is incomplete or invalid
	 */
	abstract build(): R;

	/**
	 * Finalize the request. Reads better when no override was chained.
	 */
	useDefaults(): R {
		return this.build();
	}

	protected properties(): Properties {
		return Object.freeze({ ...this.overrides });
	}
}

export function requireTopic(topic: string): string {
	if (topic.trim().length === 0) {
		throw new ConfigError("Topic name must not be empty");
	}
	return topic;
}

export function requireNonEmpty<T>(items: readonly T[], what: string): readonly T[] {
	if (items.length === 0) {
		throw new ConfigError(`${what} must contain at least one record`);
	}
	return Object.freeze([...items]);
}

export function requireNonNegativeInteger(value: number, what: string): number {
	if (!Number.isInteger(value) || value < 0) {
		throw new ConfigError(`${what} must be a non-negative integer, got ${value}`);
	}
	return value;
}

export function requirePositiveDuration(millis: number, what: string): number {
	if (!Number.isFinite(millis) || millis <= 0) {
		throw new ConfigError(`${what} must be positive, got ${millis}ms`);
	}
	return millis;
}
