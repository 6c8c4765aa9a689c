/**
 * Exchange Errors
 *
 * Every failure of a produce, read or observe call is raised as one of these.
 * Nothing is retried inside the engines; callers decide what a failure means.
 */

/**
 * Transactional protocol step that failed
 */
export type TransactionOperation = "begin" | "commit" | "abort";

/**
 * Base class for all exchange failures.
 */
export class ExchangeError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ExchangeError";
	}
}

/**
 * Configuration rejected by the client, or an invalid request.
 */
export class ConfigError extends ExchangeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigError";
	}
}

/**
 * A produced record was not acknowledged.
 */
export class ProduceError extends ExchangeError {
	readonly topic: string;

	constructor(message: string, topic: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ProduceError";
		this.topic = topic;
	}
}

/**
 * Initializing, beginning, committing or aborting a transaction failed.
 */
export class TransactionError extends ExchangeError {
	readonly operation: TransactionOperation;

	constructor(message: string, operation: TransactionOperation, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TransactionError";
		this.operation = operation;
	}
}

/**
 * Subscribing to or polling a topic failed.
 */
export class ConsumeError extends ExchangeError {
	readonly topic: string;

	constructor(message: string, topic: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConsumeError";
		this.topic = topic;
	}
}

/**
 * An observe call did not see the desired number of records before its deadline.
 *
 * This is an assertion failure about the system under test, not an
 * infrastructure fault.
 */
export class ObservationTimeoutError extends ExchangeError {
	readonly topic: string;
	readonly desiredCount: number;
	readonly observedCount: number;
	readonly timeoutMs: number;

	constructor(topic: string, desiredCount: number, observedCount: number, timeoutMs: number) {
		super(
			`Expected to observe ${desiredCount} record(s) on topic "${topic}" within ${timeoutMs}ms, but observed ${observedCount}`
		);
		this.name = "ObservationTimeoutError";
		this.topic = topic;
		this.desiredCount = desiredCount;
		this.observedCount = observedCount;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
