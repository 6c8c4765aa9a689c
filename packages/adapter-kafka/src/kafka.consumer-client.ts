/**
 * Kafka Consumer Client
 *
 * KafkaJS pushes messages through `consumer.run({ eachMessage })`; this client
 * buffers them so the observation engine can pull with bounded polls.
 */

import type { EachMessagePayload, IHeaders } from "kafkajs";
import {
	type ConsumerClient,
	createDeferred,
	type Deferred,
	type Header,
	type IncomingRecord,
	type Logger,
} from "kafkaprobe";
import type { KafkaConsumerLike } from "./kafka.types";

export interface KafkaConsumerClientOptions {
	fromBeginning: boolean;
	autoCommit: boolean;
	logger: Logger;

	/**
	 * Called once when the client closes
	 */
	onClose?: (client: KafkaConsumerClient) => void;
}

/**
 * Flatten KafkaJS headers into an ordered list; array values become repeated names.
 */
export function fromKafkaHeaders(headers: IHeaders | undefined): Header[] {
	const result: Header[] = [];
	const source: IHeaders = headers ?? {};
	for (const [name, value] of Object.entries(source)) {
		const values = Array.isArray(value) ? value : [value];
		for (const item of values) {
			if (item !== undefined) {
				result.push({ name, value: Buffer.isBuffer(item) ? item : Buffer.from(item, "utf8") });
			}
		}
	}
	return result;
}

export class KafkaConsumerClient implements ConsumerClient {
	private buffer: IncomingRecord[] = [];
	private waiter?: Deferred<void>;
	private failure?: Error;
	private floors = new Map<number, number>();
	private readonly lastOffsets = new Map<number, number>();
	private removeCrashListener?: () => void;
	private _isConnected = false;
	private _isRunning = false;
	private closed = false;

	constructor(
		private readonly consumer: KafkaConsumerLike,
		private readonly options: KafkaConsumerClientOptions
	) {}

	get isConnected(): boolean {
		return this._isConnected;
	}

	async connect(): Promise<void> {
		await this.consumer.connect();
		this._isConnected = true;
		this.removeCrashListener = this.consumer.on("consumer.crash", (event) => {
			this.fail(event.payload.error);
		});
	}

	/**
	 * Subscribe and start the consumer. Explicit positions are sought once the
	 * consumer runs; KafkaJS applies them on partition assignment. With positions,
	 * only the listed partitions are delivered.
	 */
	async subscribe(topic: string, positions: ReadonlyMap<number, number>): Promise<void> {
		this.floors = new Map(positions);
		await this.consumer.subscribe({ topics: [topic], fromBeginning: this.options.fromBeginning });
		await this.consumer.run({
			autoCommit: this.options.autoCommit,
			eachMessage: async (payload) => {
				this.accept(payload);
			},
		});
		this._isRunning = true;

		for (const [partition, offset] of positions) {
			this.consumer.seek({ topic, partition, offset: String(offset) });
		}
	}

	async poll(maxWaitMs: number): Promise<IncomingRecord[]> {
		this.throwIfFailed();
		if (this.buffer.length === 0 && maxWaitMs > 0) {
			const waiter = createDeferred<void>();
			this.waiter = waiter;
			const timer = setTimeout(() => waiter.resolve(), maxWaitMs);
			try {
				await waiter.promise;
			} finally {
				clearTimeout(timer);
				this.waiter = undefined;
			}
			this.throwIfFailed();
		}
		const records = this.buffer;
		this.buffer = [];
		return records;
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.removeCrashListener?.();
		this.removeCrashListener = undefined;
		this.buffer = [];
		try {
			if (this._isRunning) {
				this._isRunning = false;
				await this.consumer.stop();
			}
			if (this._isConnected) {
				this._isConnected = false;
				await this.consumer.disconnect();
			}
		} finally {
			this.options.onClose?.(this);
		}
	}

	private accept({ topic, partition, message }: EachMessagePayload): void {
		const offset = Number(message.offset);
		const floor = this.floors.get(partition);
		if (this.floors.size > 0 && (floor === undefined || offset < floor)) {
			return;
		}
		// KafkaJS redelivers after a rebalance; offsets already buffered are skipped
		const last = this.lastOffsets.get(partition);
		if (last !== undefined && offset <= last) {
			return;
		}
		this.lastOffsets.set(partition, offset);

		this.buffer.push({
			topic,
			partition,
			offset,
			key: message.key ?? null,
			value: message.value,
			headers: fromKafkaHeaders(message.headers),
		});
		this.waiter?.resolve();
	}

	private fail(error: Error): void {
		this.options.logger.warn("Consumer crashed: %s", error.message);
		this.failure = error;
		this.waiter?.resolve();
	}

	private throwIfFailed(): void {
		if (this.failure) {
			throw this.failure;
		}
	}
}
