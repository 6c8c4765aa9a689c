/**
 * Kafka Producer Client
 *
 * Sends one record per `producer.send()` so every acknowledgement maps to
 * exactly one record.
 */

import type { IHeaders, Message, ProducerRecord, RecordMetadata as KafkaRecordMetadata } from "kafkajs";
import type { OutgoingRecord, ProducerClient, ProducerTransaction, RecordMetadata } from "kafkaprobe";
import type { KafkaSendOptions } from "./kafka.config";
import type { KafkaProducerLike } from "./kafka.types";

/**
 * Group headers by name; repeated names become arrays in their original order.
 */
export function toKafkaHeaders(record: OutgoingRecord): IHeaders | undefined {
	if (record.headers.length === 0) {
		return undefined;
	}
	const grouped = new Map<string, Buffer[]>();
	for (const { name, value } of record.headers) {
		grouped.set(name, [...(grouped.get(name) ?? []), value]);
	}
	const headers: IHeaders = {};
	for (const [name, values] of grouped) {
		headers[name] = values.length === 1 ? values[0] : values;
	}
	return headers;
}

/**
 * Acknowledgement of a single-record send. Without one (acks=0) the
 * partition and offset are -1.
 */
export function toRecordMetadata(topic: string, acknowledged: KafkaRecordMetadata[]): RecordMetadata {
	const [first] = acknowledged;
	if (!first) {
		return { topic, partition: -1, offset: -1 };
	}
	const offset = first.baseOffset ?? first.offset;
	return {
		topic: first.topicName || topic,
		partition: first.partition,
		offset: offset === undefined ? -1 : Number(offset),
	};
}

export class KafkaProducerClient implements ProducerClient {
	private _isConnected = false;

	constructor(
		private readonly producer: KafkaProducerLike,
		private readonly sendOptions: KafkaSendOptions
	) {}

	get isConnected(): boolean {
		return this._isConnected;
	}

	async connect(): Promise<void> {
		await this.producer.connect();
		this._isConnected = true;
	}

	async send(topic: string, record: OutgoingRecord): Promise<RecordMetadata> {
		this.assertConnected();
		const acknowledged = await this.producer.send(this.toProducerRecord(topic, record));
		return toRecordMetadata(topic, acknowledged);
	}

	async beginTransaction(): Promise<ProducerTransaction> {
		this.assertConnected();
		const transaction = await this.producer.transaction();
		return {
			send: async (topic, record) => {
				const acknowledged = await transaction.send(this.toProducerRecord(topic, record));
				return toRecordMetadata(topic, acknowledged);
			},
			commit: () => transaction.commit(),
			abort: () => transaction.abort(),
		};
	}

	async close(): Promise<void> {
		if (this._isConnected) {
			this._isConnected = false;
			await this.producer.disconnect();
		}
	}

	private toProducerRecord(topic: string, record: OutgoingRecord): ProducerRecord {
		const message: Message = {
			key: record.key,
			value: record.value,
			headers: toKafkaHeaders(record),
		};
		return {
			topic,
			messages: [message],
			acks: this.sendOptions.acks,
			compression: this.sendOptions.compression,
		};
	}

	private assertConnected(): void {
		if (!this._isConnected) {
			throw new Error("Producer is not connected");
		}
	}
}
