/**
 * JSON Codec
 *
 * Codec for structured record keys and values, stored as UTF-8 JSON text.
 * Supports custom reviver/replacer functions.
 */

import type { Codec, WireFormat } from "./codec.types";
import { CodecError } from "./codec.types";

/**
 * JSON codec configuration options
 */
export interface JsonCodecOptions {
	/**
	 * Custom reviver function for JSON.parse().
	 *
	 * @example Convert ISO date strings to Date objects
	 * ```typescript
	 * const codec = new JsonCodec<Order>({
	 *   reviver: (key, value) => {
	 *     if (typeof value === "string" && /^\d{4}-\d{2}-\d{2}T/.test(value)) {
	 *       return new Date(value);
	 *     }
	 *     return value;
	 *   }
	 * });
	 * ```
	 */
	reviver?: (key: string, value: unknown) => unknown;

	/**
	 * Custom replacer function for JSON.stringify().
	 */
	replacer?: (key: string, value: unknown) => unknown;
}

/**
 * JSON codec for structured payloads.
 *
 * @template D - Data type being encoded/decoded
 *
 * @example
 * ```typescript
 * interface Order { orderId: string; amount: number; }
 *
 * const request = ReadKeyValues.from("orders")
 *   .withValueCodec(new JsonCodec<Order>())
 *   .useDefaults();
 * ```
 */
export class JsonCodec<D = unknown> implements Codec<D> {
	readonly name = "json";
	readonly wireFormat: WireFormat = "text";

	private readonly reviver?: (key: string, value: unknown) => unknown;
	private readonly replacer?: (key: string, value: unknown) => unknown;

	constructor(options: JsonCodecOptions = {}) {
		this.reviver = options.reviver;
		this.replacer = options.replacer;
	}

	encode(data: D): string {
		try {
			return JSON.stringify(data, this.replacer);
		} catch (error) {
			throw CodecError.encodeError(this.name, error instanceof Error ? error : new Error(String(error)), data);
		}
	}

	decode(wire: Buffer): D {
		const text = wire.toString("utf8");
		try {
			return JSON.parse(text, this.reviver) as D;
		} catch (error) {
			// Truncate large data for error message
			const truncatedData = text.length > 200 ? `${text.slice(0, 200)}...` : text;

			throw CodecError.decodeError(this.name, error instanceof Error ? error : new Error(String(error)), truncatedData);
		}
	}
}
