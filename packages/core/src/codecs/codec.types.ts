/**
 * Codec Types
 *
 * Codecs turn record keys and values into the bytes the broker stores, and back.
 * Requests carry one codec for keys and one for values.
 */

/**
 * Wire format type - indicates the encoded data format
 */
export type WireFormat = "text" | "binary";

/**
 * Codec interface for record key/value serialization.
 *
 * @template D - Data type being encoded/decoded
 *
 * @example Text codec
 * ```typescript
 * const upperCodec: Codec<string> = {
 *   name: "upper",
 *   wireFormat: "text",
 *   encode: (data) => data.toUpperCase(),
 *   decode: (wire) => wire.toString("utf8").toLowerCase(),
 * };
 * ```
 *
 * @example Binary codec (MessagePack)
 * ```typescript
 * const msgpackCodec: Codec<Order> = {
 *   name: "msgpack",
 *   wireFormat: "binary",
 *   encode: (order) => pack(order),
 *   decode: (wire) => unpack(wire) as Order,
 * };
 * ```
 */
export interface Codec<D> {
	/**
	 * Human-readable codec name for error messages and debugging.
	 * @example "string", "json", "msgpack"
	 */
	readonly name: string;

	/**
	 * Wire format indicator.
	 */
	readonly wireFormat: WireFormat;

	/**
	 * Encode data to wire format.
	 *
	 * @throws CodecError if encoding fails
	 */
	encode(data: D): string | Uint8Array | Promise<string | Uint8Array>;

	/**
	 * Decode the raw bytes of a record key or value.
	 *
	 * @throws CodecError if decoding fails
	 */
	decode(wire: Buffer): D | Promise<D>;
}

/**
 * Codec operation type
 */
export type CodecOperation = "encode" | "decode";

/**
 * Error thrown when codec encoding or decoding fails.
 *
 * @example
 * ```typescript
 * try {
 *   const order = await codec.decode(wire);
 * } catch (error) {
 *   if (error instanceof CodecError) {
 *     console.log(`Codec ${error.codecName} failed to ${error.operation}`);
 *   }
 * }
 * ```
 */
export class CodecError extends Error {
	/**
	 * Name of the codec that failed
	 */
	readonly codecName: string;

	/**
	 * Operation that failed ("encode" or "decode")
	 */
	readonly operation: CodecOperation;

	/**
	 * The data that caused the error, truncated for large payloads
	 */
	readonly data?: unknown;

	constructor(
		message: string,
		codecName: string,
		operation: CodecOperation,
		options?: {
			cause?: Error;
			data?: unknown;
		}
	) {
		super(message, { cause: options?.cause });
		this.name = "CodecError";
		this.codecName = codecName;
		this.operation = operation;
		this.data = options?.data;
	}

	/**
	 * Create a CodecError for an encode operation failure
	 */
	static encodeError(codecName: string, cause: Error, data?: unknown): CodecError {
		return new CodecError(`Failed to encode record with ${codecName} codec: ${cause.message}`, codecName, "encode", {
			cause,
			data,
		});
	}

	/**
	 * Create a CodecError for a decode operation failure
	 */
	static decodeError(codecName: string, cause: Error, data?: unknown): CodecError {
		return new CodecError(`Failed to decode record with ${codecName} codec: ${cause.message}`, codecName, "decode", {
			cause,
			data,
		});
	}
}
