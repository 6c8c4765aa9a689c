/**
 * String and Bytes Codecs
 *
 * The string codec is the default for keys and values of every read and
 * observe request.
 */

import type { Codec, WireFormat } from "./codec.types";

/**
 * Text codec over a Node.js buffer encoding (UTF-8 unless told otherwise).
 */
export class StringCodec implements Codec<string> {
	readonly name = "string";
	readonly wireFormat: WireFormat = "text";

	constructor(private readonly encoding: BufferEncoding = "utf8") {}

	encode(data: string): Uint8Array {
		return Buffer.from(data, this.encoding);
	}

	decode(wire: Buffer): string {
		return wire.toString(this.encoding);
	}
}

/**
 * Pass-through codec for raw payloads.
 */
export class BytesCodec implements Codec<Buffer> {
	readonly name = "bytes";
	readonly wireFormat: WireFormat = "binary";

	encode(data: Buffer): Uint8Array {
		return data;
	}

	decode(wire: Buffer): Buffer {
		return Buffer.from(wire);
	}
}

/**
 * Default UTF-8 string codec instance.
 */
export const stringCodec = new StringCodec();

/**
 * Default bytes codec instance.
 */
export const bytesCodec = new BytesCodec();
