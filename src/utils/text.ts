const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

/**
 * Decodes bytes as UTF-8, refusing invalid sequences instead of inserting
 * replacement characters.
 *
 * @returns the text, or null if the bytes are not valid UTF-8
 *
 * @example
 * ```typescript
 * decodeText(new Uint8Array([0x6f, 0x6e])); // "on"
 * decodeText(new Uint8Array([0xff, 0xfe])); // null
 * ```
 */
export function decodeText(bytes: Uint8Array): string | null {
	try {
		return strictDecoder.decode(bytes);
	} catch {
		// TypeError: the encoded data was not valid for encoding utf-8
		return null;
	}
}

export function encodeText(text: string): Uint8Array {
	return encoder.encode(text);
}

/**
 * Copies any Node Buffer or typed-array view into a plain Uint8Array that
 * owns exactly its bytes.
 */
export function toBytes(data: ArrayBufferView): Uint8Array {
	return new Uint8Array(data.buffer, data.byteOffset, data.byteLength).slice();
}
