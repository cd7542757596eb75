const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export const utf8Encode = (text: string): Uint8Array => encoder.encode(text);

/**
 * Throws a TypeError on malformed UTF-8.
 */
export const utf8Decode = (bytes: Uint8Array): string => decoder.decode(bytes);

export const concatBytes = (chunks: ReadonlyArray<Uint8Array>): Uint8Array => {
	const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
	const out = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		out.set(chunk, offset);
		offset += chunk.length;
	}
	return out;
};
