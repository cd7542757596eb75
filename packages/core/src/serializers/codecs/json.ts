import { readPlain, toPlain, type PlainRules } from "../plain-values.js";
import { utf8Decode, utf8Encode } from "../bytes.js";
import type { FormatCodec } from "../format-codec.js";

/**
 * Options for the JSON codec.
 */
export interface JsonCodecOptions {
	readonly indent?: number;
}

const JSON_RULES: PlainRules = {
	format: "json",
	bigInt: "text",
	nonFiniteAsText: true,
	bytesAsBase64: true,
};

/**
 * Creates a JSON codec.
 *
 * Integers beyond the safe number range, NaN, ±Infinity and -0 are written
 * as strings and bytes as base64; a schema turns them back on decode.
 * Several values are written as JSON Lines, one compact value per line.
 *
 * @example
 * ```typescript
 * const codec = jsonCodec({ indent: 2 })
 * const bytes = codec.encode(Intermediate.text("hi"), undefined)
 * ```
 */
export const jsonCodec = (options?: JsonCodecOptions): FormatCodec => {
	const indent = options?.indent;

	return {
		name: "json",
		extensions: ["json", "jsonl", "ndjson"],
		requiresSchema: false,
		encode: (value) =>
			utf8Encode(JSON.stringify(toPlain(value, JSON_RULES), null, indent)),
		decode: (bytes, schema) => {
			const parsed: unknown = JSON.parse(utf8Decode(bytes));
			return readPlain(parsed, schema, JSON_RULES);
		},
		encodeMany: (values) =>
			utf8Encode(
				values.map((value) => `${JSON.stringify(toPlain(value, JSON_RULES))}\n`).join(""),
			),
		decodeMany: (bytes, schema) =>
			utf8Decode(bytes)
				.split("\n")
				.filter((line) => line.trim() !== "")
				.map((line) => {
					const parsed: unknown = JSON.parse(line);
					return readPlain(parsed, schema, JSON_RULES);
				}),
	};
};
