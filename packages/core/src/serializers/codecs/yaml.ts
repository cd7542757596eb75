import YAML from "yaml";
import { DecodeError } from "../../errors/codec-errors.js";
import { readPlain, toPlain, type PlainRules } from "../plain-values.js";
import { utf8Decode, utf8Encode } from "../bytes.js";
import type { FormatCodec } from "../format-codec.js";

/**
 * Options for the YAML codec.
 */
export interface YamlCodecOptions {
	readonly indent?: number;
	readonly lineWidth?: number;
}

const YAML_RULES: PlainRules = {
	format: "yaml",
	bigInt: "bigint",
	nonFiniteAsText: false,
	bytesAsBase64: true,
};

/**
 * Creates a YAML codec with configurable indentation and line width.
 *
 * Integers are read back as bigint so that no precision is lost; NaN and
 * ±Infinity use YAML's `.nan` and `.inf`. Several values are written as a
 * multi-document stream.
 *
 * @param options.indent - Number of spaces for indentation (default: 2)
 * @param options.lineWidth - Maximum line width before wrapping (default: 80)
 *
 * @example
 * ```typescript
 * const codec = yamlCodec({ indent: 4, lineWidth: 120 })
 * ```
 */
export const yamlCodec = (options?: YamlCodecOptions): FormatCodec => {
	const indent = options?.indent ?? 2;
	const lineWidth = options?.lineWidth ?? 80;

	const stringify = (plain: unknown): string =>
		YAML.stringify(plain, { indent, lineWidth });

	return {
		name: "yaml",
		extensions: ["yaml", "yml"],
		requiresSchema: false,
		encode: (value) => utf8Encode(stringify(toPlain(value, YAML_RULES))),
		decode: (bytes, schema) => {
			const parsed: unknown = YAML.parse(utf8Decode(bytes), { intAsBigInt: true });
			return readPlain(parsed, schema, YAML_RULES);
		},
		encodeMany: (values) =>
			utf8Encode(
				values.map((value) => `---\n${stringify(toPlain(value, YAML_RULES))}`).join(""),
			),
		decodeMany: (bytes, schema) =>
			Array.from(YAML.parseAllDocuments(utf8Decode(bytes), { intAsBigInt: true })).map(
				(document, index) => {
					const [error] = document.errors;
					if (error !== undefined) {
						throw new DecodeError({
							format: "yaml",
							message: `Document ${index}: ${error.message}`,
							cause: error,
						});
					}
					const parsed: unknown = document.toJS();
					return readPlain(parsed, schema, YAML_RULES);
				},
			),
	};
};
