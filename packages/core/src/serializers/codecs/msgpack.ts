import { Packr } from "msgpackr";
import { readPlain, toPlain, type PlainRules } from "../plain-values.js";
import { concatBytes } from "../bytes.js";
import type { FormatCodec } from "../format-codec.js";

const MSGPACK_RULES: PlainRules = {
	format: "msgpack",
	bigInt: "int64",
	nonFiniteAsText: false,
	bytesAsBase64: false,
};

/**
 * Creates a MessagePack codec.
 *
 * Bytes and special floats are native; integers must fit in a signed
 * 64-bit value. Several values are written back to back.
 *
 * @example
 * ```typescript
 * const codec = msgpackCodec()
 * const bytes = codec.encode(Intermediate.int(42), undefined)
 * ```
 */
export const msgpackCodec = (): FormatCodec => {
	const packr = new Packr({
		useRecords: false,
		mapsAsObjects: true,
		useBigInt64: true,
	});

	return {
		name: "msgpack",
		extensions: ["msgpack", "mp"],
		requiresSchema: false,
		encode: (value) => packr.pack(toPlain(value, MSGPACK_RULES)),
		decode: (bytes, schema) => {
			const unpacked: unknown = packr.unpack(bytes);
			return readPlain(unpacked, schema, MSGPACK_RULES);
		},
		encodeMany: (values) =>
			concatBytes(values.map((value) => packr.pack(toPlain(value, MSGPACK_RULES)))),
		decodeMany: (bytes, schema) => {
			const unpacked: ReadonlyArray<unknown> = packr.unpackMultiple(bytes);
			return unpacked.map((item) => readPlain(item, schema, MSGPACK_RULES));
		},
	};
};
