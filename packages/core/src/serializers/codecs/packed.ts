import { Option } from "effect";
import { Packr } from "msgpackr";
import { mismatch } from "../../converters/converter-helpers.js";
import { DecodeError, EncodeError } from "../../errors/codec-errors.js";
import { NumericRangeError, SchemaMismatchError } from "../../errors/conversion-errors.js";
import {
	Intermediate,
	type IntermediateValue,
	type MappingEntry,
	describe,
	getEntry,
} from "../../intermediate/intermediate-value.js";
import { ROOT_PATH, appendPath } from "../../registry/converter-types.js";
import { rankByScore, scoreIntermediate } from "../../schema/schema-match.js";
import {
	type RecordNode,
	type Schema,
	type SchemaNode,
	dereference,
} from "../../schema/schema-types.js";
import { concatBytes } from "../bytes.js";
import type { FormatCodec } from "../format-codec.js";
import { checkInt64 } from "../plain-values.js";

const FLOAT_WIDTH = 8;

const isRecoverable = (error: unknown): boolean =>
	error instanceof SchemaMismatchError || error instanceof NumericRangeError;

const requireSchema = (
	schema: Schema | undefined,
	Failure: typeof EncodeError | typeof DecodeError,
): Schema => {
	if (schema === undefined) {
		throw new Failure({
			format: "packed",
			message: "The packed format needs a schema",
		});
	}
	return schema;
};

const received = (value: unknown): string => {
	if (value === null) return "null";
	if (value === undefined) return "nothing";
	if (Array.isArray(value)) return "array";
	if (value instanceof Uint8Array) return `bytes[${value.length}]`;
	return typeof value;
};

// ============================================================================
// Floats: 8-byte big-endian IEEE-754
// ============================================================================

const writeFloat64 = (value: number): Uint8Array => {
	const out = new Uint8Array(FLOAT_WIDTH);
	new DataView(out.buffer).setFloat64(0, value);
	return out;
};

const readFloat64 = (bytes: Uint8Array): number =>
	new DataView(bytes.buffer, bytes.byteOffset, FLOAT_WIDTH).getFloat64(0);

// ============================================================================
// Encoding
// ============================================================================

const packRecord = (
	value: IntermediateValue,
	node: RecordNode,
	schema: Schema,
	path: string,
): Array<unknown> => {
	if (value._tag !== "Mapping") {
		throw mismatch(path, node.name ?? "record", describe(value));
	}
	const mapping = value;
	const row = node.fields.map((field) => {
		const item = getEntry(mapping, field.name);
		return item === undefined
			? undefined
			: packValue(item, field.node, schema, appendPath(path, field.name));
	});
	while (row.length > 0 && row[row.length - 1] === undefined) {
		row.pop();
	}
	return row;
};

const packUnion = (
	value: IntermediateValue,
	branches: ReadonlyArray<SchemaNode>,
	schema: Schema,
	path: string,
): unknown => {
	const order = rankByScore(branches, (branch) => scoreIntermediate(value, branch, schema));
	for (const index of order) {
		try {
			return [index, packValue(value, branches[index], schema, path)];
		} catch (error) {
			if (!isRecoverable(error)) {
				throw error;
			}
		}
	}
	throw mismatch(path, "a union branch", describe(value));
};

const packValue = (
	value: IntermediateValue,
	target: SchemaNode,
	schema: Schema,
	path: string,
): unknown => {
	const node = dereference(schema, target);
	if (value._tag === "Null" && (node.nullable || node.kind === "null")) {
		return null;
	}
	switch (node.kind) {
		case "boolean":
			if (value._tag === "Boolean") return value.value;
			break;
		case "int":
			if (value._tag === "Int") {
				const int = checkInt64(value.value, path);
				return int >= BigInt(Number.MIN_SAFE_INTEGER) &&
					int <= BigInt(Number.MAX_SAFE_INTEGER)
					? Number(int)
					: int;
			}
			break;
		case "float":
			if (value._tag === "Float") return writeFloat64(value.value);
			if (value._tag === "Int") return writeFloat64(Number(value.value));
			break;
		case "text":
			if (value._tag === "Text") return value.value;
			break;
		case "bytes":
			if (value._tag === "Bytes") return value.value;
			break;
		case "enum": {
			const index = value._tag === "Text" ? node.symbols.indexOf(value.value) : -1;
			if (index >= 0) return index;
			throw mismatch(path, `one of ${node.symbols.join(", ")}`, describe(value));
		}
		case "sequence":
			if (value._tag === "Sequence") {
				return value.items.map((item, index) =>
					packValue(item, node.items, schema, appendPath(path, index)),
				);
			}
			break;
		case "tuple":
			if (value._tag === "Sequence" && value.items.length === node.elements.length) {
				const items = value.items;
				return node.elements.map((element, index) =>
					packValue(items[index], element, schema, appendPath(path, index)),
				);
			}
			break;
		case "mapping":
			if (value._tag === "Mapping") {
				return Object.fromEntries(
					value.entries.map(([key, item]) => [
						key,
						packValue(item, node.values, schema, appendPath(path, key)),
					]),
				);
			}
			break;
		case "record":
			return packRecord(value, node, schema, path);
		case "union":
			return packUnion(value, node.branches, schema, path);
		case "null":
		case "ref":
			break;
	}
	throw mismatch(path, node.kind, describe(value));
};

// ============================================================================
// Decoding
// ============================================================================

const unpackRecord = (
	value: unknown,
	node: RecordNode,
	schema: Schema,
	path: string,
): IntermediateValue => {
	if (!Array.isArray(value)) {
		throw mismatch(path, node.name ?? "record", received(value));
	}
	const row: ReadonlyArray<unknown> = value;
	const entries: Array<MappingEntry> = [];
	node.fields.forEach((field, index) => {
		const raw = row[index];
		const fieldPath = appendPath(path, field.name);
		if (raw !== undefined) {
			entries.push([field.name, unpackValue(raw, field.node, schema, fieldPath)]);
		} else if (Option.isSome(field.default)) {
			entries.push([field.name, field.default.value]);
		} else if (field.optional) {
			// absent stays absent
		} else if (dereference(schema, field.node).nullable) {
			entries.push([field.name, Intermediate.null()]);
		} else {
			throw mismatch(fieldPath, field.node.kind, "nothing");
		}
	});
	return Intermediate.mapping(entries);
};

const unpackUnion = (
	value: unknown,
	branches: ReadonlyArray<SchemaNode>,
	schema: Schema,
	path: string,
): IntermediateValue => {
	if (Array.isArray(value) && value.length === 2) {
		const [index, item]: ReadonlyArray<unknown> = value;
		if (typeof index === "number" && Number.isInteger(index)) {
			const branch = branches[index];
			if (branch !== undefined) {
				return unpackValue(item, branch, schema, path);
			}
		}
	}
	throw mismatch(path, "[branch, value] pair", received(value));
};

const unpackValue = (
	value: unknown,
	target: SchemaNode,
	schema: Schema,
	path: string,
): IntermediateValue => {
	const node = dereference(schema, target);
	if (value === null || value === undefined) {
		if (node.nullable || node.kind === "null") {
			return Intermediate.null();
		}
		throw mismatch(path, node.kind, received(value));
	}
	switch (node.kind) {
		case "boolean":
			if (typeof value === "boolean") return Intermediate.boolean(value);
			break;
		case "int":
			if (typeof value === "bigint") return Intermediate.int(value);
			if (typeof value === "number" && Number.isInteger(value)) {
				return Intermediate.int(value);
			}
			break;
		case "float":
			if (value instanceof Uint8Array && value.length === FLOAT_WIDTH) {
				return Intermediate.float(readFloat64(value));
			}
			break;
		case "text":
			if (typeof value === "string") return Intermediate.text(value);
			break;
		case "bytes":
			if (value instanceof Uint8Array) return Intermediate.bytes(Uint8Array.from(value));
			break;
		case "enum": {
			const symbol = typeof value === "number" ? node.symbols[value] : undefined;
			if (symbol !== undefined) return Intermediate.text(symbol);
			throw mismatch(path, `index below ${node.symbols.length}`, received(value));
		}
		case "sequence":
			if (Array.isArray(value)) {
				return Intermediate.sequence(
					value.map((item: unknown, index) =>
						unpackValue(item, node.items, schema, appendPath(path, index)),
					),
				);
			}
			break;
		case "tuple":
			if (Array.isArray(value) && value.length === node.elements.length) {
				const items: ReadonlyArray<unknown> = value;
				return Intermediate.sequence(
					node.elements.map((element, index) =>
						unpackValue(items[index], element, schema, appendPath(path, index)),
					),
				);
			}
			break;
		case "mapping":
			if (typeof value === "object" && !Array.isArray(value) && !(value instanceof Uint8Array)) {
				return Intermediate.mapping(
					Object.entries(value).map(
						([key, item]): MappingEntry => [
							key,
							unpackValue(item, node.values, schema, appendPath(path, key)),
						],
					),
				);
			}
			break;
		case "record":
			return unpackRecord(value, node, schema, path);
		case "union":
			return unpackUnion(value, node.branches, schema, path);
		case "null":
		case "ref":
			break;
	}
	throw mismatch(path, node.kind, received(value));
};

// ============================================================================
// Codec
// ============================================================================

/**
 * Creates the packed codec: a compact schema-driven binary layout on top of
 * MessagePack.
 *
 * Records are positional arrays in schema field order with trailing absent
 * fields dropped, enums are symbol indexes, unions are `[branch, value]`
 * pairs and floats are 8-byte big-endian blobs. Bytes written by an older
 * schema decode under a newer one that appends fields with defaults.
 * Mapping keys the record schema does not declare are not written.
 *
 * @example
 * ```typescript
 * const codec = packedCodec()
 * const bytes = codec.encode(value, schema)
 * ```
 */
export const packedCodec = (): FormatCodec => {
	const packr = new Packr({
		useRecords: false,
		mapsAsObjects: true,
		useBigInt64: true,
	});

	const encodeOne = (value: IntermediateValue, schema: Schema): Uint8Array =>
		packr.pack(packValue(value, schema.root, schema, ROOT_PATH));

	return {
		name: "packed",
		extensions: ["packed"],
		requiresSchema: true,
		encode: (value, schema) => encodeOne(value, requireSchema(schema, EncodeError)),
		decode: (bytes, schema) => {
			const known = requireSchema(schema, DecodeError);
			const unpacked: unknown = packr.unpack(bytes);
			return unpackValue(unpacked, known.root, known, ROOT_PATH);
		},
		encodeMany: (values, schema) => {
			const known = requireSchema(schema, EncodeError);
			return concatBytes(values.map((value) => encodeOne(value, known)));
		},
		decodeMany: (bytes, schema) => {
			const known = requireSchema(schema, DecodeError);
			const unpacked: ReadonlyArray<unknown> = packr.unpackMultiple(bytes);
			return unpacked.map((item) => unpackValue(item, known.root, known, ROOT_PATH));
		},
	};
};
