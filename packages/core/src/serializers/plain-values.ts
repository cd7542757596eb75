/**
 * Conversion between intermediate values and the plain JS values a
 * parser/stringifier library works with (objects, arrays, numbers,
 * strings).
 *
 * Writing follows per-codec rules for the values a format cannot hold
 * natively. Reading without a schema takes values at face value; reading
 * with one coerces each value to its schema node, which is what restores
 * big integers written as text, special floats, base64 bytes and missing
 * fields that have defaults.
 *
 * Both directions throw; the codec compositor turns throws into Effects.
 */

import { Either, Encoding, Option } from "effect";
import { mismatch, outOfRange } from "../converters/converter-helpers.js";
import { DecodeError } from "../errors/codec-errors.js";
import { NumericRangeError, SchemaMismatchError } from "../errors/conversion-errors.js";
import {
	Intermediate,
	type IntermediateValue,
	type MappingEntry,
} from "../intermediate/intermediate-value.js";
import { ROOT_PATH, appendPath } from "../registry/converter-types.js";
import { rankByScore, scorePlain } from "../schema/schema-match.js";
import {
	type RecordNode,
	type Schema,
	type SchemaNode,
	dereference,
} from "../schema/schema-types.js";

// ============================================================================
// Rules
// ============================================================================

export interface PlainRules {
	/** Format name, for error messages */
	readonly format: string;
	/**
	 * How integers outside the safe JS number range are written:
	 * - "text": as decimal strings
	 * - "bigint": as bigint (the library writes them natively)
	 * - "int64": as bigint, failing beyond signed 64 bits
	 */
	readonly bigInt: "text" | "bigint" | "int64";
	/** Write NaN and ±Infinity as strings */
	readonly nonFiniteAsText: boolean;
	/** Write bytes as base64 strings */
	readonly bytesAsBase64: boolean;
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

const INTEGER_TEXT = /^-?\d+$/;

const SPECIAL_FLOATS: ReadonlyMap<string, number> = new Map([
	["NaN", Number.NaN],
	["Infinity", Number.POSITIVE_INFINITY],
	["-Infinity", Number.NEGATIVE_INFINITY],
	["-0", -0],
]);

export const checkInt64 = (value: bigint, path: string): bigint => {
	if (value < INT64_MIN || value > INT64_MAX) {
		throw outOfRange(path, value, "a signed 64-bit integer");
	}
	return value;
};

// ============================================================================
// Writing
// ============================================================================

const writeInt = (value: bigint, rules: PlainRules, path: string): unknown => {
	if (rules.bigInt === "bigint") {
		return value;
	}
	if (value >= SAFE_MIN && value <= SAFE_MAX) {
		return Number(value);
	}
	return rules.bigInt === "text" ? value.toString() : checkInt64(value, path);
};

const writeFloat = (value: number, rules: PlainRules): unknown => {
	if (Object.is(value, -0)) {
		return "-0";
	}
	if (!Number.isFinite(value) && rules.nonFiniteAsText) {
		return String(value);
	}
	return value;
};

export const toPlain = (
	value: IntermediateValue,
	rules: PlainRules,
	path: string = ROOT_PATH,
): unknown => {
	switch (value._tag) {
		case "Null":
			return null;
		case "Boolean":
		case "Text":
			return value.value;
		case "Int":
			return writeInt(value.value, rules, path);
		case "Float":
			return writeFloat(value.value, rules);
		case "Bytes":
			return rules.bytesAsBase64 ? Encoding.encodeBase64(value.value) : value.value;
		case "Sequence":
			return value.items.map((item, index) =>
				toPlain(item, rules, appendPath(path, index)),
			);
		case "Mapping":
			return Object.fromEntries(
				value.entries.map(([key, item]) => [
					key,
					toPlain(item, rules, appendPath(path, key)),
				]),
			);
	}
};

// ============================================================================
// Reading without a schema
// ============================================================================

const plainEntries = (value: object): ReadonlyArray<readonly [string, unknown]> =>
	value instanceof Map
		? [...value].map(([key, item]): readonly [string, unknown] => [String(key), item])
		: Object.entries(value);

export const fromPlainUntyped = (
	value: unknown,
	rules: PlainRules,
	path: string = ROOT_PATH,
): IntermediateValue => {
	if (value === null || value === undefined) {
		return Intermediate.null();
	}
	switch (typeof value) {
		case "boolean":
			return Intermediate.boolean(value);
		case "bigint":
			return Intermediate.int(value);
		case "number":
			return Number.isInteger(value) && !Object.is(value, -0)
				? Intermediate.int(value)
				: Intermediate.float(value);
		case "string":
			return Intermediate.text(value);
		default:
			break;
	}
	if (value instanceof Uint8Array) {
		return Intermediate.bytes(Uint8Array.from(value));
	}
	if (Array.isArray(value)) {
		return Intermediate.sequence(
			value.map((item: unknown, index) =>
				fromPlainUntyped(item, rules, appendPath(path, index)),
			),
		);
	}
	if (typeof value === "object") {
		return Intermediate.mapping(
			plainEntries(value).map(
				([key, item]): MappingEntry => [
					key,
					fromPlainUntyped(item, rules, appendPath(path, key)),
				],
			),
		);
	}
	throw new DecodeError({
		format: rules.format,
		message: `Unexpected ${typeof value} value at ${path}`,
	});
};

// ============================================================================
// Reading with a schema
// ============================================================================

const received = (value: unknown): string => {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	if (value instanceof Uint8Array) return "bytes";
	return typeof value;
};

const readInt = (value: unknown, path: string): IntermediateValue => {
	if (typeof value === "bigint") {
		return Intermediate.int(value);
	}
	if (typeof value === "number" && Number.isInteger(value) && !Object.is(value, -0)) {
		return Intermediate.int(value);
	}
	if (typeof value === "string" && INTEGER_TEXT.test(value)) {
		return Intermediate.int(BigInt(value));
	}
	throw mismatch(path, "int", received(value));
};

const readFloat = (value: unknown, path: string): IntermediateValue => {
	if (typeof value === "number") {
		return Intermediate.float(value);
	}
	if (typeof value === "bigint") {
		return Intermediate.float(Number(value));
	}
	if (typeof value === "string") {
		const special = SPECIAL_FLOATS.get(value);
		if (special !== undefined) {
			return Intermediate.float(special);
		}
	}
	throw mismatch(path, "float", received(value));
};

const readBytes = (value: unknown, path: string): IntermediateValue => {
	if (value instanceof Uint8Array) {
		return Intermediate.bytes(Uint8Array.from(value));
	}
	if (typeof value === "string") {
		const decoded = Encoding.decodeBase64(value);
		if (Either.isRight(decoded)) {
			return Intermediate.bytes(decoded.right);
		}
	}
	throw mismatch(path, "base64 bytes", received(value));
};

const readRecord = (
	value: unknown,
	node: RecordNode,
	schema: Schema,
	rules: PlainRules,
	path: string,
): IntermediateValue => {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		throw mismatch(path, node.name ?? "record", received(value));
	}
	const source = new Map(plainEntries(value));
	const entries: Array<MappingEntry> = [];
	for (const field of node.fields) {
		const raw = source.get(field.name);
		source.delete(field.name);
		if (raw === undefined) {
			if (Option.isSome(field.default)) {
				entries.push([field.name, field.default.value]);
			}
			continue;
		}
		entries.push([
			field.name,
			fromPlain(raw, field.node, schema, rules, appendPath(path, field.name)),
		]);
	}
	// keys the schema does not know are kept as they are
	for (const [key, raw] of source) {
		entries.push([key, fromPlainUntyped(raw, rules, appendPath(path, key))]);
	}
	return Intermediate.mapping(entries);
};

const readUnion = (
	value: unknown,
	branches: ReadonlyArray<SchemaNode>,
	schema: Schema,
	rules: PlainRules,
	path: string,
): IntermediateValue => {
	const order = rankByScore(branches, (branch) => scorePlain(value, branch, schema));
	for (const index of order) {
		try {
			return fromPlain(value, branches[index], schema, rules, path);
		} catch (error) {
			if (
				!(error instanceof SchemaMismatchError) &&
				!(error instanceof NumericRangeError)
			) {
				throw error;
			}
		}
	}
	throw mismatch(path, "a union branch", received(value));
};

/**
 * Reads a parsed value against a schema node.
 */
export const fromPlain = (
	value: unknown,
	target: SchemaNode,
	schema: Schema,
	rules: PlainRules,
	path: string = ROOT_PATH,
): IntermediateValue => {
	const node = dereference(schema, target);

	if ((value === null || value === undefined) && node.kind !== "union") {
		if (node.nullable || node.kind === "null") {
			return Intermediate.null();
		}
		throw mismatch(path, node.kind, "null");
	}

	switch (node.kind) {
		case "null":
			throw mismatch(path, "null", received(value));
		case "boolean":
			if (typeof value === "boolean") {
				return Intermediate.boolean(value);
			}
			throw mismatch(path, "boolean", received(value));
		case "int":
			return readInt(value, path);
		case "float":
			return readFloat(value, path);
		case "text":
			if (typeof value === "string") {
				return Intermediate.text(value);
			}
			throw mismatch(path, "text", received(value));
		case "bytes":
			return readBytes(value, path);
		case "enum":
			if (typeof value === "string" && node.symbols.includes(value)) {
				return Intermediate.text(value);
			}
			throw mismatch(path, `one of ${node.symbols.join(", ")}`, received(value));
		case "sequence":
			if (Array.isArray(value)) {
				return Intermediate.sequence(
					value.map((item: unknown, index) =>
						fromPlain(item, node.items, schema, rules, appendPath(path, index)),
					),
				);
			}
			throw mismatch(path, "sequence", received(value));
		case "tuple":
			if (Array.isArray(value) && value.length === node.elements.length) {
				return Intermediate.sequence(
					node.elements.map((element, index) =>
						fromPlain(value[index], element, schema, rules, appendPath(path, index)),
					),
				);
			}
			throw mismatch(path, `tuple of ${node.elements.length}`, received(value));
		case "mapping":
			if (typeof value === "object" && value !== null && !Array.isArray(value)) {
				return Intermediate.mapping(
					plainEntries(value).map(
						([key, item]): MappingEntry => [
							key,
							fromPlain(item, node.values, schema, rules, appendPath(path, key)),
						],
					),
				);
			}
			throw mismatch(path, "mapping", received(value));
		case "record":
			return readRecord(value, node, schema, rules, path);
		case "union":
			if ((value === null || value === undefined) && node.nullable) {
				return Intermediate.null();
			}
			return readUnion(value, node.branches, schema, rules, path);
		case "ref":
			throw mismatch(path, `definition '${node.name}'`, "unknown reference");
	}
};

/**
 * Reads a parsed value, against the schema root when there is a schema.
 */
export const readPlain = (
	value: unknown,
	schema: Schema | undefined,
	rules: PlainRules,
): IntermediateValue =>
	schema === undefined
		? fromPlainUntyped(value, rules)
		: fromPlain(value, schema.root, schema, rules);
