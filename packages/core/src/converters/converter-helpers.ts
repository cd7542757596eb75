import { Effect } from "effect";
import {
	NumericRangeError,
	SchemaMismatchError,
} from "../errors/conversion-errors.js";
import {
	type IntermediateValue,
	describe,
} from "../intermediate/intermediate-value.js";
import type { Converter } from "../registry/converter-types.js";

// ============================================================================
// Value Descriptions
// ============================================================================

/**
 * A short label for a typed value, for mismatch messages.
 */
export const describeTyped = (value: unknown): string => {
	if (value === null) return "null";
	if (Array.isArray(value)) return `array(${value.length})`;
	if (value instanceof Uint8Array) return `Uint8Array(${value.length})`;
	if (value instanceof Date) return "Date";
	if (typeof value === "object") {
		const name: unknown = value.constructor?.name;
		return typeof name === "string" && name !== "" && name !== "Object"
			? name
			: "object";
	}
	if (typeof value === "string") {
		return value.length > 32
			? `string ${JSON.stringify(value.slice(0, 32))}...`
			: `string ${JSON.stringify(value)}`;
	}
	if (typeof value === "bigint") return `bigint ${value.toString()}n`;
	if (typeof value === "number" || typeof value === "boolean") {
		return `${typeof value} ${String(value)}`;
	}
	return typeof value;
};

/**
 * Objects usable as records or mappings: no arrays, bytes, dates or
 * collections.
 */
export const isPlainRecord = (
	value: unknown,
): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" &&
	value !== null &&
	!Array.isArray(value) &&
	!(value instanceof Uint8Array) &&
	!(value instanceof Date) &&
	!(value instanceof Map) &&
	!(value instanceof Set);

// ============================================================================
// Errors
// ============================================================================

export const mismatch = (
	path: string,
	expected: string,
	received: string,
): SchemaMismatchError =>
	new SchemaMismatchError({
		path,
		expected,
		received,
		message: `Expected ${expected} at ${path}, received ${received}`,
	});

export const mismatchTyped = (
	path: string,
	expected: string,
	value: unknown,
): Effect.Effect<never, SchemaMismatchError> =>
	Effect.fail(mismatch(path, expected, describeTyped(value)));

export const mismatchIntermediate = (
	path: string,
	expected: string,
	value: IntermediateValue,
): Effect.Effect<never, SchemaMismatchError> =>
	Effect.fail(mismatch(path, expected, describe(value)));

export const outOfRange = (
	path: string,
	value: bigint | number,
	target: string,
): NumericRangeError =>
	new NumericRangeError({
		path,
		value: value.toString(),
		target,
		message: `Value ${value.toString()} at ${path} does not fit ${target}`,
	});

/**
 * Narrows an intermediate `Int` to a JS number, failing when the
 * conversion would lose precision.
 */
export const intToNumber = (
	value: bigint,
	path: string,
): Effect.Effect<number, NumericRangeError> => {
	const converted = Number(value);
	return BigInt(converted) === value
		? Effect.succeed(converted)
		: Effect.fail(outOfRange(path, value, "a JavaScript number"));
};

// ============================================================================
// Converter Builder
// ============================================================================

/**
 * Identity helper so converter literals are checked against `Converter`
 * where they are written.
 */
export const makeConverter = (converter: Converter): Converter => converter;
