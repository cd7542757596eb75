import { Data } from "effect";

// ============================================================================
// Effect TaggedError Conversion Error Types
// ============================================================================

/**
 * A type declaration uses a construct the engine cannot represent at all.
 */
export class UnsupportedTypeError extends Data.TaggedError(
	"UnsupportedTypeError",
)<{
	readonly type: string;
	readonly reason: string;
	readonly message: string;
}> {}

/**
 * The type is representable but no converter applies to its descriptor.
 */
export class NoConverterError extends Data.TaggedError("NoConverterError")<{
	readonly descriptor: string;
	readonly path: string;
	readonly message: string;
}> {}

/**
 * More than one converter matches a descriptor at the same specificity.
 */
export class AmbiguousConverterError extends Data.TaggedError(
	"AmbiguousConverterError",
)<{
	readonly descriptor: string;
	readonly candidates: ReadonlyArray<string>;
	readonly specificity: number;
	readonly message: string;
}> {}

export class SchemaError extends Data.TaggedError("SchemaError")<{
	readonly descriptor: string;
	readonly message: string;
}> {}

/**
 * A value does not have the shape its declared type requires.
 * Raised while converting in either direction, and by codecs when decoded
 * data cannot be coerced into the schema.
 */
export class SchemaMismatchError extends Data.TaggedError(
	"SchemaMismatchError",
)<{
	readonly path: string;
	readonly expected: string;
	readonly received: string;
	readonly message: string;
}> {}

/**
 * A numeric value exceeds the range a target can represent.
 */
export class NumericRangeError extends Data.TaggedError("NumericRangeError")<{
	readonly path: string;
	readonly value: string;
	readonly target: string;
	readonly message: string;
}> {}

// ============================================================================
// Conversion Error Union
// ============================================================================

export type ConversionError =
	| NoConverterError
	| AmbiguousConverterError
	| SchemaMismatchError
	| NumericRangeError;
