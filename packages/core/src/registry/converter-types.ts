import type { Effect, Option } from "effect";
import type { TypeDescriptor } from "../descriptors/type-descriptor.js";
import type { ConversionError } from "../errors/conversion-errors.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";

// ============================================================================
// Converter Interface
// ============================================================================

export type PathSegment = string | number;

/**
 * Everything a converter needs besides the value: the concrete descriptor it
 * was selected for, the location of the value, and recursion back into the
 * engine for nested values.
 */
export interface ConverterContext {
	readonly descriptor: TypeDescriptor;
	/** Location of the value, e.g. `$.crew[0].name` */
	readonly path: string;
	/**
	 * Converts a nested value. `segment` extends the path; omit it when the
	 * nested value sits at the same location (e.g. the inner type of an
	 * optional).
	 */
	readonly toIntermediate: (
		value: unknown,
		descriptor: TypeDescriptor,
		segment?: PathSegment,
	) => Effect.Effect<IntermediateValue, ConversionError>;
	readonly fromIntermediate: (
		value: IntermediateValue,
		descriptor: TypeDescriptor,
		segment?: PathSegment,
	) => Effect.Effect<unknown, ConversionError>;
	/**
	 * The named record enclosing this value that a `Ref` descriptor points to.
	 */
	readonly resolveRef: (name: string) => Option.Option<TypeDescriptor>;
}

/**
 * A pair of functions translating one kind of typed value to and from the
 * intermediate model.
 */
export interface Converter {
	readonly toIntermediate: (
		value: unknown,
		ctx: ConverterContext,
	) => Effect.Effect<IntermediateValue, ConversionError>;
	readonly fromIntermediate: (
		value: IntermediateValue,
		ctx: ConverterContext,
	) => Effect.Effect<unknown, ConversionError>;
}

/**
 * Appends a segment to a value path.
 */
export const appendPath = (path: string, segment?: PathSegment): string => {
	if (segment === undefined) {
		return path;
	}
	if (typeof segment === "number") {
		return `${path}[${segment}]`;
	}
	return /^[A-Za-z_$][\w$]*$/.test(segment)
		? `${path}.${segment}`
		: `${path}[${JSON.stringify(segment)}]`;
};

export const ROOT_PATH = "$";
