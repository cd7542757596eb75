/**
 * The conversion engine: typed value <-> intermediate value, and the
 * intermediate value <-> bytes pipeline built on top of it.
 *
 * Everything here reads one registration snapshot; nothing mutates it
 * except the memo caches it owns.
 */

import { Effect, Option, ParseResult, Schema } from "effect";
import { resolveSchema } from "../descriptors/resolver.js";
import {
	type TypeDescriptor,
	collectDefinitions,
} from "../descriptors/type-descriptor.js";
import {
	type ConversionError,
	SchemaError,
	SchemaMismatchError,
	type UnsupportedTypeError,
} from "../errors/conversion-errors.js";
import type { UnsupportedFormatError } from "../errors/codec-errors.js";
import { runChained, runFirstSuccess } from "../hooks/hook-runner.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import { lookupConverter } from "../registry/converter-registry.js";
import {
	type ConverterContext,
	ROOT_PATH,
	appendPath,
} from "../registry/converter-types.js";
import {
	type RegistrationTable,
	resolverEnv,
} from "../registry/registration-table.js";
import { deriveSchema } from "../schema/schema-deriver.js";
import type { Schema as DerivedSchema } from "../schema/schema-types.js";
import {
	type FormatCodec,
	findCodec,
	unsupportedFormat,
} from "../serializers/format-codec.js";

// ============================================================================
// Typed <-> Intermediate
// ============================================================================

export interface Engine {
	readonly toIntermediate: (
		value: unknown,
		descriptor: TypeDescriptor,
		path: string,
	) => Effect.Effect<IntermediateValue, ConversionError>;
	readonly fromIntermediate: (
		value: IntermediateValue,
		descriptor: TypeDescriptor,
		path: string,
	) => Effect.Effect<unknown, ConversionError>;
}

/**
 * Builds the recursive converter driver for values of `root`. `Ref`
 * descriptors inside `root` resolve against the named records it contains.
 *
 * Per node: typed -> converter -> `toIntermediate` hooks, and
 * intermediate -> `fromIntermediate` hooks -> converter.
 */
export const makeEngine = (
	table: RegistrationTable,
	root: TypeDescriptor,
): Engine => {
	const definitions = collectDefinitions(root);

	const contextFor = (descriptor: TypeDescriptor, path: string): ConverterContext => ({
		descriptor,
		path,
		toIntermediate: (value, nested, segment) =>
			toIntermediate(value, nested, appendPath(path, segment)),
		fromIntermediate: (value, nested, segment) =>
			fromIntermediate(value, nested, appendPath(path, segment)),
		resolveRef: (name) => Option.fromNullable(definitions.get(name)),
	});

	const toIntermediate: Engine["toIntermediate"] = (value, descriptor, path) =>
		Effect.gen(function* () {
			const entry = yield* lookupConverter(table.converters, descriptor, path);
			const produced = yield* entry.converter.toIntermediate(
				value,
				contextFor(descriptor, path),
			);
			return yield* runChained(table.hooks.toIntermediate, produced, (hook, current) =>
				hook(current, { descriptor, path, input: value }),
			);
		});

	const fromIntermediate: Engine["fromIntermediate"] = (value, descriptor, path) =>
		Effect.gen(function* () {
			const prepared = yield* runChained(
				table.hooks.fromIntermediate,
				value,
				(hook, current) => hook(current, { descriptor, path }),
			);
			const entry = yield* lookupConverter(table.converters, descriptor, path);
			return yield* entry.converter.fromIntermediate(
				prepared,
				contextFor(descriptor, path),
			);
		});

	return { toIntermediate, fromIntermediate };
};

// ============================================================================
// Resolution and Schemas
// ============================================================================

export const resolveWith = <A, I>(
	table: RegistrationTable,
	schema: Schema.Schema<A, I, never>,
): Effect.Effect<TypeDescriptor, UnsupportedTypeError> =>
	resolveSchema(schema, resolverEnv(table));

export const deriveWith = (
	table: RegistrationTable,
	descriptor: TypeDescriptor,
): Effect.Effect<DerivedSchema, SchemaError> => {
	const engine = makeEngine(table, descriptor);
	return deriveSchema(descriptor, {
		hooks: table.hooks.deriveSchema,
		convertDefault: engine.toIntermediate,
		cache: table.schemaCache,
	});
};

/**
 * Checks a converted value against the declaration, so refinements
 * (`Schema.Int`, `Schema.positive()`, ...) hold for everything `load`
 * returns.
 */
export const validateTyped = <A, I>(
	schema: Schema.Schema<A, I, never>,
	value: unknown,
): Effect.Effect<A, SchemaMismatchError> =>
	Schema.validate(schema)(value).pipe(
		Effect.mapError(
			(error) =>
				new SchemaMismatchError({
					path: ROOT_PATH,
					expected: String(schema.ast),
					received: "a value failing validation",
					message: ParseResult.TreeFormatter.formatErrorSync(error),
				}),
		),
	);

// ============================================================================
// Codecs
// ============================================================================

/**
 * `selectCodec` hooks first, then the codec table by name, then by extension.
 */
export const selectCodec = (
	table: RegistrationTable,
	format: string,
): Effect.Effect<FormatCodec, UnsupportedFormatError> =>
	Effect.gen(function* () {
		const claimed = yield* runFirstSuccess(table.hooks.selectCodec, (hook) =>
			hook(format),
		);
		const codec = Option.orElse(claimed, () => findCodec(table.codecs, format));
		if (Option.isSome(codec)) {
			return codec.value;
		}
		return yield* Effect.fail(unsupportedFormat(table.codecs, format));
	});

/**
 * The schema a codec gets. A codec that works without one still gets it
 * when it can be derived; when it cannot (e.g. a nominal type without a
 * schema fragment) the codec runs schemaless.
 */
export const schemaForCodec = (
	table: RegistrationTable,
	codec: FormatCodec,
	descriptor: TypeDescriptor,
): Effect.Effect<DerivedSchema | undefined, SchemaError> => {
	const derived = deriveWith(table, descriptor);
	if (codec.requiresSchema) {
		return derived;
	}
	return derived.pipe(
		Effect.catchTag("SchemaError", (error) =>
			Effect.logDebug(
				`Codec '${codec.name}' runs without a schema: ${error.message}`,
			).pipe(Effect.as(undefined)),
		),
	);
};
