import { Context, type Effect, type Schema } from "effect";
import type { TypeDescriptor } from "../descriptors/type-descriptor.js";
import type {
	AmbiguousConverterError,
	ConversionError,
	NoConverterError,
	SchemaError,
	UnsupportedTypeError,
} from "../errors/conversion-errors.js";
import type { DumpError, LoadError } from "../errors/index.js";
import type { PluginError } from "../errors/plugin-errors.js";
import type { AnyHookRegistration } from "../hooks/hook-types.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import type { AdapterPlugin, ConverterTarget } from "../plugins/plugin-types.js";
import type {
	ConverterEntry,
	RegisterConverterOptions,
} from "../registry/converter-registry.js";
import type { Converter } from "../registry/converter-types.js";
import type { Schema as DerivedSchema } from "../schema/schema-types.js";
import type { FormatCodec } from "../serializers/format-codec.js";

// ============================================================================
// TypeAdapter Effect Service
// ============================================================================

export interface FormatInfo {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly requiresSchema: boolean;
}

export interface TypeAdapterShape {
	/**
	 * Serializes `value`, declared by `schema`, to `format` (a codec name or
	 * extension; the configured default format when omitted).
	 */
	readonly dump: <A, I>(
		schema: Schema.Schema<A, I, never>,
		value: A,
		format?: string,
	) => Effect.Effect<Uint8Array, DumpError>;
	/**
	 * Deserializes bytes into a value of `schema`. The result is checked
	 * against the declaration, refinements included.
	 */
	readonly load: <A, I>(
		schema: Schema.Schema<A, I, never>,
		bytes: Uint8Array,
		format?: string,
	) => Effect.Effect<A, LoadError>;
	readonly dumpMany: <A, I>(
		schema: Schema.Schema<A, I, never>,
		values: ReadonlyArray<A>,
		format?: string,
	) => Effect.Effect<Uint8Array, DumpError>;
	readonly loadMany: <A, I>(
		schema: Schema.Schema<A, I, never>,
		bytes: Uint8Array,
		format?: string,
	) => Effect.Effect<ReadonlyArray<A>, LoadError>;
	readonly toIntermediate: <A, I>(
		schema: Schema.Schema<A, I, never>,
		value: A,
	) => Effect.Effect<IntermediateValue, UnsupportedTypeError | ConversionError>;
	readonly fromIntermediate: <A, I>(
		schema: Schema.Schema<A, I, never>,
		value: IntermediateValue,
	) => Effect.Effect<A, UnsupportedTypeError | ConversionError>;
	readonly resolve: <A, I>(
		schema: Schema.Schema<A, I, never>,
	) => Effect.Effect<TypeDescriptor, UnsupportedTypeError>;
	readonly deriveSchema: <A, I>(
		schema: Schema.Schema<A, I, never>,
	) => Effect.Effect<DerivedSchema, UnsupportedTypeError | SchemaError>;
	readonly lookup: (
		descriptor: TypeDescriptor,
	) => Effect.Effect<ConverterEntry, NoConverterError | AmbiguousConverterError>;
	readonly registerConverter: (
		target: ConverterTarget,
		converter: Converter,
		options?: RegisterConverterOptions,
	) => Effect.Effect<ConverterEntry, AmbiguousConverterError | UnsupportedTypeError>;
	readonly registerHook: (registration: AnyHookRegistration) => Effect.Effect<void>;
	readonly registerCodec: (
		codec: FormatCodec,
		options?: { readonly replace?: boolean },
	) => Effect.Effect<void, PluginError>;
	/** Validates and installs one or more plugins, all or nothing */
	readonly use: (
		plugin: AdapterPlugin | ReadonlyArray<AdapterPlugin>,
	) => Effect.Effect<void, PluginError | AmbiguousConverterError | UnsupportedTypeError>;
	readonly formats: () => Effect.Effect<ReadonlyArray<FormatInfo>>;
	readonly converters: () => Effect.Effect<ReadonlyArray<ConverterEntry>>;
	readonly plugins: () => Effect.Effect<ReadonlyArray<string>>;
}

export class TypeAdapter extends Context.Tag("TypeAdapter")<
	TypeAdapter,
	TypeAdapterShape
>() {}
