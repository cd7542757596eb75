import { Effect, Option } from "effect";
import {
	DecodeError,
	EncodeError,
	UnsupportedFormatError,
} from "../errors/codec-errors.js";
import {
	NumericRangeError,
	SchemaMismatchError,
} from "../errors/conversion-errors.js";
import { PluginError } from "../errors/plugin-errors.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import type { Schema } from "../schema/schema-types.js";

// ============================================================================
// FormatCodec: minimal plugin point for wire formats
// ============================================================================

/**
 * A FormatCodec defines a wire format with:
 * - A name callers select it by (e.g., "json", "packed")
 * - File extensions without dots, accepted as aliases of the name
 * - Whether it cannot work without a schema
 * - Synchronous encode/decode functions that throw on failure
 *
 * A codec signals failures by throwing. `NumericRangeError`,
 * `SchemaMismatchError`, `DecodeError` and `EncodeError` thrown by a codec
 * reach the caller as they are; anything else is wrapped in `DecodeError`
 * or `EncodeError`.
 */
export interface FormatCodec {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly requiresSchema: boolean;
	readonly encode: (
		value: IntermediateValue,
		schema: Schema | undefined,
	) => Uint8Array;
	readonly decode: (
		bytes: Uint8Array,
		schema: Schema | undefined,
	) => IntermediateValue;
	readonly encodeMany?: (
		values: ReadonlyArray<IntermediateValue>,
		schema: Schema | undefined,
	) => Uint8Array;
	readonly decodeMany?: (
		bytes: Uint8Array,
		schema: Schema | undefined,
	) => ReadonlyArray<IntermediateValue>;
}

// ============================================================================
// Codec Table
// ============================================================================

export interface CodecTable {
	/** Codecs by name, in registration order */
	readonly byName: ReadonlyMap<string, FormatCodec>;
	/** Extension aliases; the latest registration owns an extension */
	readonly byExtension: ReadonlyMap<string, FormatCodec>;
}

export const emptyCodecTable: CodecTable = {
	byName: new Map<string, FormatCodec>(),
	byExtension: new Map<string, FormatCodec>(),
};

/**
 * Adds a codec to the table. A second codec with the same name is a
 * conflict unless `replace` is set.
 */
export const addCodec = (
	table: CodecTable,
	codec: FormatCodec,
	options: { readonly replace?: boolean; readonly plugin?: string } = {},
): Effect.Effect<CodecTable, PluginError> =>
	Effect.gen(function* () {
		const existing = table.byName.get(codec.name);
		if (existing !== undefined && options.replace !== true) {
			return yield* Effect.fail(
				new PluginError({
					plugin: options.plugin ?? "(registration)",
					reason: "codec_conflict",
					message: `Codec '${codec.name}' is already registered; pass replace to override it`,
				}),
			);
		}

		const byName = new Map(table.byName);
		byName.set(codec.name, codec);

		const byExtension = new Map(
			[...table.byExtension].filter(([, owner]) => owner !== existing),
		);
		for (const ext of codec.extensions) {
			const owner = byExtension.get(ext);
			if (owner !== undefined) {
				yield* Effect.logWarning(
					`Duplicate extension '.${ext}': '${owner.name}' overwritten by '${codec.name}'`,
				);
			}
			byExtension.set(ext, codec);
		}

		return { byName, byExtension };
	});

/**
 * Finds a codec by name, then by extension (with or without a leading dot).
 */
export const findCodec = (
	table: CodecTable,
	format: string,
): Option.Option<FormatCodec> =>
	Option.orElse(Option.fromNullable(table.byName.get(format)), () =>
		Option.fromNullable(table.byExtension.get(format.replace(/^\./, ""))),
	);

export const unsupportedFormat = (
	table: CodecTable,
	format: string,
): UnsupportedFormatError => {
	const available = [...table.byName.keys()].join(", ");
	return new UnsupportedFormatError({
		format,
		message:
			available.length > 0
				? `Unsupported format '${format}'. Available formats: ${available}`
				: `Unsupported format '${format}'. No formats registered.`,
	});
};

// ============================================================================
// Compositor: wraps the throwing codec functions in Effect.try
// ============================================================================

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : "Unknown error";

const passThroughOr = <E>(
	error: unknown,
	fallback: (error: unknown) => E,
): E | NumericRangeError | SchemaMismatchError => {
	if (error instanceof NumericRangeError || error instanceof SchemaMismatchError) {
		return error;
	}
	return fallback(error);
};

const toEncodeError = (codec: FormatCodec) => (error: unknown) =>
	passThroughOr(error, (cause) =>
		cause instanceof EncodeError
			? cause
			: new EncodeError({
					format: codec.name,
					message: `Failed to encode ${codec.name}: ${errorMessage(cause)}`,
					cause,
				}),
	);

const toDecodeError = (codec: FormatCodec) => (error: unknown) =>
	passThroughOr(error, (cause) =>
		cause instanceof DecodeError
			? cause
			: new DecodeError({
					format: codec.name,
					message: `Failed to decode ${codec.name}: ${errorMessage(cause)}`,
					cause,
				}),
	);

export type CodecEncodeError = EncodeError | NumericRangeError | SchemaMismatchError;
export type CodecDecodeError = DecodeError | NumericRangeError | SchemaMismatchError;

export const runEncode = (
	codec: FormatCodec,
	value: IntermediateValue,
	schema: Schema | undefined,
): Effect.Effect<Uint8Array, CodecEncodeError> =>
	Effect.try({
		try: () => codec.encode(value, schema),
		catch: toEncodeError(codec),
	});

export const runDecode = (
	codec: FormatCodec,
	bytes: Uint8Array,
	schema: Schema | undefined,
): Effect.Effect<IntermediateValue, CodecDecodeError> =>
	Effect.try({
		try: () => codec.decode(bytes, schema),
		catch: toDecodeError(codec),
	});

export const runEncodeMany = (
	codec: FormatCodec,
	values: ReadonlyArray<IntermediateValue>,
	schema: Schema | undefined,
): Effect.Effect<Uint8Array, CodecEncodeError> => {
	const encodeMany = codec.encodeMany;
	if (encodeMany === undefined) {
		return Effect.fail(
			new EncodeError({
				format: codec.name,
				message: `Codec '${codec.name}' cannot encode several values`,
			}),
		);
	}
	return Effect.try({
		try: () => encodeMany(values, schema),
		catch: toEncodeError(codec),
	});
};

export const runDecodeMany = (
	codec: FormatCodec,
	bytes: Uint8Array,
	schema: Schema | undefined,
): Effect.Effect<ReadonlyArray<IntermediateValue>, CodecDecodeError> => {
	const decodeMany = codec.decodeMany;
	if (decodeMany === undefined) {
		return Effect.fail(
			new DecodeError({
				format: codec.name,
				message: `Codec '${codec.name}' cannot decode several values`,
			}),
		);
	}
	return Effect.try({
		try: () => decodeMany(bytes, schema),
		catch: toDecodeError(codec),
	});
};
