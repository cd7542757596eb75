import {
	type ConfigError,
	Effect,
	HashMap,
	Layer,
	Logger,
	type Schema,
	SynchronizedRef,
} from "effect";
import { builtinPlugin } from "../converters/builtin-plugin.js";
import type {
	AmbiguousConverterError,
	UnsupportedTypeError,
} from "../errors/conversion-errors.js";
import type { PluginError } from "../errors/plugin-errors.js";
import type { AdapterPlugin } from "../plugins/plugin-types.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import { lookupConverter, listConverters } from "../registry/converter-registry.js";
import { ROOT_PATH } from "../registry/converter-types.js";
import {
	type RegistrationTable,
	addCodecEntry,
	addConverter,
	addHook,
	emptyRegistrationTable,
	installPlugins,
} from "../registry/registration-table.js";
import {
	runDecode,
	runDecodeMany,
	runEncode,
	runEncodeMany,
} from "../serializers/format-codec.js";
import { codecsPlugin, defaultCodecs } from "../serializers/presets.js";
import { type AdapterOptions, resolveAdapterConfig } from "./adapter-config.js";
import { TypeAdapter, type TypeAdapterShape } from "./adapter-service.js";
import {
	deriveWith,
	makeEngine,
	resolveWith,
	schemaForCodec,
	selectCodec,
	validateTyped,
} from "./conversion.js";

export type AdapterLayerError =
	| ConfigError.ConfigError
	| PluginError
	| AmbiguousConverterError
	| UnsupportedTypeError;

// ============================================================================
// Service Construction
// ============================================================================

const isPluginList = (
	plugin: AdapterPlugin | ReadonlyArray<AdapterPlugin>,
): plugin is ReadonlyArray<AdapterPlugin> => Array.isArray(plugin);

/**
 * Builds the adapter around a registration snapshot. Reads take the current
 * snapshot; registrations compute the next one and swap it in, one at a
 * time.
 */
export const makeTypeAdapter = (
	initial: RegistrationTable,
	defaultFormat: string,
	options: Pick<AdapterOptions, "logLevel"> = {},
): Effect.Effect<TypeAdapterShape> =>
	Effect.gen(function* () {
		const state = yield* SynchronizedRef.make(initial);
		const current = SynchronizedRef.get(state);

		const withLogLevel = <A, E>(effect: Effect.Effect<A, E>): Effect.Effect<A, E> =>
			options.logLevel === undefined
				? effect
				: effect.pipe(Logger.withMinimumLogLevel(options.logLevel));

		const update = <A, E>(
			f: (table: RegistrationTable) => Effect.Effect<readonly [A, RegistrationTable], E>,
		): Effect.Effect<A, E> => withLogLevel(SynchronizedRef.modifyEffect(state, f));

		const prepare = <A, I>(schema: Schema.Schema<A, I, never>, format: string | undefined) =>
			Effect.gen(function* () {
				const table = yield* current;
				const descriptor = yield* resolveWith(table, schema);
				const codec = yield* selectCodec(table, format ?? defaultFormat);
				return {
					descriptor,
					codec,
					engine: makeEngine(table, descriptor),
					// dump runs this after conversion
					derive: schemaForCodec(table, codec, descriptor),
				};
			}).pipe(Effect.annotateLogs("format", format ?? defaultFormat));

		const loadOne = <A, I>(
			schema: Schema.Schema<A, I, never>,
			engine: ReturnType<typeof makeEngine>,
			descriptor: Parameters<ReturnType<typeof makeEngine>["fromIntermediate"]>[1],
			value: IntermediateValue,
			path: string,
		) =>
			Effect.flatMap(engine.fromIntermediate(value, descriptor, path), (typed) =>
				validateTyped(schema, typed),
			);

		const service: TypeAdapterShape = {
			dump: (schema, value, format) =>
				Effect.gen(function* () {
					const { descriptor, codec, engine, derive } = yield* prepare(schema, format);
					const intermediate = yield* engine.toIntermediate(value, descriptor, ROOT_PATH);
					return yield* runEncode(codec, intermediate, yield* derive);
				}),

			load: (schema, bytes, format) =>
				Effect.gen(function* () {
					const { descriptor, codec, engine, derive } = yield* prepare(schema, format);
					const intermediate = yield* runDecode(codec, bytes, yield* derive);
					return yield* loadOne(schema, engine, descriptor, intermediate, ROOT_PATH);
				}),

			dumpMany: (schema, values, format) =>
				Effect.gen(function* () {
					const { descriptor, codec, engine, derive } = yield* prepare(schema, format);
					const intermediates = yield* Effect.forEach(values, (value, index) =>
						engine.toIntermediate(value, descriptor, `${ROOT_PATH}[${index}]`),
					);
					return yield* runEncodeMany(codec, intermediates, yield* derive);
				}),

			loadMany: (schema, bytes, format) =>
				Effect.gen(function* () {
					const { descriptor, codec, engine, derive } = yield* prepare(schema, format);
					const intermediates = yield* runDecodeMany(codec, bytes, yield* derive);
					return yield* Effect.forEach(intermediates, (intermediate, index) =>
						loadOne(schema, engine, descriptor, intermediate, `${ROOT_PATH}[${index}]`),
					);
				}),

			toIntermediate: (schema, value) =>
				Effect.gen(function* () {
					const table = yield* current;
					const descriptor = yield* resolveWith(table, schema);
					return yield* makeEngine(table, descriptor).toIntermediate(
						value,
						descriptor,
						ROOT_PATH,
					);
				}),

			fromIntermediate: (schema, value) =>
				Effect.gen(function* () {
					const table = yield* current;
					const descriptor = yield* resolveWith(table, schema);
					const engine = makeEngine(table, descriptor);
					return yield* loadOne(schema, engine, descriptor, value, ROOT_PATH);
				}),

			resolve: (schema) => Effect.flatMap(current, (table) => resolveWith(table, schema)),

			deriveSchema: (schema) =>
				Effect.gen(function* () {
					const table = yield* current;
					const descriptor = yield* resolveWith(table, schema);
					return yield* deriveWith(table, descriptor);
				}),

			lookup: (descriptor) =>
				Effect.flatMap(current, (table) => lookupConverter(table.converters, descriptor)),

			registerConverter: (target, converter, registerOptions) =>
				update((table) =>
					Effect.map(
						addConverter(table, target, converter, registerOptions),
						(added) => [added.entry, added.table] as const,
					),
				),

			registerHook: (registration) =>
				update((table) =>
					Effect.map(addHook(table, registration), (next) => [undefined, next] as const),
				),

			registerCodec: (codec, codecOptions) =>
				update((table) =>
					Effect.map(
						addCodecEntry(table, { codec, replace: codecOptions?.replace }),
						(next) => [undefined, next] as const,
					),
				),

			use: (plugin) =>
				update((table) =>
					Effect.map(
						installPlugins(table, isPluginList(plugin) ? plugin : [plugin]),
						(next) => [undefined, next] as const,
					),
				),

			formats: () =>
				Effect.map(current, (table) =>
					[...table.codecs.byName.values()].map((codec) => ({
						name: codec.name,
						extensions: codec.extensions,
						requiresSchema: codec.requiresSchema,
					})),
				),

			converters: () => Effect.map(current, (table) => listConverters(table.converters)),

			plugins: () => Effect.map(current, (table) => table.plugins),
		};

		return service;
	});

// ============================================================================
// Layer Construction
// ============================================================================

/**
 * Builds the initial registration table: the built-in plugin, the codecs,
 * then the configured plugins.
 */
export const buildRegistrationTable = (
	options: AdapterOptions,
	maxUnionMembers: number,
): Effect.Effect<RegistrationTable, AdapterLayerError> =>
	Effect.gen(function* () {
		const withBuiltins = yield* installPlugins(emptyRegistrationTable(maxUnionMembers), [
			builtinPlugin,
			codecsPlugin(options.codecs ?? defaultCodecs()),
		]);
		const table = yield* installPlugins(withBuiltins, options.plugins ?? []);
		yield* Effect.logDebug(
			`Adapter ready: ${HashMap.size(table.converters.entries)} converter keys, ${table.codecs.byName.size} codecs`,
		);
		return table;
	});

/**
 * Creates a TypeAdapter Layer.
 *
 * Settings the options leave out are read from `ROUNDTRIP_MAX_UNION_MEMBERS`
 * and `ROUNDTRIP_DEFAULT_FORMAT` through the current ConfigProvider.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const adapter = yield* TypeAdapter
 *   return yield* adapter.dump(Person, person, "yaml")
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(makeAdapterLayer())))
 * ```
 */
export const makeAdapterLayer = (
	options: AdapterOptions = {},
): Layer.Layer<TypeAdapter, AdapterLayerError> =>
	Layer.effect(
		TypeAdapter,
		Effect.gen(function* () {
			const config = yield* resolveAdapterConfig(options);
			const build = buildRegistrationTable(options, config.maxUnionMembers);
			const table = yield* options.logLevel === undefined
				? build
				: build.pipe(Logger.withMinimumLogLevel(options.logLevel));
			return yield* makeTypeAdapter(table, config.defaultFormat, options);
		}),
	);

/**
 * A TypeAdapter with the built-in converters and the default codecs.
 */
export const DefaultAdapterLayer: Layer.Layer<TypeAdapter, AdapterLayerError> =
	makeAdapterLayer();
