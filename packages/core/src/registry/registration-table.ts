/**
 * Registration table: everything an adapter knows about converters, hooks
 * and codecs, plus the memo caches derived from them.
 *
 * A table is an immutable snapshot. Every registration function returns a
 * new table; the adapter swaps it in atomically, so a conversion running
 * concurrently sees either the old or the new snapshot.
 */

import { Effect, MutableHashMap, Schema, type SchemaAST } from "effect";
import { type ResolverEnv, resolveSchema } from "../descriptors/resolver.js";
import type { TypeDescriptor } from "../descriptors/type-descriptor.js";
import type {
	AmbiguousConverterError,
	UnsupportedTypeError,
} from "../errors/conversion-errors.js";
import type { PluginError } from "../errors/plugin-errors.js";
import { emptyHookTable, insertHook } from "../hooks/hook-runner.js";
import type { AnyHookRegistration, HookTable } from "../hooks/hook-types.js";
import { planInstall } from "../plugins/plugin-registry.js";
import { codecOf, isCodecRegistration } from "../plugins/plugin-validation.js";
import type {
	AdapterPlugin,
	CodecRegistration,
	ConverterTarget,
} from "../plugins/plugin-types.js";
import type { Schema as DerivedSchema } from "../schema/schema-types.js";
import {
	type CodecTable,
	type FormatCodec,
	addCodec,
	emptyCodecTable,
} from "../serializers/format-codec.js";
import { ConverterKey, formatKey, isConverterKey } from "./converter-key.js";
import {
	type ConverterEntry,
	type ConverterTable,
	type RegisterConverterOptions,
	emptyConverterTable,
	registerConverter,
} from "./converter-registry.js";
import type { Converter } from "./converter-types.js";

// ============================================================================
// Table
// ============================================================================

export interface RegistrationTable {
	readonly converters: ConverterTable;
	readonly hooks: HookTable;
	readonly codecs: CodecTable;
	/** Names of installed plugins, in install order */
	readonly plugins: ReadonlyArray<string>;
	/** Next hook registration sequence */
	readonly hookSequence: number;
	readonly maxUnionMembers: number;
	readonly resolveCache: Map<SchemaAST.AST, TypeDescriptor>;
	readonly schemaCache: MutableHashMap.MutableHashMap<TypeDescriptor, DerivedSchema>;
}

export const emptyRegistrationTable = (maxUnionMembers: number): RegistrationTable => ({
	converters: emptyConverterTable(),
	hooks: emptyHookTable,
	codecs: emptyCodecTable,
	plugins: [],
	hookSequence: 0,
	maxUnionMembers,
	resolveCache: new Map(),
	schemaCache: MutableHashMap.empty(),
});

export const resolverEnv = (table: RegistrationTable): ResolverEnv => ({
	hooks: table.hooks.resolveType,
	maxUnionMembers: table.maxUnionMembers,
	cache: table.resolveCache,
});

/**
 * Derived schemas depend on every kind of registration (defaults are
 * converted through converters and hooks), so each new snapshot starts with
 * an empty schema cache.
 */
const withFreshSchemaCache = (table: RegistrationTable): RegistrationTable => ({
	...table,
	schemaCache: MutableHashMap.empty(),
});

// ============================================================================
// Converters
// ============================================================================

const keyOf = (
	table: RegistrationTable,
	target: ConverterTarget,
): Effect.Effect<ConverterKey, UnsupportedTypeError> => {
	if (Schema.isSchema(target)) {
		return Effect.map(resolveSchema(target, resolverEnv(table)), ConverterKey.exact);
	}
	if (isConverterKey(target)) {
		return Effect.succeed(target);
	}
	return Effect.succeed(ConverterKey.exact(target));
};

const formatKeyOf = (target: ConverterTarget): string => {
	if (isConverterKey(target)) {
		return formatKey(target);
	}
	return Schema.isSchema(target) ? `exact ${String(target.ast)}` : "exact";
};

export const addConverter = (
	table: RegistrationTable,
	target: ConverterTarget,
	converter: Converter,
	options: RegisterConverterOptions = {},
): Effect.Effect<
	{ readonly table: RegistrationTable; readonly entry: ConverterEntry },
	AmbiguousConverterError | UnsupportedTypeError
> =>
	Effect.gen(function* () {
		const key = yield* keyOf(table, target);
		const result = yield* registerConverter(table.converters, key, converter, options);
		if (result.replaced.length > 0) {
			yield* Effect.logWarning(
				`Converter '${result.entry.name}' replaces ${result.replaced
					.map((entry) => `'${entry.name}'`)
					.join(", ")}`,
			);
		}
		yield* Effect.logDebug(`Registered converter '${result.entry.name}'`);
		return {
			table: withFreshSchemaCache({ ...table, converters: result.table }),
			entry: result.entry,
		};
	}).pipe(Effect.annotateLogs("key", formatKeyOf(target)));

// ============================================================================
// Hooks
// ============================================================================

export const addHook = (
	table: RegistrationTable,
	registration: AnyHookRegistration,
): Effect.Effect<RegistrationTable> =>
	Effect.gen(function* () {
		const sequence = table.hookSequence;
		yield* Effect.logDebug(
			`Registered ${registration.point} hook '${registration.name ?? `hook#${sequence}`}'`,
		);
		return withFreshSchemaCache({
			...table,
			hooks: insertHook(table.hooks, registration, sequence),
			hookSequence: sequence + 1,
			resolveCache:
				registration.point === "resolveType" ? new Map() : table.resolveCache,
		});
	});

// ============================================================================
// Codecs
// ============================================================================

export const addCodecEntry = (
	table: RegistrationTable,
	entry: FormatCodec | CodecRegistration,
	plugin?: string,
): Effect.Effect<RegistrationTable, PluginError> =>
	Effect.gen(function* () {
		const codec = codecOf(entry);
		const replace = isCodecRegistration(entry) && entry.replace === true;
		if (replace && table.codecs.byName.has(codec.name)) {
			yield* Effect.logWarning(`Codec '${codec.name}' replaced`);
		}
		const codecs = yield* addCodec(table.codecs, codec, { replace, plugin });
		yield* Effect.logDebug(`Registered codec '${codec.name}'`);
		return { ...table, codecs };
	}).pipe(Effect.annotateLogs("format", codecOf(entry).name));

// ============================================================================
// Plugins
// ============================================================================

const installOne = (
	table: RegistrationTable,
	plugin: AdapterPlugin,
): Effect.Effect<
	RegistrationTable,
	PluginError | AmbiguousConverterError | UnsupportedTypeError
> =>
	Effect.gen(function* () {
		let current = table;
		for (const hook of plugin.hooks ?? []) {
			current = yield* addHook(current, hook);
		}
		for (const registration of plugin.converters ?? []) {
			const { target, converter, ...options } = registration;
			const added = yield* addConverter(current, target, converter, options);
			current = added.table;
		}
		for (const codec of plugin.codecs ?? []) {
			current = yield* addCodecEntry(current, codec, plugin.name);
		}
		yield* Effect.logDebug(
			`Installed plugin '${plugin.name}'${plugin.version === undefined ? "" : ` ${plugin.version}`}`,
		);
		return { ...current, plugins: [...current.plugins, plugin.name] };
	}).pipe(Effect.annotateLogs("plugin", plugin.name));

/**
 * Validates and installs plugins in dependency order. Nothing is installed
 * if validation fails; a failure while installing leaves the input table
 * untouched because the caller only keeps the returned snapshot.
 */
export const installPlugins = (
	table: RegistrationTable,
	plugins: ReadonlyArray<AdapterPlugin>,
): Effect.Effect<
	RegistrationTable,
	PluginError | AmbiguousConverterError | UnsupportedTypeError
> =>
	Effect.gen(function* () {
		const ordered = yield* planInstall(plugins, table.plugins);
		let current = table;
		for (const plugin of ordered) {
			current = yield* installOne(current, plugin);
		}
		return current;
	});
