/**
 * Converter Registry.
 *
 * Entries are filed under converter keys. Looking a descriptor up walks its
 * fallback chain; the first key that holds any entries decides, and within
 * it the highest specificity wins. A tie at the top is reported, never
 * broken silently.
 *
 * The table is immutable: registering returns a new table. Lookup results
 * are memoized per descriptor in a cache owned by the table; a new table
 * starts from a copy of the old cache minus the descriptors whose chain
 * contains the registered key.
 */

import { Effect, Equal, HashMap, MutableHashMap, Option } from "effect";
import {
	type TypeDescriptor,
	formatDescriptor,
} from "../descriptors/type-descriptor.js";
import {
	AmbiguousConverterError,
	NoConverterError,
} from "../errors/conversion-errors.js";
import {
	type ConverterKey,
	fallbackChain,
	formatKey,
} from "./converter-key.js";
import { type Converter, ROOT_PATH } from "./converter-types.js";

// ============================================================================
// Types
// ============================================================================

export interface ConverterEntry {
	readonly key: ConverterKey;
	readonly converter: Converter;
	readonly specificity: number;
	readonly name: string;
	/** Registration order, unique per table lineage */
	readonly sequence: number;
}

export interface RegisterConverterOptions {
	/** Rank within a key; higher wins. Defaults to 0. */
	readonly specificity?: number;
	/** Label used in logs and ambiguity errors */
	readonly name?: string;
	/** Remove every earlier entry filed under the same key */
	readonly replace?: boolean;
	/** Fail now if an entry with the same key and specificity exists */
	readonly exclusive?: boolean;
}

export type LookupResult =
	| { readonly _tag: "Found"; readonly entry: ConverterEntry }
	| { readonly _tag: "Missing" }
	| {
			readonly _tag: "Ambiguous";
			readonly candidates: ReadonlyArray<ConverterEntry>;
	  };

export interface ConverterTable {
	readonly entries: HashMap.HashMap<ConverterKey, ReadonlyArray<ConverterEntry>>;
	readonly cache: MutableHashMap.MutableHashMap<TypeDescriptor, LookupResult>;
	readonly nextSequence: number;
}

export interface RegisterResult {
	readonly table: ConverterTable;
	readonly entry: ConverterEntry;
	/** Entries removed by `replace` */
	readonly replaced: ReadonlyArray<ConverterEntry>;
}

export const emptyConverterTable = (): ConverterTable => ({
	entries: HashMap.empty(),
	cache: MutableHashMap.empty(),
	nextSequence: 0,
});

// ============================================================================
// Registration
// ============================================================================

const invalidate = (
	cache: ConverterTable["cache"],
	key: ConverterKey,
): ConverterTable["cache"] => {
	const next = MutableHashMap.empty<TypeDescriptor, LookupResult>();
	for (const [descriptor, result] of cache) {
		const affected = fallbackChain(descriptor).some((link) =>
			Equal.equals(link, key),
		);
		if (!affected) {
			MutableHashMap.set(next, descriptor, result);
		}
	}
	return next;
};

/**
 * Files a converter under `key`, returning the new table.
 *
 * Entries at the same key coexist unless `replace` is set. With `exclusive`,
 * an existing entry at the same key and specificity fails the registration
 * immediately instead of at lookup time.
 */
export const registerConverter = (
	table: ConverterTable,
	key: ConverterKey,
	converter: Converter,
	options: RegisterConverterOptions = {},
): Effect.Effect<RegisterResult, AmbiguousConverterError> => {
	const specificity = options.specificity ?? 0;
	const existing = Option.getOrElse(HashMap.get(table.entries, key), () => []);

	if (options.exclusive === true && options.replace !== true) {
		const clash = existing.filter((entry) => entry.specificity === specificity);
		if (clash.length > 0) {
			const target = formatKey(key);
			return Effect.fail(
				new AmbiguousConverterError({
					descriptor: target,
					candidates: clash.map((entry) => entry.name),
					specificity,
					message: `Converter for ${target} at specificity ${specificity} is already registered by ${clash
						.map((entry) => `'${entry.name}'`)
						.join(", ")}`,
				}),
			);
		}
	}

	const entry: ConverterEntry = {
		key,
		converter,
		specificity,
		name: options.name ?? `converter#${table.nextSequence}`,
		sequence: table.nextSequence,
	};
	const replaced = options.replace === true ? existing : [];
	const kept = options.replace === true ? [] : existing;

	return Effect.succeed({
		table: {
			entries: HashMap.set(table.entries, key, [...kept, entry]),
			cache: invalidate(table.cache, key),
			nextSequence: table.nextSequence + 1,
		},
		entry,
		replaced,
	});
};

// ============================================================================
// Lookup
// ============================================================================

const resolveEntry = (
	table: ConverterTable,
	descriptor: TypeDescriptor,
): LookupResult => {
	for (const key of fallbackChain(descriptor)) {
		const entries = Option.getOrElse(HashMap.get(table.entries, key), () => []);
		if (entries.length === 0) {
			continue;
		}
		const top = Math.max(...entries.map((entry) => entry.specificity));
		const candidates = entries.filter((entry) => entry.specificity === top);
		return candidates.length === 1
			? { _tag: "Found", entry: candidates[0] }
			: { _tag: "Ambiguous", candidates };
	}
	return { _tag: "Missing" };
};

/**
 * Finds the converter for a descriptor. `path` only feeds error messages.
 */
export const lookupConverter = (
	table: ConverterTable,
	descriptor: TypeDescriptor,
	path: string = ROOT_PATH,
): Effect.Effect<ConverterEntry, NoConverterError | AmbiguousConverterError> => {
	const result = Option.getOrElse(
		MutableHashMap.get(table.cache, descriptor),
		() => {
			const resolved = resolveEntry(table, descriptor);
			MutableHashMap.set(table.cache, descriptor, resolved);
			return resolved;
		},
	);

	switch (result._tag) {
		case "Found":
			return Effect.succeed(result.entry);
		case "Missing": {
			const target = formatDescriptor(descriptor);
			return Effect.fail(
				new NoConverterError({
					descriptor: target,
					path,
					message: `No converter registered for ${target} at ${path}`,
				}),
			);
		}
		case "Ambiguous": {
			const target = formatDescriptor(descriptor);
			const specificity = result.candidates[0]?.specificity ?? 0;
			return Effect.fail(
				new AmbiguousConverterError({
					descriptor: target,
					candidates: result.candidates.map((entry) => entry.name),
					specificity,
					message: `Ambiguous converters for ${target} at specificity ${specificity} under ${formatKey(
						result.candidates[0]?.key ?? fallbackChain(descriptor)[0],
					)}: ${result.candidates.map((entry) => `'${entry.name}'`).join(", ")}`,
				}),
			);
		}
	}
};

/**
 * Every entry in the table, in registration order.
 */
export const listConverters = (
	table: ConverterTable,
): ReadonlyArray<ConverterEntry> =>
	Array.from(HashMap.values(table.entries))
		.flat()
		.sort((a, b) => a.sequence - b.sequence);
