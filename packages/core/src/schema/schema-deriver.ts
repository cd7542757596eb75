/**
 * Schema Deriver.
 *
 * Turns a type descriptor into the structural schema that codecs consume.
 * `deriveSchema` hooks get the first look at every node, which is how
 * nominal types (dates, decimals) obtain a schema fragment.
 *
 * Named records are always placed in `definitions` and referenced by a
 * `ref` node, so a recursive declaration derives to a finite schema.
 */

import { Effect, MutableHashMap, Option } from "effect";
import {
	type RecordDescriptor,
	type TypeDescriptor,
	formatDescriptor,
} from "../descriptors/type-descriptor.js";
import { type ConversionError, SchemaError } from "../errors/conversion-errors.js";
import { runFirstSuccess } from "../hooks/hook-runner.js";
import type { DeriveSchemaHook, HookEntry } from "../hooks/hook-types.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import { ROOT_PATH, appendPath } from "../registry/converter-types.js";
import type { RecordNode, Schema, SchemaField, SchemaNode } from "./schema-types.js";

// ============================================================================
// Types
// ============================================================================

export interface DeriverEnv {
	readonly hooks: ReadonlyArray<HookEntry<DeriveSchemaHook>>;
	/** Converts a declared default through the converter registry */
	readonly convertDefault: (
		value: unknown,
		descriptor: TypeDescriptor,
		path: string,
	) => Effect.Effect<IntermediateValue, ConversionError>;
	readonly cache: MutableHashMap.MutableHashMap<TypeDescriptor, Schema>;
}

interface DeriveState {
	readonly env: DeriverEnv;
	readonly definitions: Map<string, RecordNode>;
	/** Named records whose fields are being derived */
	readonly pending: Set<string>;
}

type Derived = Effect.Effect<SchemaNode, SchemaError>;

// ============================================================================
// Helpers
// ============================================================================

const scalar = (kind: "null" | "boolean" | "int" | "float" | "text" | "bytes"): SchemaNode => ({
	kind,
	nullable: false,
});

const refNode = (name: string): SchemaNode => ({ kind: "ref", name, nullable: false });

const schemaError = (descriptor: TypeDescriptor, message: string): SchemaError =>
	new SchemaError({ descriptor: formatDescriptor(descriptor), message });

// ============================================================================
// Structural Derivation
// ============================================================================

const deriveFields = (
	record: RecordDescriptor,
	state: DeriveState,
	path: string,
): Effect.Effect<ReadonlyArray<SchemaField>, SchemaError> =>
	Effect.forEach(record.fields, (field) =>
		Effect.gen(function* () {
			const node = yield* deriveNode(field.type, state, appendPath(path, field.name));
			const defaultValue = yield* Option.match(field.default, {
				onNone: () => Effect.succeed(Option.none<IntermediateValue>()),
				onSome: (value) =>
					state.env.convertDefault(value, field.type, appendPath(path, field.name)).pipe(
						Effect.map(Option.some),
						Effect.mapError((error) =>
							schemaError(
								field.type,
								`Default of field '${field.name}' cannot be converted: ${error.message}`,
							),
						),
					),
			});
			const derived: SchemaField = {
				name: field.name,
				node,
				optional: field.optional,
				default: defaultValue,
			};
			return derived;
		}),
	);

const deriveRecord = (
	record: RecordDescriptor,
	state: DeriveState,
	path: string,
): Derived => {
	if (Option.isNone(record.name)) {
		return Effect.map(deriveFields(record, state, path), (fields): SchemaNode => ({
			kind: "record",
			nullable: false,
			fields,
		}));
	}
	const name = record.name.value;
	if (state.definitions.has(name) || state.pending.has(name)) {
		return Effect.succeed(refNode(name));
	}
	state.pending.add(name);
	return Effect.map(deriveFields(record, state, path), (fields): SchemaNode => {
		state.pending.delete(name);
		state.definitions.set(name, { kind: "record", nullable: false, name, fields });
		return refNode(name);
	});
};

const deriveStructural = (
	descriptor: TypeDescriptor,
	state: DeriveState,
	path: string,
): Derived => {
	switch (descriptor._tag) {
		case "Null":
			return Effect.succeed(scalar("null"));
		case "Boolean":
			return Effect.succeed(scalar("boolean"));
		case "Int":
			return Effect.succeed(scalar("int"));
		case "Float":
			return Effect.succeed(scalar("float"));
		case "Text":
			return Effect.succeed(scalar("text"));
		case "Bytes":
			return Effect.succeed(scalar("bytes"));
		case "Enum":
			return Effect.succeed<SchemaNode>({
				kind: "enum",
				nullable: false,
				...Option.match(descriptor.name, {
					onNone: () => ({}),
					onSome: (name) => ({ name }),
				}),
				symbols: descriptor.members.map((member) => member.symbol),
			});
		case "Sequence":
			return Effect.map(deriveNode(descriptor.items, state, `${path}[]`), (items): SchemaNode => ({
				kind: "sequence",
				nullable: false,
				items,
			}));
		case "Tuple":
			return Effect.map(
				Effect.forEach(descriptor.elements, (element, index) =>
					deriveNode(element, state, appendPath(path, index)),
				),
				(elements): SchemaNode => ({ kind: "tuple", nullable: false, elements }),
			);
		case "Mapping":
			return Effect.map(deriveNode(descriptor.values, state, `${path}[*]`), (values): SchemaNode => ({
				kind: "mapping",
				nullable: false,
				values,
			}));
		case "Optional":
			return Effect.map(deriveNode(descriptor.value, state, path), (inner): SchemaNode => ({
				...inner,
				nullable: true,
			}));
		case "Union":
			return Effect.map(
				Effect.forEach(descriptor.members, (member) => deriveNode(member, state, path)),
				(branches): SchemaNode => ({ kind: "union", nullable: false, branches }),
			);
		case "Record":
			return deriveRecord(descriptor, state, path);
		case "Ref":
			return Effect.succeed(refNode(descriptor.name));
		case "Nominal":
			return Effect.fail(
				schemaError(
					descriptor,
					`No schema is known for type '${descriptor.name}' at ${path}; register a deriveSchema hook for it`,
				),
			);
	}
};

const deriveNode = (
	descriptor: TypeDescriptor,
	state: DeriveState,
	path: string,
): Derived =>
	Effect.gen(function* () {
		const claimed = yield* runFirstSuccess(state.env.hooks, (hook) =>
			hook(descriptor, { derive: (nested) => deriveNode(nested, state, path) }),
		);
		if (Option.isSome(claimed)) {
			return claimed.value;
		}
		return yield* deriveStructural(descriptor, state, path);
	});

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Derives the schema for a descriptor. Results are cached per descriptor in
 * `env.cache`.
 */
export const deriveSchema = (
	descriptor: TypeDescriptor,
	env: DeriverEnv,
): Effect.Effect<Schema, SchemaError> =>
	Effect.gen(function* () {
		const cached = MutableHashMap.get(env.cache, descriptor);
		if (Option.isSome(cached)) {
			return cached.value;
		}
		const state: DeriveState = {
			env,
			definitions: new Map(),
			pending: new Set(),
		};
		const root = yield* deriveNode(descriptor, state, ROOT_PATH);
		const schema: Schema = {
			root,
			definitions: Object.fromEntries(state.definitions),
		};
		MutableHashMap.set(env.cache, descriptor, schema);
		return schema;
	});
