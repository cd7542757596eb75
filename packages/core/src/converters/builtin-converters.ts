/**
 * Kind-level converters for every structural descriptor.
 *
 * They are registered under `ConverterKey.kind(...)` at specificity 0, so
 * any converter filed under a more specific key (exact descriptor, name,
 * shape or field set) takes precedence.
 */

import { Effect, Either, Option, ParseResult } from "effect";
import {
	type DescriptorKind,
	type TypeDescriptor,
	formatDescriptor,
} from "../descriptors/type-descriptor.js";
import {
	type ConversionError,
	NoConverterError,
	SchemaMismatchError,
} from "../errors/conversion-errors.js";
import {
	Intermediate,
	type IntermediateValue,
	type MappingEntry,
	getEntry,
} from "../intermediate/intermediate-value.js";
import type {
	Converter,
	ConverterContext,
} from "../registry/converter-types.js";
import { jaccard, rankByScore } from "../schema/schema-match.js";
import {
	describeTyped,
	intToNumber,
	isPlainRecord,
	makeConverter,
	mismatch,
	mismatchIntermediate,
	mismatchTyped,
} from "./converter-helpers.js";

// ============================================================================
// Descriptor Narrowing
// ============================================================================

type DescriptorOf<K extends DescriptorKind> = Extract<TypeDescriptor, { _tag: K }>;

const isKind = <K extends DescriptorKind>(
	descriptor: TypeDescriptor,
	kind: K,
): descriptor is DescriptorOf<K> => descriptor._tag === kind;

/**
 * Runs `f` with the context descriptor narrowed to `kind`. A kind converter
 * filed under the wrong key reports the descriptor it cannot handle.
 */
const withDescriptor = <K extends DescriptorKind, A>(
	ctx: ConverterContext,
	kind: K,
	f: (descriptor: DescriptorOf<K>) => Effect.Effect<A, ConversionError>,
): Effect.Effect<A, ConversionError> => {
	const descriptor = ctx.descriptor;
	if (isKind(descriptor, kind)) {
		return f(descriptor);
	}
	const target = formatDescriptor(descriptor);
	return Effect.fail(
		new NoConverterError({
			descriptor: target,
			path: ctx.path,
			message: `Converter for kind ${kind} cannot handle ${target} at ${ctx.path}`,
		}),
	);
};

// ============================================================================
// Scalars
// ============================================================================

const nullConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		value === null
			? Effect.succeed(Intermediate.null())
			: mismatchTyped(ctx.path, "null", value),
	fromIntermediate: (value, ctx) =>
		value._tag === "Null"
			? Effect.succeed(null)
			: mismatchIntermediate(ctx.path, "Null", value),
});

const booleanConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		typeof value === "boolean"
			? Effect.succeed(Intermediate.boolean(value))
			: mismatchTyped(ctx.path, "boolean", value),
	fromIntermediate: (value, ctx) =>
		value._tag === "Boolean"
			? Effect.succeed(value.value)
			: mismatchIntermediate(ctx.path, "Boolean", value),
});

const intConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		typeof value === "number" && Number.isInteger(value)
			? Effect.succeed(Intermediate.int(value))
			: mismatchTyped(ctx.path, "integer", value),
	fromIntermediate: (value, ctx) =>
		value._tag === "Int"
			? intToNumber(value.value, ctx.path)
			: mismatchIntermediate(ctx.path, "Int", value),
});

const floatConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		typeof value === "number"
			? Effect.succeed(Intermediate.float(value))
			: mismatchTyped(ctx.path, "number", value),
	fromIntermediate: (value, ctx) => {
		switch (value._tag) {
			case "Float":
				return Effect.succeed(value.value);
			case "Int":
				return intToNumber(value.value, ctx.path);
			default:
				return mismatchIntermediate(ctx.path, "Float", value);
		}
	},
});

const textConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		typeof value === "string"
			? Effect.succeed(Intermediate.text(value))
			: mismatchTyped(ctx.path, "string", value),
	fromIntermediate: (value, ctx) =>
		value._tag === "Text"
			? Effect.succeed(value.value)
			: mismatchIntermediate(ctx.path, "Text", value),
});

const bytesConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		value instanceof Uint8Array
			? Effect.succeed(Intermediate.bytes(Uint8Array.from(value)))
			: mismatchTyped(ctx.path, "Uint8Array", value),
	fromIntermediate: (value, ctx) =>
		value._tag === "Bytes"
			? Effect.succeed(Uint8Array.from(value.value))
			: mismatchIntermediate(ctx.path, "Bytes", value),
});

// Enum members travel as their symbol.
const enumConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Enum", (descriptor) => {
			const member = descriptor.members.find((candidate) =>
				Object.is(candidate.value, value),
			);
			return member !== undefined
				? Effect.succeed(Intermediate.text(member.symbol))
				: mismatchTyped(ctx.path, formatDescriptor(descriptor), value);
		}),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Enum", (descriptor) => {
			const symbol = value._tag === "Text" ? value.value : undefined;
			const member = descriptor.members.find(
				(candidate) => candidate.symbol === symbol,
			);
			return member !== undefined
				? Effect.succeed(member.value)
				: mismatchIntermediate(ctx.path, formatDescriptor(descriptor), value);
		}),
});

// ============================================================================
// Containers
// ============================================================================

const sequenceConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Sequence", (descriptor) =>
			Array.isArray(value)
				? Effect.map(
						Effect.forEach(value, (item: unknown, index) =>
							ctx.toIntermediate(item, descriptor.items, index),
						),
						Intermediate.sequence,
					)
				: mismatchTyped(ctx.path, "array", value),
		),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Sequence", (descriptor) =>
			value._tag === "Sequence"
				? Effect.forEach(value.items, (item, index) =>
						ctx.fromIntermediate(item, descriptor.items, index),
					)
				: mismatchIntermediate(ctx.path, "Sequence", value),
		),
});

const tupleConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Tuple", (descriptor) => {
			const expected = `tuple of ${descriptor.elements.length}`;
			if (!Array.isArray(value) || value.length !== descriptor.elements.length) {
				return mismatchTyped(ctx.path, expected, value);
			}
			const items: ReadonlyArray<unknown> = value;
			return Effect.map(
				Effect.forEach(descriptor.elements, (element, index) =>
					ctx.toIntermediate(items[index], element, index),
				),
				Intermediate.sequence,
			);
		}),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Tuple", (descriptor) => {
			if (
				value._tag !== "Sequence" ||
				value.items.length !== descriptor.elements.length
			) {
				return mismatchIntermediate(
					ctx.path,
					`Sequence[${descriptor.elements.length}]`,
					value,
				);
			}
			const { items } = value;
			return Effect.forEach(descriptor.elements, (element, index) =>
				ctx.fromIntermediate(items[index], element, index),
			);
		}),
});

const mappingConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Mapping", (descriptor) =>
			isPlainRecord(value)
				? Effect.map(
						Effect.forEach(Object.entries(value), ([key, item]) =>
							Effect.map(
								ctx.toIntermediate(item, descriptor.values, key),
								(converted): MappingEntry => [key, converted],
							),
						),
						Intermediate.mapping,
					)
				: mismatchTyped(ctx.path, "object", value),
		),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Mapping", (descriptor) =>
			value._tag === "Mapping"
				? Effect.map(
						Effect.forEach(value.entries, ([key, item]) =>
							Effect.map(
								ctx.fromIntermediate(item, descriptor.values, key),
								(converted) => [key, converted] as const,
							),
						),
						(entries) => Object.fromEntries(entries),
					)
				: mismatchIntermediate(ctx.path, "Mapping", value),
		),
});

// ============================================================================
// Optional
// ============================================================================

const optionalConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Optional", (descriptor) =>
			value === null || value === undefined
				? Effect.succeed(Intermediate.null())
				: ctx.toIntermediate(value, descriptor.value),
		),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Optional", (descriptor) =>
			value._tag === "Null"
				? Effect.succeed(descriptor.absent === "null" ? null : undefined)
				: ctx.fromIntermediate(value, descriptor.value),
		),
});

// ============================================================================
// Records
// ============================================================================

const hasOwn = (record: Readonly<Record<string, unknown>>, key: string): boolean =>
	Object.prototype.hasOwnProperty.call(record, key);

const recordConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Record", (descriptor) => {
			if (!isPlainRecord(value)) {
				return mismatchTyped(ctx.path, formatDescriptor(descriptor), value);
			}
			const record = value;
			return Effect.gen(function* () {
				const entries: Array<MappingEntry> = [];
				for (const field of descriptor.fields) {
					const present = hasOwn(record, field.name);
					const raw = present ? record[field.name] : undefined;
					if (field.optional && raw === undefined) {
						continue;
					}
					if (!present && field.type._tag !== "Optional") {
						return yield* Effect.fail(
							mismatch(
								ctx.path,
								`field '${field.name}' of ${formatDescriptor(descriptor)}`,
								"missing field",
							),
						);
					}
					entries.push([
						field.name,
						yield* ctx.toIntermediate(raw, field.type, field.name),
					]);
				}
				return Intermediate.mapping(entries);
			});
		}),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Record", (descriptor) => {
			if (value._tag !== "Mapping") {
				return mismatchIntermediate(ctx.path, formatDescriptor(descriptor), value);
			}
			const mapping = value;
			return Effect.gen(function* () {
				const entries: Array<readonly [string, unknown]> = [];
				for (const field of descriptor.fields) {
					const entry = getEntry(mapping, field.name);
					if (entry === undefined) {
						if (Option.isSome(field.default)) {
							entries.push([field.name, field.default.value]);
						} else if (field.optional) {
							continue;
						} else if (field.type._tag === "Optional") {
							entries.push([
								field.name,
								field.type.absent === "null" ? null : undefined,
							]);
						} else {
							return yield* Effect.fail(
								mismatch(
									ctx.path,
									`field '${field.name}' of ${formatDescriptor(descriptor)}`,
									"missing field",
								),
							);
						}
						continue;
					}
					if (
						entry._tag === "Null" &&
						field.optional &&
						(field.type._tag !== "Optional" || field.type.absent === "undefined")
					) {
						continue;
					}
					entries.push([
						field.name,
						yield* ctx.fromIntermediate(entry, field.type, field.name),
					]);
				}
				const fields = Object.fromEntries(entries);
				if (Option.isNone(descriptor.construct)) {
					return fields;
				}
				return yield* descriptor.construct.value(fields).pipe(
					Effect.mapError((error) =>
						mismatch(
							ctx.path,
							formatDescriptor(descriptor),
							ParseResult.TreeFormatter.formatErrorSync(error),
						),
					),
				);
			});
		}),
});

// ============================================================================
// Unions
// ============================================================================

const resolveTarget = (
	descriptor: TypeDescriptor,
	ctx: ConverterContext,
): TypeDescriptor =>
	descriptor._tag === "Ref"
		? Option.getOrElse(ctx.resolveRef(descriptor.name), () => descriptor)
		: descriptor;

const scoreTyped = (
	value: unknown,
	member: TypeDescriptor,
	ctx: ConverterContext,
): number => {
	const descriptor = resolveTarget(member, ctx);
	switch (descriptor._tag) {
		case "Null":
			return value === null ? 1 : 0;
		case "Boolean":
			return typeof value === "boolean" ? 1 : 0;
		case "Int":
			return typeof value === "number" && Number.isInteger(value) ? 1 : 0;
		case "Float":
			return typeof value === "number" ? 1 : 0;
		case "Text":
			return typeof value === "string" ? 1 : 0;
		case "Bytes":
			return value instanceof Uint8Array ? 1 : 0;
		case "Enum":
			return descriptor.members.some((candidate) => Object.is(candidate.value, value))
				? 1
				: 0;
		case "Sequence":
			return Array.isArray(value) ? 1 : 0;
		case "Tuple":
			return Array.isArray(value) && value.length === descriptor.elements.length
				? 1
				: 0;
		case "Mapping":
			return isPlainRecord(value) ? 0.5 : 0;
		case "Record": {
			if (!isPlainRecord(value)) {
				return 0;
			}
			const record = value;
			return jaccard(
				Object.keys(record).filter((key) => record[key] !== undefined),
				descriptor.fields.map((field) => field.name),
			);
		}
		case "Optional":
			return value === null || value === undefined
				? 1
				: scoreTyped(value, descriptor.value, ctx);
		case "Union":
			return Math.max(
				0,
				...descriptor.members.map((inner) => scoreTyped(value, inner, ctx)),
			);
		case "Nominal":
		case "Ref":
			return 0.5;
	}
};

const scoreValue = (
	value: IntermediateValue,
	member: TypeDescriptor,
	ctx: ConverterContext,
): number => {
	const descriptor = resolveTarget(member, ctx);
	switch (descriptor._tag) {
		case "Null":
		case "Boolean":
		case "Int":
		case "Text":
		case "Bytes":
			return value._tag === descriptor._tag ? 1 : 0;
		case "Float":
			return value._tag === "Float" ? 1 : value._tag === "Int" ? 0.5 : 0;
		case "Enum": {
			const symbol = value._tag === "Text" ? value.value : undefined;
			return descriptor.members.some((candidate) => candidate.symbol === symbol)
				? 1
				: 0;
		}
		case "Sequence":
			return value._tag === "Sequence" ? 1 : 0;
		case "Tuple":
			return value._tag === "Sequence" &&
				value.items.length === descriptor.elements.length
				? 1
				: 0;
		case "Mapping":
			return value._tag === "Mapping" ? 0.5 : 0;
		case "Record":
			return value._tag === "Mapping"
				? jaccard(
						value.entries.map(([key]) => key),
						descriptor.fields.map((field) => field.name),
					)
				: 0;
		case "Optional":
			return value._tag === "Null" ? 1 : scoreValue(value, descriptor.value, ctx);
		case "Union":
			return Math.max(
				0,
				...descriptor.members.map((inner) => scoreValue(value, inner, ctx)),
			);
		case "Nominal":
		case "Ref":
			return 0.5;
	}
};

const isBranchMiss = (error: ConversionError): boolean =>
	error._tag === "SchemaMismatchError" || error._tag === "NumericRangeError";

/**
 * Tries each member in turn. A mismatch moves on to the next member; any
 * other failure aborts.
 */
const firstMatchingBranch = <A>(
	members: ReadonlyArray<TypeDescriptor>,
	attempt: (member: TypeDescriptor) => Effect.Effect<A, ConversionError>,
	onExhausted: () => SchemaMismatchError,
): Effect.Effect<A, ConversionError> =>
	Effect.gen(function* () {
		for (const member of members) {
			const result = yield* Effect.either(attempt(member));
			if (Either.isRight(result)) {
				return result.right;
			}
			if (!isBranchMiss(result.left)) {
				return yield* Effect.fail(result.left);
			}
		}
		return yield* Effect.fail(onExhausted());
	});

const unionConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Union", (descriptor) => {
			const order = rankByScore(descriptor.members, (member) =>
				scoreTyped(value, member, ctx),
			);
			return firstMatchingBranch(
				order.map((index) => descriptor.members[index]),
				(member) => ctx.toIntermediate(value, member),
				() => mismatch(ctx.path, formatDescriptor(descriptor), describeTyped(value)),
			);
		}),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Union", (descriptor) => {
			const order = rankByScore(descriptor.members, (member) =>
				scoreValue(value, member, ctx),
			);
			return firstMatchingBranch(
				order.map((index) => descriptor.members[index]),
				(member) => ctx.fromIntermediate(value, member),
				() =>
					new SchemaMismatchError({
						path: ctx.path,
						expected: formatDescriptor(descriptor),
						received: value._tag,
						message: `No member of ${formatDescriptor(descriptor)} accepts ${value._tag} at ${ctx.path}`,
					}),
			);
		}),
});

// ============================================================================
// References
// ============================================================================

const unresolvedRef = (ctx: ConverterContext, name: string): NoConverterError =>
	new NoConverterError({
		descriptor: `ref ${name}`,
		path: ctx.path,
		message: `Recursive reference '${name}' at ${ctx.path} has no enclosing declaration`,
	});

const refConverter = makeConverter({
	toIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Ref", (descriptor) =>
			Option.match(ctx.resolveRef(descriptor.name), {
				onNone: () => Effect.fail(unresolvedRef(ctx, descriptor.name)),
				onSome: (target) => ctx.toIntermediate(value, target),
			}),
		),
	fromIntermediate: (value, ctx) =>
		withDescriptor(ctx, "Ref", (descriptor) =>
			Option.match(ctx.resolveRef(descriptor.name), {
				onNone: () => Effect.fail(unresolvedRef(ctx, descriptor.name)),
				onSome: (target) => ctx.fromIntermediate(value, target),
			}),
		),
});

// ============================================================================
// Table
// ============================================================================

/**
 * One converter per structural kind. `Nominal` has none: opaque types need
 * a converter filed under their name.
 */
export const KIND_CONVERTERS: ReadonlyArray<{
	readonly kind: DescriptorKind;
	readonly converter: Converter;
}> = [
	{ kind: "Null", converter: nullConverter },
	{ kind: "Boolean", converter: booleanConverter },
	{ kind: "Int", converter: intConverter },
	{ kind: "Float", converter: floatConverter },
	{ kind: "Text", converter: textConverter },
	{ kind: "Bytes", converter: bytesConverter },
	{ kind: "Enum", converter: enumConverter },
	{ kind: "Sequence", converter: sequenceConverter },
	{ kind: "Tuple", converter: tupleConverter },
	{ kind: "Mapping", converter: mappingConverter },
	{ kind: "Optional", converter: optionalConverter },
	{ kind: "Union", converter: unionConverter },
	{ kind: "Record", converter: recordConverter },
	{ kind: "Ref", converter: refConverter },
];
