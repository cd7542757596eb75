/**
 * Type Descriptor: the stable, hashable dispatch key derived from a type
 * declaration.
 *
 * Descriptors are built with Effect `Data` constructors so that two
 * descriptors with the same structure are `Equal.equals` and hash alike.
 * This is what lets them key `MutableHashMap` caches in the registry.
 */

import { Data, type Effect, Option, type ParseResult } from "effect";

// ============================================================================
// Descriptor Types
// ============================================================================

export type LiteralValue = string | number | boolean | bigint;

export interface NullDescriptor {
	readonly _tag: "Null";
}

export interface BooleanDescriptor {
	readonly _tag: "Boolean";
}

export interface IntDescriptor {
	readonly _tag: "Int";
}

export interface FloatDescriptor {
	readonly _tag: "Float";
}

export interface TextDescriptor {
	readonly _tag: "Text";
}

export interface BytesDescriptor {
	readonly _tag: "Bytes";
}

export interface EnumMember {
	/** Wire symbol: the member name for `Schema.Enums`, `String(value)` for literals */
	readonly symbol: string;
	readonly value: LiteralValue;
}

export interface EnumDescriptor {
	readonly _tag: "Enum";
	readonly name: Option.Option<string>;
	readonly members: ReadonlyArray<EnumMember>;
}

export interface SequenceDescriptor {
	readonly _tag: "Sequence";
	readonly items: TypeDescriptor;
}

export interface TupleDescriptor {
	readonly _tag: "Tuple";
	readonly elements: ReadonlyArray<TypeDescriptor>;
}

export interface MappingDescriptor {
	readonly _tag: "Mapping";
	readonly values: TypeDescriptor;
}

/**
 * How an absent value is spelled on the typed side: `null` when the
 * declaration admits null, `undefined` otherwise.
 */
export type AbsentSpelling = "null" | "undefined";

export interface OptionalDescriptor {
	readonly _tag: "Optional";
	readonly value: TypeDescriptor;
	readonly absent: AbsentSpelling;
}

export interface UnionDescriptor {
	readonly _tag: "Union";
	readonly members: ReadonlyArray<TypeDescriptor>;
}

export interface FieldDescriptor {
	readonly name: string;
	readonly type: TypeDescriptor;
	/** The key may be missing from the typed value */
	readonly optional: boolean;
	readonly default: Option.Option<unknown>;
}

/**
 * Builds the typed value of a class-backed record from its converted
 * fields. One function per class, so equal declarations stay equal.
 */
export type RecordConstruct = (
	fields: Readonly<Record<string, unknown>>,
) => Effect.Effect<unknown, ParseResult.ParseError>;

export interface RecordDescriptor {
	readonly _tag: "Record";
	readonly name: Option.Option<string>;
	readonly fields: ReadonlyArray<FieldDescriptor>;
	/** Present for `Schema.Class` declarations */
	readonly construct: Option.Option<RecordConstruct>;
}

/**
 * A type known only by name: logical types (dates, decimals) and opaque
 * declarations. Converters and schema fragments come from plugins.
 */
export interface NominalDescriptor {
	readonly _tag: "Nominal";
	readonly name: string;
}

/**
 * Back reference to an enclosing named declaration (recursive types).
 */
export interface RefDescriptor {
	readonly _tag: "Ref";
	readonly name: string;
}

export type TypeDescriptor =
	| NullDescriptor
	| BooleanDescriptor
	| IntDescriptor
	| FloatDescriptor
	| TextDescriptor
	| BytesDescriptor
	| EnumDescriptor
	| SequenceDescriptor
	| TupleDescriptor
	| MappingDescriptor
	| OptionalDescriptor
	| UnionDescriptor
	| RecordDescriptor
	| NominalDescriptor
	| RefDescriptor;

export type DescriptorKind = TypeDescriptor["_tag"];

// ============================================================================
// Constructors
// ============================================================================

const makeNull = Data.tagged<NullDescriptor>("Null");
const makeBoolean = Data.tagged<BooleanDescriptor>("Boolean");
const makeInt = Data.tagged<IntDescriptor>("Int");
const makeFloat = Data.tagged<FloatDescriptor>("Float");
const makeText = Data.tagged<TextDescriptor>("Text");
const makeBytes = Data.tagged<BytesDescriptor>("Bytes");
const makeEnum = Data.tagged<EnumDescriptor>("Enum");
const makeSequence = Data.tagged<SequenceDescriptor>("Sequence");
const makeTuple = Data.tagged<TupleDescriptor>("Tuple");
const makeMapping = Data.tagged<MappingDescriptor>("Mapping");
const makeOptional = Data.tagged<OptionalDescriptor>("Optional");
const makeUnion = Data.tagged<UnionDescriptor>("Union");
const makeRecord = Data.tagged<RecordDescriptor>("Record");
const makeNominal = Data.tagged<NominalDescriptor>("Nominal");
const makeRef = Data.tagged<RefDescriptor>("Ref");

export interface FieldInput {
	readonly name: string;
	readonly type: TypeDescriptor;
	readonly optional?: boolean;
	readonly default?: Option.Option<unknown>;
}

export const Descriptor = {
	null: (): TypeDescriptor => makeNull(),
	boolean: (): TypeDescriptor => makeBoolean(),
	int: (): TypeDescriptor => makeInt(),
	float: (): TypeDescriptor => makeFloat(),
	text: (): TypeDescriptor => makeText(),
	bytes: (): TypeDescriptor => makeBytes(),
	enum: (
		members: ReadonlyArray<EnumMember>,
		name: Option.Option<string> = Option.none(),
	): TypeDescriptor =>
		makeEnum({
			name,
			members: Data.array(members.map((member) => Data.struct({ ...member }))),
		}),
	sequence: (items: TypeDescriptor): TypeDescriptor => makeSequence({ items }),
	tuple: (elements: ReadonlyArray<TypeDescriptor>): TypeDescriptor =>
		makeTuple({ elements: Data.array([...elements]) }),
	mapping: (values: TypeDescriptor): TypeDescriptor => makeMapping({ values }),
	optional: (
		value: TypeDescriptor,
		absent: AbsentSpelling = "null",
	): TypeDescriptor => makeOptional({ value, absent }),
	union: (members: ReadonlyArray<TypeDescriptor>): TypeDescriptor =>
		makeUnion({ members: Data.array([...members]) }),
	record: (
		fields: ReadonlyArray<FieldInput>,
		name: Option.Option<string> = Option.none(),
		construct: Option.Option<RecordConstruct> = Option.none(),
	): TypeDescriptor =>
		makeRecord({
			name,
			construct,
			fields: Data.array(
				fields.map((field) =>
					Data.struct({
						name: field.name,
						type: field.type,
						optional: field.optional ?? false,
						default: field.default ?? Option.none(),
					}),
				),
			),
		}),
	nominal: (name: string): TypeDescriptor => makeNominal({ name }),
	ref: (name: string): TypeDescriptor => makeRef({ name }),
} as const;

// ============================================================================
// Queries
// ============================================================================

/**
 * The nominal identity of a descriptor, if it has one.
 */
export const nominalName = (descriptor: TypeDescriptor): Option.Option<string> => {
	switch (descriptor._tag) {
		case "Record":
		case "Enum":
			return descriptor.name;
		case "Nominal":
			return Option.some(descriptor.name);
		default:
			return Option.none();
	}
};

/**
 * The same descriptor with its nominal identity removed, i.e. its structural
 * shape. Returns none for descriptors that carry no erasable name.
 */
export const eraseName = (
	descriptor: TypeDescriptor,
): Option.Option<TypeDescriptor> => {
	if (descriptor._tag === "Record" && Option.isSome(descriptor.name)) {
		return Option.some(
			makeRecord({
				name: Option.none(),
				fields: descriptor.fields,
				construct: Option.none(),
			}),
		);
	}
	if (descriptor._tag === "Enum" && Option.isSome(descriptor.name)) {
		return Option.some(makeEnum({ name: Option.none(), members: descriptor.members }));
	}
	return Option.none();
};

/**
 * The descriptors directly nested in `descriptor`.
 */
export const childDescriptors = (
	descriptor: TypeDescriptor,
): ReadonlyArray<TypeDescriptor> => {
	switch (descriptor._tag) {
		case "Sequence":
			return [descriptor.items];
		case "Mapping":
			return [descriptor.values];
		case "Optional":
			return [descriptor.value];
		case "Tuple":
			return descriptor.elements;
		case "Union":
			return descriptor.members;
		case "Record":
			return descriptor.fields.map((field) => field.type);
		default:
			return [];
	}
};

/**
 * Every named record reachable from `descriptor`, by name. The first record
 * seen under a name wins.
 */
export const collectDefinitions = (
	descriptor: TypeDescriptor,
): ReadonlyMap<string, RecordDescriptor> => {
	const definitions = new Map<string, RecordDescriptor>();
	const visit = (current: TypeDescriptor): void => {
		if (current._tag === "Record" && Option.isSome(current.name)) {
			if (definitions.has(current.name.value)) {
				return;
			}
			definitions.set(current.name.value, current);
		}
		for (const child of childDescriptors(current)) {
			visit(child);
		}
	};
	visit(descriptor);
	return definitions;
};

/**
 * True when `descriptor` contains a `Ref` with no enclosing record of that
 * name, i.e. it only makes sense inside a larger declaration.
 */
export const hasFreeRefs = (
	descriptor: TypeDescriptor,
	bound: ReadonlySet<string> = new Set(),
): boolean => {
	if (descriptor._tag === "Ref") {
		return !bound.has(descriptor.name);
	}
	const scope =
		descriptor._tag === "Record" && Option.isSome(descriptor.name)
			? new Set([...bound, descriptor.name.value])
			: bound;
	return childDescriptors(descriptor).some((child) => hasFreeRefs(child, scope));
};

// ============================================================================
// Formatting (for error messages and logs)
// ============================================================================

/**
 * Renders a descriptor as a compact type expression, e.g.
 * `sequence<mapping<optional<int>>>` or `record Point`.
 */
export const formatDescriptor = (descriptor: TypeDescriptor): string => {
	switch (descriptor._tag) {
		case "Null":
		case "Boolean":
		case "Int":
		case "Float":
		case "Text":
		case "Bytes":
			return descriptor._tag.toLowerCase();
		case "Enum":
			return Option.match(descriptor.name, {
				onNone: () =>
					`enum(${descriptor.members.map((member) => member.symbol).join(" | ")})`,
				onSome: (name) => `enum ${name}`,
			});
		case "Sequence":
			return `sequence<${formatDescriptor(descriptor.items)}>`;
		case "Tuple":
			return `tuple<${descriptor.elements.map(formatDescriptor).join(", ")}>`;
		case "Mapping":
			return `mapping<${formatDescriptor(descriptor.values)}>`;
		case "Optional":
			return `optional<${formatDescriptor(descriptor.value)}>`;
		case "Union":
			return `union<${descriptor.members.map(formatDescriptor).join(" | ")}>`;
		case "Record":
			return Option.match(descriptor.name, {
				onNone: () =>
					`record{${descriptor.fields
						.map(
							(field) =>
								`${field.name}${field.optional ? "?" : ""}: ${formatDescriptor(field.type)}`,
						)
						.join(", ")}}`,
				onSome: (name) => `record ${name}`,
			});
		case "Nominal":
			return descriptor.name;
		case "Ref":
			return `ref ${descriptor.name}`;
	}
};
