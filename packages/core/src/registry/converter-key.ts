import { Data, Option } from "effect";
import {
	type DescriptorKind,
	type TypeDescriptor,
	eraseName,
	formatDescriptor,
	nominalName,
} from "../descriptors/type-descriptor.js";

// ============================================================================
// Converter Keys
// ============================================================================

/**
 * The key a converter entry is filed under. A descriptor is looked up by
 * walking its fallback chain, from `Exact` down to `Kind`.
 */
export type ConverterKey =
	| { readonly _tag: "Exact"; readonly descriptor: TypeDescriptor }
	| { readonly _tag: "Named"; readonly name: string }
	| { readonly _tag: "Shape"; readonly descriptor: TypeDescriptor }
	| { readonly _tag: "Fields"; readonly fields: ReadonlyArray<string> }
	| { readonly _tag: "Kind"; readonly kind: DescriptorKind };

export type ConverterKeyLevel = ConverterKey["_tag"];

type ExactKey = Extract<ConverterKey, { _tag: "Exact" }>;
type NamedKey = Extract<ConverterKey, { _tag: "Named" }>;
type ShapeKey = Extract<ConverterKey, { _tag: "Shape" }>;
type FieldsKey = Extract<ConverterKey, { _tag: "Fields" }>;
type KindKey = Extract<ConverterKey, { _tag: "Kind" }>;

const makeExact = Data.tagged<ExactKey>("Exact");
const makeNamed = Data.tagged<NamedKey>("Named");
const makeShape = Data.tagged<ShapeKey>("Shape");
const makeFields = Data.tagged<FieldsKey>("Fields");
const makeKind = Data.tagged<KindKey>("Kind");

export const ConverterKey = {
	/** Exactly this descriptor */
	exact: (descriptor: TypeDescriptor): ConverterKey => makeExact({ descriptor }),
	/** Any record, enum or nominal type with this name */
	named: (name: string): ConverterKey => makeNamed({ name }),
	/** Any named descriptor whose structure, name erased, equals this one */
	shape: (descriptor: TypeDescriptor): ConverterKey =>
		makeShape({ descriptor: Option.getOrElse(eraseName(descriptor), () => descriptor) }),
	/** Any record declaring exactly these field names, in any order */
	fields: (fields: ReadonlyArray<string>): ConverterKey =>
		makeFields({ fields: Data.array([...new Set(fields)].sort()) }),
	/** Every descriptor of this kind */
	kind: (kind: DescriptorKind): ConverterKey => makeKind({ kind }),
} as const;

const KEY_TAGS: ReadonlyArray<string> = ["Exact", "Named", "Shape", "Fields", "Kind"];

export const isConverterKey = (value: unknown): value is ConverterKey =>
	typeof value === "object" &&
	value !== null &&
	"_tag" in value &&
	typeof value._tag === "string" &&
	KEY_TAGS.includes(value._tag);

// ============================================================================
// Fallback Chain
// ============================================================================

/**
 * Keys a descriptor is looked up under, most specific first.
 */
export const fallbackChain = (
	descriptor: TypeDescriptor,
): ReadonlyArray<ConverterKey> => {
	const chain: Array<ConverterKey> = [ConverterKey.exact(descriptor)];

	const name = nominalName(descriptor);
	if (Option.isSome(name)) {
		chain.push(ConverterKey.named(name.value));
	}

	const shape = eraseName(descriptor);
	if (Option.isSome(shape)) {
		chain.push(makeShape({ descriptor: shape.value }));
	}

	if (descriptor._tag === "Record") {
		chain.push(ConverterKey.fields(descriptor.fields.map((field) => field.name)));
	}

	chain.push(ConverterKey.kind(descriptor._tag));
	return chain;
};

export const formatKey = (key: ConverterKey): string => {
	switch (key._tag) {
		case "Exact":
			return `exact ${formatDescriptor(key.descriptor)}`;
		case "Named":
			return `named ${key.name}`;
		case "Shape":
			return `shape ${formatDescriptor(key.descriptor)}`;
		case "Fields":
			return `fields {${key.fields.join(", ")}}`;
		case "Kind":
			return `kind ${key.kind}`;
	}
};
