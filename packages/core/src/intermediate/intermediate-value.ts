/**
 * Intermediate Value Model.
 *
 * The canonical, format-agnostic representation every conversion targets.
 * Converters produce it from typed values; codecs turn it into bytes.
 *
 * Integers are arbitrary precision (`bigint`). Codecs with a native width
 * check the range themselves.
 */

// ============================================================================
// Intermediate Value Types
// ============================================================================

export interface NullValue {
	readonly _tag: "Null";
}

export interface BooleanValue {
	readonly _tag: "Boolean";
	readonly value: boolean;
}

export interface IntValue {
	readonly _tag: "Int";
	readonly value: bigint;
}

export interface FloatValue {
	readonly _tag: "Float";
	readonly value: number;
}

export interface TextValue {
	readonly _tag: "Text";
	readonly value: string;
}

export interface BytesValue {
	readonly _tag: "Bytes";
	readonly value: Uint8Array;
}

export interface SequenceValue {
	readonly _tag: "Sequence";
	readonly items: ReadonlyArray<IntermediateValue>;
}

export type MappingEntry = readonly [string, IntermediateValue];

export interface MappingValue {
	readonly _tag: "Mapping";
	readonly entries: ReadonlyArray<MappingEntry>;
}

export type IntermediateValue =
	| NullValue
	| BooleanValue
	| IntValue
	| FloatValue
	| TextValue
	| BytesValue
	| SequenceValue
	| MappingValue;

export type IntermediateTag = IntermediateValue["_tag"];

// ============================================================================
// Constructors
// ============================================================================

const NULL: NullValue = { _tag: "Null" };

export const Intermediate = {
	null: (): NullValue => NULL,
	boolean: (value: boolean): BooleanValue => ({ _tag: "Boolean", value }),
	int: (value: bigint | number): IntValue => ({
		_tag: "Int",
		value: typeof value === "bigint" ? value : BigInt(value),
	}),
	float: (value: number): FloatValue => ({ _tag: "Float", value }),
	text: (value: string): TextValue => ({ _tag: "Text", value }),
	bytes: (value: Uint8Array): BytesValue => ({ _tag: "Bytes", value }),
	sequence: (items: ReadonlyArray<IntermediateValue>): SequenceValue => ({
		_tag: "Sequence",
		items,
	}),
	mapping: (entries: ReadonlyArray<MappingEntry>): MappingValue => ({
		_tag: "Mapping",
		entries,
	}),
	fromEntries: (entries: Iterable<MappingEntry>): MappingValue => ({
		_tag: "Mapping",
		entries: Array.from(entries),
	}),
} as const;

// ============================================================================
// Accessors
// ============================================================================

/**
 * Returns the value stored under `key`, or undefined when the mapping has no
 * such entry. The last entry wins when a key repeats.
 */
export const getEntry = (
	mapping: MappingValue,
	key: string,
): IntermediateValue | undefined => {
	for (let i = mapping.entries.length - 1; i >= 0; i--) {
		const entry = mapping.entries[i];
		if (entry[0] === key) {
			return entry[1];
		}
	}
	return undefined;
};

// ============================================================================
// Equality
// ============================================================================

const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => {
	if (a.length !== b.length) {
		return false;
	}
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) {
			return false;
		}
	}
	return true;
};

const mappingsEqual = (a: MappingValue, b: MappingValue): boolean => {
	const left = new Map(a.entries);
	const right = new Map(b.entries);
	if (left.size !== right.size) {
		return false;
	}
	for (const [key, value] of left) {
		const other = right.get(key);
		if (other === undefined || !equals(value, other)) {
			return false;
		}
	}
	return true;
};

/**
 * Structural equality of intermediate values.
 *
 * Floats compare with `Object.is`, so NaN equals NaN and -0 differs from 0.
 * Mappings compare as key sets; entry order is not part of equality.
 */
export const equals = (a: IntermediateValue, b: IntermediateValue): boolean => {
	switch (a._tag) {
		case "Null":
			return b._tag === "Null";
		case "Boolean":
		case "Int":
		case "Text":
			return b._tag === a._tag && b.value === a.value;
		case "Float":
			return b._tag === "Float" && Object.is(a.value, b.value);
		case "Bytes":
			return b._tag === "Bytes" && bytesEqual(a.value, b.value);
		case "Sequence":
			return (
				b._tag === "Sequence" &&
				a.items.length === b.items.length &&
				a.items.every((item, index) => equals(item, b.items[index]))
			);
		case "Mapping":
			return b._tag === "Mapping" && mappingsEqual(a, b);
	}
};

// ============================================================================
// Describe (for error messages)
// ============================================================================

/**
 * A short label for a value, e.g. `Int(42)` or `Sequence[3]`.
 */
export const describe = (value: IntermediateValue): string => {
	switch (value._tag) {
		case "Null":
			return "Null";
		case "Boolean":
		case "Float":
			return `${value._tag}(${String(value.value)})`;
		case "Int":
			return `Int(${value.value.toString()})`;
		case "Text":
			return value.value.length > 32
				? `Text(${JSON.stringify(value.value.slice(0, 32))}...)`
				: `Text(${JSON.stringify(value.value)})`;
		case "Bytes":
			return `Bytes[${value.value.length}]`;
		case "Sequence":
			return `Sequence[${value.items.length}]`;
		case "Mapping":
			return `Mapping{${value.entries.map(([key]) => key).join(", ")}}`;
	}
};
