import type { Option } from "effect";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";

// ============================================================================
// Schema: structural description consumed by format codecs
// ============================================================================

export type SchemaKind =
	| "null"
	| "boolean"
	| "int"
	| "float"
	| "text"
	| "bytes"
	| "enum"
	| "sequence"
	| "tuple"
	| "mapping"
	| "record"
	| "union"
	| "ref";

interface NodeBase {
	/** Null is an accepted value in addition to the node's own kind */
	readonly nullable: boolean;
	/**
	 * Logical meaning layered over the physical kind, e.g. `timestamp-millis`
	 * over `int`. Codecs may use it for a richer native representation.
	 */
	readonly logicalType?: string;
}

export interface ScalarNode extends NodeBase {
	readonly kind: "null" | "boolean" | "int" | "float" | "text" | "bytes";
}

export interface EnumNode extends NodeBase {
	readonly kind: "enum";
	readonly name?: string;
	readonly symbols: ReadonlyArray<string>;
}

export interface SequenceNode extends NodeBase {
	readonly kind: "sequence";
	readonly items: SchemaNode;
}

export interface TupleNode extends NodeBase {
	readonly kind: "tuple";
	readonly elements: ReadonlyArray<SchemaNode>;
}

export interface MappingNode extends NodeBase {
	readonly kind: "mapping";
	readonly values: SchemaNode;
}

export interface SchemaField {
	readonly name: string;
	readonly node: SchemaNode;
	/** The field may be missing from a mapping */
	readonly optional: boolean;
	readonly default: Option.Option<IntermediateValue>;
}

export interface RecordNode extends NodeBase {
	readonly kind: "record";
	readonly name?: string;
	readonly fields: ReadonlyArray<SchemaField>;
}

export interface UnionNode extends NodeBase {
	readonly kind: "union";
	readonly branches: ReadonlyArray<SchemaNode>;
}

/**
 * Reference to a named record in `Schema.definitions`.
 */
export interface RefNode extends NodeBase {
	readonly kind: "ref";
	readonly name: string;
}

export type SchemaNode =
	| ScalarNode
	| EnumNode
	| SequenceNode
	| TupleNode
	| MappingNode
	| RecordNode
	| UnionNode
	| RefNode;

export interface Schema {
	readonly root: SchemaNode;
	/** Every named record reachable from `root`, by name */
	readonly definitions: Readonly<Record<string, RecordNode>>;
}

/**
 * Follows `ref` nodes to the record they name. Returns the node unchanged
 * for every other kind.
 */
export const dereference = (
	schema: Schema,
	node: SchemaNode,
): SchemaNode => {
	if (node.kind !== "ref") {
		return node;
	}
	const target = schema.definitions[node.name];
	if (target === undefined) {
		return node;
	}
	// the reference may itself be nullable; the definition is not
	return node.nullable && !target.nullable
		? { ...target, nullable: true }
		: target;
};
