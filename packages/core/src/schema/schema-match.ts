/**
 * Match scores used to pick a union branch.
 *
 * A score is a number in [0, 1]: 1 for a certain fit, 0 for none. Records
 * score by the overlap of their field names with the keys present (Jaccard
 * ratio). Branches are tried by descending score, then declaration order.
 */

import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import { type Schema, type SchemaNode, dereference } from "./schema-types.js";

// ============================================================================
// Helpers
// ============================================================================

/**
 * |a ∩ b| / |a ∪ b|; two empty sets are identical.
 */
export const jaccard = (
	a: ReadonlyArray<string>,
	b: ReadonlyArray<string>,
): number => {
	const left = new Set(a);
	const right = new Set(b);
	const union = new Set([...left, ...right]);
	if (union.size === 0) {
		return 1;
	}
	let shared = 0;
	for (const key of left) {
		if (right.has(key)) shared++;
	}
	return shared / union.size;
};

/**
 * Indexes of `candidates` ordered by descending score. Equal scores keep
 * their original order.
 */
export const rankByScore = <A>(
	candidates: ReadonlyArray<A>,
	score: (candidate: A) => number,
): ReadonlyArray<number> =>
	candidates
		.map((candidate, index) => ({ index, score: score(candidate) }))
		.sort((a, b) => b.score - a.score || a.index - b.index)
		.map(({ index }) => index);

const SPECIAL_FLOATS: ReadonlySet<string> = new Set([
	"NaN",
	"Infinity",
	"-Infinity",
	"-0",
]);

const INTEGER_TEXT = /^-?\d+$/;

const fieldNames = (node: SchemaNode): ReadonlyArray<string> =>
	node.kind === "record" ? node.fields.map((field) => field.name) : [];

// ============================================================================
// Plain values (what a text or msgpack parser produced)
// ============================================================================

export const scorePlain = (
	value: unknown,
	target: SchemaNode,
	schema: Schema,
): number => {
	const node = dereference(schema, target);
	if (node.kind === "union") {
		return Math.max(0, ...node.branches.map((branch) => scorePlain(value, branch, schema)));
	}
	if (value === null || value === undefined) {
		return node.nullable || node.kind === "null" ? 1 : 0;
	}
	switch (typeof value) {
		case "boolean":
			return node.kind === "boolean" ? 1 : 0;
		case "bigint":
			return node.kind === "int" ? 1 : node.kind === "float" ? 0.5 : 0;
		case "number":
			if (node.kind === "float") return 1;
			return node.kind === "int" && Number.isInteger(value) && !Object.is(value, -0)
				? 1
				: 0;
		case "string":
			if (node.kind === "text") return 1;
			if (node.kind === "enum") return node.symbols.includes(value) ? 1 : 0;
			if (node.kind === "int") return INTEGER_TEXT.test(value) ? 0.5 : 0;
			if (node.kind === "float") return SPECIAL_FLOATS.has(value) ? 0.5 : 0;
			return node.kind === "bytes" ? 0.25 : 0;
		default:
			break;
	}
	if (value instanceof Uint8Array) {
		return node.kind === "bytes" ? 1 : 0;
	}
	if (Array.isArray(value)) {
		if (node.kind === "sequence") return 1;
		return node.kind === "tuple" && node.elements.length === value.length ? 1 : 0;
	}
	if (typeof value === "object") {
		if (node.kind === "mapping") return 0.5;
		if (node.kind === "record") {
			const keys = value instanceof Map ? [...value.keys()].map(String) : Object.keys(value);
			return jaccard(keys, fieldNames(node));
		}
	}
	return 0;
};

// ============================================================================
// Intermediate values
// ============================================================================

export const scoreIntermediate = (
	value: IntermediateValue,
	target: SchemaNode,
	schema: Schema,
): number => {
	const node = dereference(schema, target);
	if (node.kind === "union") {
		return Math.max(
			0,
			...node.branches.map((branch) => scoreIntermediate(value, branch, schema)),
		);
	}
	switch (value._tag) {
		case "Null":
			return node.nullable || node.kind === "null" ? 1 : 0;
		case "Boolean":
			return node.kind === "boolean" ? 1 : 0;
		case "Int":
			return node.kind === "int" ? 1 : node.kind === "float" ? 0.5 : 0;
		case "Float":
			return node.kind === "float" ? 1 : 0;
		case "Text":
			if (node.kind === "text") return 1;
			return node.kind === "enum" && node.symbols.includes(value.value) ? 1 : 0;
		case "Bytes":
			return node.kind === "bytes" ? 1 : 0;
		case "Sequence":
			if (node.kind === "sequence") return 1;
			return node.kind === "tuple" && node.elements.length === value.items.length
				? 1
				: 0;
		case "Mapping":
			if (node.kind === "mapping") return 0.5;
			return node.kind === "record"
				? jaccard(
						value.entries.map(([key]) => key),
						fieldNames(node),
					)
				: 0;
	}
};
