/**
 * Logical types: values with a richer meaning than the structural kind they
 * travel as.
 *
 * | type         | descriptor         | intermediate            | schema                   |
 * |--------------|--------------------|-------------------------|--------------------------|
 * | `Schema.Int` | Int                | Int                     | int                      |
 * | `bigint`     | Nominal BigInt     | Int                     | int                      |
 * | `Date`       | Nominal Date       | Int (epoch millis)      | int, timestamp-millis    |
 * | `BigDecimal` | Nominal BigDecimal | Text (plain decimal)    | text, decimal            |
 * | `Uint8Array` | Bytes              | Bytes                   | bytes                    |
 */

import { BigDecimal, Effect, Option, Schema, SchemaAST } from "effect";
import { Descriptor, type TypeDescriptor } from "../descriptors/type-descriptor.js";
import { Intermediate } from "../intermediate/intermediate-value.js";
import {
	type DeriveSchemaHook,
	HookOutcome,
	type ResolveTypeHook,
} from "../hooks/hook-types.js";
import type { Converter } from "../registry/converter-types.js";
import type { SchemaNode } from "../schema/schema-types.js";
import {
	describeTyped,
	intToNumber,
	makeConverter,
	mismatch,
	mismatchIntermediate,
	mismatchTyped,
} from "./converter-helpers.js";

export const DATE = "Date";
export const BIG_INT = "BigInt";
export const BIG_DECIMAL = "BigDecimal";

// ============================================================================
// AST Recognition
// ============================================================================

const hasIdentifier = (ast: SchemaAST.AST, identifier: string): boolean =>
	Option.exists(SchemaAST.getIdentifierAnnotation(ast), (name) => name === identifier);

const isIntRefinement = (ast: SchemaAST.AST): boolean => {
	if (!SchemaAST.isRefinement(ast)) {
		return false;
	}
	if (
		ast.annotations[SchemaAST.SchemaIdAnnotationId] === Schema.IntSchemaId ||
		hasIdentifier(ast, "Int")
	) {
		return true;
	}
	return isIntRefinement(ast.from);
};

const isDeclaration = (
	ast: SchemaAST.AST,
	self: Schema.Schema.Any,
	identifier: string,
): boolean =>
	SchemaAST.isDeclaration(ast) && (ast === self.ast || hasIdentifier(ast, identifier));

// ============================================================================
// Resolve Hook
// ============================================================================

/**
 * Claims the AST nodes of logical types before structural resolution.
 */
export const resolveLogicalType: ResolveTypeHook = (ast) => {
	let descriptor: TypeDescriptor | undefined;
	if (isIntRefinement(ast)) {
		descriptor = Descriptor.int();
	} else if (SchemaAST.isBigIntKeyword(ast)) {
		descriptor = Descriptor.nominal(BIG_INT);
	} else if (isDeclaration(ast, Schema.DateFromSelf, "DateFromSelf")) {
		descriptor = Descriptor.nominal(DATE);
	} else if (isDeclaration(ast, Schema.BigDecimalFromSelf, "BigDecimalFromSelf")) {
		descriptor = Descriptor.nominal(BIG_DECIMAL);
	} else if (isDeclaration(ast, Schema.Uint8ArrayFromSelf, "Uint8ArrayFromSelf")) {
		descriptor = Descriptor.bytes();
	}
	return Effect.succeed(
		descriptor === undefined
			? HookOutcome.notApplicable()
			: HookOutcome.applied(descriptor),
	);
};

// ============================================================================
// Schema Hook
// ============================================================================

const LOGICAL_NODES: Readonly<Record<string, SchemaNode>> = {
	[DATE]: { kind: "int", nullable: false, logicalType: "timestamp-millis" },
	[BIG_INT]: { kind: "int", nullable: false },
	[BIG_DECIMAL]: { kind: "text", nullable: false, logicalType: "decimal" },
};

export const deriveLogicalSchema: DeriveSchemaHook = (descriptor) => {
	const node =
		descriptor._tag === "Nominal" ? LOGICAL_NODES[descriptor.name] : undefined;
	return Effect.succeed(
		node === undefined ? HookOutcome.notApplicable() : HookOutcome.applied(node),
	);
};

// ============================================================================
// Date
// ============================================================================

export const dateConverter: Converter = makeConverter({
	toIntermediate: (value, ctx) => {
		if (!(value instanceof Date)) {
			return mismatchTyped(ctx.path, "Date", value);
		}
		const millis = value.getTime();
		return Number.isNaN(millis)
			? Effect.fail(mismatch(ctx.path, "valid Date", "Invalid Date"))
			: Effect.succeed(Intermediate.int(millis));
	},
	fromIntermediate: (value, ctx) => {
		switch (value._tag) {
			case "Int":
				return Effect.map(intToNumber(value.value, ctx.path), (millis) => new Date(millis));
			case "Text": {
				const parsed = new Date(value.value);
				return Number.isNaN(parsed.getTime())
					? mismatchIntermediate(ctx.path, "ISO-8601 timestamp", value)
					: Effect.succeed(parsed);
			}
			default:
				return mismatchIntermediate(ctx.path, "Int (epoch millis)", value);
		}
	},
});

// ============================================================================
// BigInt
// ============================================================================

const INTEGER_TEXT = /^-?\d+$/;

export const bigIntConverter: Converter = makeConverter({
	toIntermediate: (value, ctx) =>
		typeof value === "bigint"
			? Effect.succeed(Intermediate.int(value))
			: mismatchTyped(ctx.path, "bigint", value),
	fromIntermediate: (value, ctx) => {
		if (value._tag === "Int") {
			return Effect.succeed(value.value);
		}
		if (value._tag === "Text" && INTEGER_TEXT.test(value.value)) {
			return Effect.succeed(BigInt(value.value));
		}
		return mismatchIntermediate(ctx.path, "Int", value);
	},
});

// ============================================================================
// BigDecimal
// ============================================================================

/**
 * Plain (non-scientific) decimal text for a BigDecimal, keeping its scale:
 * value 12345n with scale 2 is "123.45", scale -2 is "1234500".
 */
export const formatDecimal = (decimal: BigDecimal.BigDecimal): string => {
	const negative = decimal.value < 0n;
	const digits = (negative ? -decimal.value : decimal.value).toString();
	const sign = negative ? "-" : "";
	if (decimal.scale <= 0) {
		return decimal.value === 0n
			? "0"
			: `${sign}${digits}${"0".repeat(-decimal.scale)}`;
	}
	const padded = digits.padStart(decimal.scale + 1, "0");
	const point = padded.length - decimal.scale;
	return `${sign}${padded.slice(0, point)}.${padded.slice(point)}`;
};

export const bigDecimalConverter: Converter = makeConverter({
	toIntermediate: (value, ctx) =>
		BigDecimal.isBigDecimal(value)
			? Effect.succeed(Intermediate.text(formatDecimal(value)))
			: Effect.fail(mismatch(ctx.path, "BigDecimal", describeTyped(value))),
	fromIntermediate: (value, ctx) => {
		const parsed =
			value._tag === "Text"
				? BigDecimal.fromString(value.value)
				: value._tag === "Int"
					? Option.some(BigDecimal.fromBigInt(value.value))
					: Option.none();
		return Option.match(parsed, {
			onNone: () => mismatchIntermediate(ctx.path, "decimal Text", value),
			onSome: (decimal) => Effect.succeed(decimal),
		});
	},
});
