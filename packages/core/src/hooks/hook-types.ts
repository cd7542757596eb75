/**
 * Plugin hook types.
 *
 * A hook point is a named place in the pipeline where third parties can
 * contribute behaviour without the engine knowing about them in advance.
 * Each point has a fixed resolution policy:
 *
 * - first-success: implementations run in order until one returns
 *   `HookOutcome.applied`; the rest are skipped.
 * - chained: every implementation runs; an applied outcome replaces the
 *   value handed to the next implementation.
 *
 * Failing (rather than returning `notApplicable`) aborts the whole chain.
 */

import type { Effect, SchemaAST } from "effect";
import type { TypeDescriptor } from "../descriptors/type-descriptor.js";
import type {
	ConversionError,
	SchemaError,
	UnsupportedTypeError,
} from "../errors/conversion-errors.js";
import type { IntermediateValue } from "../intermediate/intermediate-value.js";
import type { SchemaNode } from "../schema/schema-types.js";
import type { FormatCodec } from "../serializers/format-codec.js";

// ============================================================================
// Hook Outcome
// ============================================================================

export type HookOutcome<A> =
	| { readonly _tag: "Applied"; readonly value: A }
	| { readonly _tag: "NotApplicable" };

const NOT_APPLICABLE: { readonly _tag: "NotApplicable" } = {
	_tag: "NotApplicable",
};

export const HookOutcome = {
	applied: <A>(value: A): HookOutcome<A> => ({ _tag: "Applied", value }),
	notApplicable: <A = never>(): HookOutcome<A> => NOT_APPLICABLE,
} as const;

// ============================================================================
// Hook Contexts
// ============================================================================

export interface ResolveTypeContext {
	/** Resolves a nested AST through the full resolver (hooks included) */
	readonly resolve: (
		ast: SchemaAST.AST,
	) => Effect.Effect<TypeDescriptor, UnsupportedTypeError>;
}

export interface ToIntermediateContext {
	readonly descriptor: TypeDescriptor;
	readonly path: string;
	/** The typed value the converter started from */
	readonly input: unknown;
}

export interface FromIntermediateContext {
	readonly descriptor: TypeDescriptor;
	readonly path: string;
}

export interface DeriveSchemaContext {
	/** Derives a nested descriptor through the full deriver (hooks included) */
	readonly derive: (
		descriptor: TypeDescriptor,
	) => Effect.Effect<SchemaNode, SchemaError>;
}

// ============================================================================
// Hook Signatures
// ============================================================================

export type ResolveTypeHook = (
	ast: SchemaAST.AST,
	ctx: ResolveTypeContext,
) => Effect.Effect<HookOutcome<TypeDescriptor>, UnsupportedTypeError>;

export type ToIntermediateHook = (
	value: IntermediateValue,
	ctx: ToIntermediateContext,
) => Effect.Effect<HookOutcome<IntermediateValue>, ConversionError>;

export type FromIntermediateHook = (
	value: IntermediateValue,
	ctx: FromIntermediateContext,
) => Effect.Effect<HookOutcome<IntermediateValue>, ConversionError>;

export type SelectCodecHook = (
	format: string,
) => Effect.Effect<HookOutcome<FormatCodec>>;

export type DeriveSchemaHook = (
	descriptor: TypeDescriptor,
	ctx: DeriveSchemaContext,
) => Effect.Effect<HookOutcome<SchemaNode>, SchemaError>;

export interface HookSignatures {
	readonly resolveType: ResolveTypeHook;
	readonly toIntermediate: ToIntermediateHook;
	readonly fromIntermediate: FromIntermediateHook;
	readonly selectCodec: SelectCodecHook;
	readonly deriveSchema: DeriveSchemaHook;
}

export type HookPoint = keyof HookSignatures;

export type HookPolicy = "first-success" | "chained";

export const HOOK_POLICIES: { readonly [P in HookPoint]: HookPolicy } = {
	resolveType: "first-success",
	toIntermediate: "chained",
	fromIntermediate: "chained",
	selectCodec: "first-success",
	deriveSchema: "first-success",
};

export const HOOK_POINTS: ReadonlyArray<HookPoint> = [
	"resolveType",
	"toIntermediate",
	"fromIntermediate",
	"selectCodec",
	"deriveSchema",
];

// ============================================================================
// Registrations
// ============================================================================

export interface HookRegistration<P extends HookPoint> {
	readonly point: P;
	readonly implementation: HookSignatures[P];
	/** Lower runs first; ties run in registration order. Defaults to 0. */
	readonly order?: number;
	/** Label used in logs */
	readonly name?: string;
}

export type AnyHookRegistration = {
	readonly [P in HookPoint]: HookRegistration<P>;
}[HookPoint];

export interface HookEntry<H> {
	readonly implementation: H;
	readonly order: number;
	readonly sequence: number;
	readonly name: string;
}

export type HookTable = {
	readonly [P in HookPoint]: ReadonlyArray<HookEntry<HookSignatures[P]>>;
};
