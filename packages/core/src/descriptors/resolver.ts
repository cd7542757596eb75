/**
 * Type Descriptor Resolver.
 *
 * Walks an Effect Schema AST and produces the descriptor the registry
 * dispatches on. `resolveType` hooks get the first look at every node; the
 * structural rules below only apply when no hook claims it.
 *
 * Optional rule: a union is flattened, its `null` and `undefined` members
 * are removed, and if any was removed the rest is wrapped in
 * `Optional { absent }` where `absent` is "null" when a null member was
 * present and "undefined" otherwise. So `NullOr(X)`, `Union(X, Null)` and
 * `Union(Null, X)` all resolve to `Optional(X, "null")`.
 */

import { Data, Effect, Option, Schema, SchemaAST } from "effect";
import { UnsupportedTypeError } from "../errors/conversion-errors.js";
import { runFirstSuccess } from "../hooks/hook-runner.js";
import type { HookEntry, ResolveTypeHook } from "../hooks/hook-types.js";
import {
	Descriptor,
	type EnumMember,
	type FieldInput,
	type LiteralValue,
	type RecordConstruct,
	type TypeDescriptor,
	hasFreeRefs,
} from "./type-descriptor.js";

// ============================================================================
// Types
// ============================================================================

export interface ResolverEnv {
	readonly hooks: ReadonlyArray<HookEntry<ResolveTypeHook>>;
	/** Largest number of non-null members a union may have */
	readonly maxUnionMembers: number;
	/** Memo of resolved nodes; only self-contained results are stored */
	readonly cache: Map<SchemaAST.AST, TypeDescriptor>;
}

interface ResolveState {
	/** Nodes being resolved, outermost first */
	readonly stack: ReadonlyArray<SchemaAST.AST>;
}

type Resolved = Effect.Effect<TypeDescriptor, UnsupportedTypeError>;

// ============================================================================
// Helpers
// ============================================================================

const unsupported = (ast: SchemaAST.AST, reason: string): UnsupportedTypeError =>
	new UnsupportedTypeError({
		type: String(ast),
		reason,
		message: `Cannot represent type ${String(ast)}: ${reason}`,
	});

const isPlainObject = (value: unknown): value is object =>
	typeof value === "object" &&
	value !== null &&
	Object.getPrototypeOf(value) === Object.prototype;

/**
 * Default values become part of the descriptor, so arrays and plain objects
 * are given structural equality to keep equal declarations equal.
 */
const toStructural = (value: unknown): unknown => {
	if (Array.isArray(value)) {
		return Data.array(value.map(toStructural));
	}
	if (isPlainObject(value)) {
		return Data.struct(
			Object.fromEntries(
				Object.entries(value).map(([key, entry]) => [key, toStructural(entry)]),
			),
		);
	}
	return value;
};

const isNullLiteral = (ast: SchemaAST.AST): boolean =>
	SchemaAST.isLiteral(ast) && ast.literal === null;

const isUndefinedLike = (ast: SchemaAST.AST): boolean =>
	SchemaAST.isUndefinedKeyword(ast) || SchemaAST.isVoidKeyword(ast);

const flattenUnion = (
	types: ReadonlyArray<SchemaAST.AST>,
): ReadonlyArray<SchemaAST.AST> =>
	types.flatMap((member) =>
		SchemaAST.isUnion(member) ? flattenUnion(member.types) : [member],
	);

const literalMember = (literal: LiteralValue): EnumMember => ({
	symbol: String(literal),
	value: literal,
});

const enumOf = (
	ast: SchemaAST.AST,
	members: ReadonlyArray<EnumMember>,
	name: Option.Option<string>,
): Resolved => {
	const seen = new Set<string>();
	for (const member of members) {
		if (seen.has(member.symbol)) {
			return Effect.fail(
				unsupported(ast, `duplicate enum symbol '${member.symbol}'`),
			);
		}
		seen.add(member.symbol);
	}
	return Effect.succeed(Descriptor.enum(members, name));
};

/**
 * Field defaults declared with `Schema.optionalWith(..., { default })`,
 * keyed by the type-side property name.
 */
const collectDefaults = (
	ast: SchemaAST.Transformation,
): ReadonlyMap<PropertyKey, unknown> => {
	const defaults = new Map<PropertyKey, unknown>();
	if (ast.transformation._tag !== "TypeLiteralTransformation") {
		return defaults;
	}
	for (const pst of ast.transformation.propertySignatureTransformations) {
		const decoded: Option.Option<unknown> = pst.decode(Option.none());
		if (Option.isSome(decoded)) {
			defaults.set(pst.to, toStructural(decoded.value));
		}
	}
	return defaults;
};

// ============================================================================
// Classes
// ============================================================================

/**
 * A `Schema.Class` is a transformation from its fields struct to a
 * declaration carrying the class identifier.
 */
const classIdentifier = (ast: SchemaAST.Transformation): Option.Option<string> => {
	const fields = ast.from;
	const isStruct =
		SchemaAST.isTypeLiteral(fields) ||
		(SchemaAST.isTransformation(fields) && SchemaAST.isTypeLiteral(fields.to));
	return SchemaAST.isDeclaration(ast.to) && isStruct
		? SchemaAST.getIdentifierAnnotation(ast.to)
		: Option.none();
};

const constructors = new WeakMap<SchemaAST.Transformation, RecordConstruct>();

/**
 * Builds instances from type-side fields: the class's own decode step
 * runs on the fields after they are validated against the struct's type
 * side.
 */
const classConstruct = (ast: SchemaAST.Transformation): RecordConstruct => {
	const cached = constructors.get(ast);
	if (cached !== undefined) {
		return cached;
	}
	const fromFields = Schema.make<unknown, unknown, never>(
		new SchemaAST.Transformation(SchemaAST.typeAST(ast.from), ast.to, ast.transformation),
	);
	const construct: RecordConstruct = (fields) => Schema.decodeUnknown(fromFields)(fields);
	constructors.set(ast, construct);
	return construct;
};

const resolveClass = (
	ast: SchemaAST.Transformation,
	name: string,
	recurse: (ast: SchemaAST.AST) => Resolved,
): Resolved => {
	const fields = ast.from;
	const construct = Option.some(classConstruct(ast));
	if (SchemaAST.isTransformation(fields) && SchemaAST.isTypeLiteral(fields.to)) {
		return resolveTypeLiteral(
			fields.to,
			Option.some(name),
			collectDefaults(fields),
			recurse,
			construct,
		);
	}
	if (SchemaAST.isTypeLiteral(fields)) {
		return resolveTypeLiteral(fields, Option.some(name), new Map(), recurse, construct);
	}
	return Effect.fail(unsupported(ast, `class ${name} is not built from a struct`));
};

// ============================================================================
// Resolver
// ============================================================================

const resolveTypeLiteral = (
	ast: SchemaAST.TypeLiteral,
	name: Option.Option<string>,
	defaults: ReadonlyMap<PropertyKey, unknown>,
	recurse: (ast: SchemaAST.AST) => Resolved,
	construct: Option.Option<RecordConstruct> = Option.none(),
): Resolved => {
	const { propertySignatures, indexSignatures } = ast;

	if (indexSignatures.length > 0) {
		if (propertySignatures.length > 0 || indexSignatures.length > 1) {
			return Effect.fail(
				unsupported(ast, "mixed property and index signatures"),
			);
		}
		const [index] = indexSignatures;
		if (!SchemaAST.isStringKeyword(index.parameter)) {
			return Effect.fail(unsupported(ast, "mapping keys must be strings"));
		}
		return Effect.map(recurse(index.type), Descriptor.mapping);
	}

	return Effect.gen(function* () {
		const fields: Array<FieldInput> = [];
		for (const signature of propertySignatures) {
			if (typeof signature.name !== "string") {
				return yield* Effect.fail(
					unsupported(ast, `property key ${String(signature.name)} is not a string`),
				);
			}
			const type = yield* recurse(signature.type);
			fields.push({
				name: signature.name,
				type,
				optional: signature.isOptional,
				default: defaults.has(signature.name)
					? Option.some(defaults.get(signature.name))
					: Option.none(),
			});
		}
		return Descriptor.record(fields, name, construct);
	});
};

const resolveTuple = (
	ast: SchemaAST.TupleType,
	recurse: (ast: SchemaAST.AST) => Resolved,
): Resolved => {
	if (ast.elements.length === 0 && ast.rest.length === 1) {
		return Effect.map(recurse(ast.rest[0].type), Descriptor.sequence);
	}
	if (ast.rest.length > 0) {
		return Effect.fail(unsupported(ast, "tuples with a rest element"));
	}
	if (ast.elements.some((element) => element.isOptional)) {
		return Effect.fail(unsupported(ast, "optional tuple elements"));
	}
	return Effect.map(
		Effect.forEach(ast.elements, (element) => recurse(element.type)),
		Descriptor.tuple,
	);
};

const resolveUnion = (
	ast: SchemaAST.Union,
	env: ResolverEnv,
	recurse: (ast: SchemaAST.AST) => Resolved,
): Resolved =>
	Effect.gen(function* () {
		const flat = flattenUnion(ast.types);
		const hasNull = flat.some(isNullLiteral);
		const hasUndefined = flat.some(isUndefinedLike);
		const rest = flat.filter(
			(member) => !isNullLiteral(member) && !isUndefinedLike(member),
		);

		if (rest.length > env.maxUnionMembers) {
			return yield* Effect.fail(
				unsupported(
					ast,
					`union has ${rest.length} members, more than the limit of ${env.maxUnionMembers}`,
				),
			);
		}

		// literal members collapse into one enum, placed where the first one was
		const literals: Array<EnumMember> = [];
		const members: Array<TypeDescriptor | "enum"> = [];
		for (const member of rest) {
			if (SchemaAST.isLiteral(member) && member.literal !== null) {
				if (literals.length === 0) {
					members.push("enum");
				}
				literals.push(literalMember(member.literal));
			} else {
				members.push(yield* recurse(member));
			}
		}
		const merged = literals.length > 0 ? yield* enumOf(ast, literals, Option.none()) : undefined;
		const resolved = members.flatMap((member) =>
			member === "enum" ? (merged === undefined ? [] : [merged]) : [member],
		);

		if (resolved.length === 0) {
			if (hasNull) {
				return Descriptor.null();
			}
			return yield* Effect.fail(unsupported(ast, "union of undefined only"));
		}

		const base = resolved.length === 1 ? resolved[0] : Descriptor.union(resolved);
		if (!hasNull && !hasUndefined) {
			return base;
		}
		return Descriptor.optional(base, hasNull ? "null" : "undefined");
	});

const resolveStructural = (
	ast: SchemaAST.AST,
	env: ResolverEnv,
	state: ResolveState,
	recurse: (ast: SchemaAST.AST) => Resolved,
): Resolved => {
	switch (ast._tag) {
		case "StringKeyword":
			return Effect.succeed(Descriptor.text());
		case "NumberKeyword":
			return Effect.succeed(Descriptor.float());
		case "BooleanKeyword":
			return Effect.succeed(Descriptor.boolean());
		case "Literal":
			return ast.literal === null
				? Effect.succeed(Descriptor.null())
				: enumOf(ast, [literalMember(ast.literal)], Option.none());
		case "Enums":
			return enumOf(
				ast,
				ast.enums.map(([symbol, value]) => ({ symbol, value })),
				SchemaAST.getIdentifierAnnotation(ast),
			);
		case "TupleType":
			return resolveTuple(ast, recurse);
		case "TypeLiteral":
			return resolveTypeLiteral(
				ast,
				SchemaAST.getIdentifierAnnotation(ast),
				new Map(),
				recurse,
			);
		case "Union":
			return resolveUnion(ast, env, recurse);
		case "Refinement":
			return recurse(ast.from);
		case "Transformation": {
			const className = classIdentifier(ast);
			if (Option.isSome(className)) {
				return resolveClass(ast, className.value, recurse);
			}
			if (SchemaAST.isTypeLiteral(ast.to)) {
				const name = Option.orElse(SchemaAST.getIdentifierAnnotation(ast), () =>
					SchemaAST.getIdentifierAnnotation(ast.to),
				);
				return resolveTypeLiteral(ast.to, name, collectDefaults(ast), recurse);
			}
			return recurse(ast.to);
		}
		case "Declaration":
			return Option.match(SchemaAST.getIdentifierAnnotation(ast), {
				onNone: () =>
					Effect.fail(unsupported(ast, "declaration without an identifier")),
				onSome: (name) => Effect.succeed(Descriptor.nominal(name)),
			});
		case "Suspend": {
			const target = ast.f();
			if (!state.stack.includes(target)) {
				return recurse(target);
			}
			const name = Option.orElse(SchemaAST.getIdentifierAnnotation(target), () =>
				SchemaAST.isTransformation(target) ? classIdentifier(target) : Option.none(),
			);
			return Option.match(name, {
				onNone: () =>
					Effect.fail(
						unsupported(
							ast,
							"recursive reference to a declaration without an identifier",
						),
					),
				onSome: (name) => Effect.succeed(Descriptor.ref(name)),
			});
		}
		case "UndefinedKeyword":
		case "VoidKeyword":
			return Effect.fail(
				unsupported(ast, "undefined outside an optional position"),
			);
		case "BigIntKeyword":
			return Effect.fail(
				unsupported(ast, "bigint needs a resolveType hook (none claimed it)"),
			);
		default:
			return Effect.fail(unsupported(ast, `unsupported construct ${ast._tag}`));
	}
};

const resolveNode = (
	ast: SchemaAST.AST,
	env: ResolverEnv,
	state: ResolveState,
): Resolved => {
	const cached = env.cache.get(ast);
	if (cached !== undefined) {
		return Effect.succeed(cached);
	}

	const inner: ResolveState = { stack: [...state.stack, ast] };
	const recurse = (child: SchemaAST.AST): Resolved => resolveNode(child, env, inner);

	return Effect.gen(function* () {
		const claimed = yield* runFirstSuccess(env.hooks, (hook) =>
			hook(ast, { resolve: recurse }),
		);
		const descriptor = Option.isSome(claimed)
			? claimed.value
			: yield* resolveStructural(ast, env, state, recurse);
		if (!hasFreeRefs(descriptor)) {
			env.cache.set(ast, descriptor);
		}
		return descriptor;
	});
};

/**
 * Resolves a schema AST node to its descriptor.
 */
export const resolveAst = (ast: SchemaAST.AST, env: ResolverEnv): Resolved =>
	resolveNode(ast, env, { stack: [] });

/**
 * Resolves a schema to its descriptor.
 */
export const resolveSchema = <A, I, R>(
	schema: Schema.Schema<A, I, R>,
	env: ResolverEnv,
): Resolved => resolveAst(schema.ast, env);
