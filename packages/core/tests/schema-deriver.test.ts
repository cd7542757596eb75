import { Effect, Option, Schema } from "effect";
import { describe, expect, it } from "vitest";
import { makeAdapterLayer } from "../src/adapter/adapter-layer.js";
import { TypeAdapter } from "../src/adapter/adapter-service.js";
import { HookOutcome } from "../src/hooks/hook-types.js";
import { Intermediate } from "../src/intermediate/intermediate-value.js";
import type { Schema as DerivedSchema, SchemaNode } from "../src/schema/schema-types.js";

const run = <A, E>(effect: Effect.Effect<A, E, TypeAdapter>) =>
	Effect.runPromise(Effect.provide(effect, makeAdapterLayer()));

const derive = <A, I>(schema: Schema.Schema<A, I, never>) =>
	run(Effect.flatMap(TypeAdapter, (adapter) => adapter.deriveSchema(schema)));

const fieldsOf = (schema: DerivedSchema, name: string) => {
	const definition = schema.definitions[name];
	if (definition === undefined) {
		throw new Error(`no definition ${name}`);
	}
	return definition.fields;
};

// ============================================================================
// Test Schemas
// ============================================================================

const Address = Schema.Struct({
	city: Schema.String,
	zip: Schema.optional(Schema.String),
}).annotations({ identifier: "Address" });

const Person = Schema.Struct({
	name: Schema.String,
	age: Schema.Int,
	address: Schema.NullOr(Address),
	tags: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
}).annotations({ identifier: "Person" });

interface TreeNode {
	readonly label: string;
	readonly children: ReadonlyArray<TreeNode>;
}

const TreeNode: Schema.Schema<TreeNode> = Schema.Struct({
	label: Schema.String,
	children: Schema.Array(Schema.suspend((): Schema.Schema<TreeNode> => TreeNode)),
}).annotations({ identifier: "TreeNode" });

// ============================================================================
// Tests
// ============================================================================

describe("deriveSchema", () => {
	it("maps scalars to non-nullable nodes", async () => {
		const schema = await derive(Schema.String);
		expect(schema.root).toEqual({ kind: "text", nullable: false });
		expect(schema.definitions).toEqual({});
	});

	it("places named records in definitions and references them", async () => {
		const schema = await derive(Person);
		expect(schema.root).toEqual({ kind: "ref", name: "Person", nullable: false });
		expect(Object.keys(schema.definitions).sort()).toEqual(["Address", "Person"]);

		const fields = fieldsOf(schema, "Person");
		expect(fields.map((field) => [field.name, field.node, field.optional])).toEqual([
			["name", { kind: "text", nullable: false }, false],
			["age", { kind: "int", nullable: false }, false],
			["address", { kind: "ref", name: "Address", nullable: true }, false],
			[
				"tags",
				{ kind: "sequence", nullable: false, items: { kind: "text", nullable: false } },
				false,
			],
		]);
	});

	it("converts field defaults to intermediate values", async () => {
		const schema = await derive(Person);
		const [name, , , tags] = fieldsOf(schema, "Person");
		expect(Option.isNone(name.default)).toBe(true);
		expect(Option.getOrThrow(tags.default)).toEqual(Intermediate.sequence([]));
	});

	it("marks optional fields as optional and nullable", async () => {
		const schema = await derive(Person);
		const [city, zip] = fieldsOf(schema, "Address");
		expect(city.optional).toBe(false);
		expect(zip.optional).toBe(true);
		expect(zip.node).toEqual({ kind: "text", nullable: true });
	});

	it("derives a finite schema for a recursive declaration", async () => {
		const schema = await derive(TreeNode);
		expect(schema.root).toEqual({ kind: "ref", name: "TreeNode", nullable: false });
		const [, children] = fieldsOf(schema, "TreeNode");
		expect(children.node).toEqual({
			kind: "sequence",
			nullable: false,
			items: { kind: "ref", name: "TreeNode", nullable: false },
		});
	});

	it("derives equal schemas from equal declarations", async () => {
		const comparable = (schema: DerivedSchema) => ({
			root: schema.root,
			definitions: Object.entries(schema.definitions).map(([name, definition]) => [
				name,
				definition.fields.map((field) => [
					field.name,
					field.node,
					field.optional,
					Option.getOrNull(field.default),
				]),
			]),
		});
		const first = await derive(Person);
		const second = await derive(Person);
		expect(comparable(second)).toEqual(comparable(first));
	});

	it("keeps enum symbols and names", async () => {
		const Level = { Low: 1, High: 2 } as const;
		const schema = await derive(Schema.Enums(Level).annotations({ identifier: "Level" }));
		expect(schema.root).toEqual({
			kind: "enum",
			nullable: false,
			name: "Level",
			symbols: ["Low", "High"],
		});
	});

	it("inlines unnamed records and unions", async () => {
		const schema = await derive(
			Schema.Struct({ value: Schema.Union(Schema.String, Schema.Number) }),
		);
		expect(schema.root.kind).toBe("record");
		if (schema.root.kind === "record") {
			expect(schema.root.fields[0].node).toEqual({
				kind: "union",
				nullable: false,
				branches: [
					{ kind: "text", nullable: false },
					{ kind: "float", nullable: false },
				],
			});
		}
	});

	it("uses schema fragments of the logical types", async () => {
		const schema = await derive(
			Schema.Tuple(Schema.DateFromSelf, Schema.BigDecimalFromSelf, Schema.BigIntFromSelf),
		);
		expect(schema.root).toEqual({
			kind: "tuple",
			nullable: false,
			elements: [
				{ kind: "int", nullable: false, logicalType: "timestamp-millis" },
				{ kind: "text", nullable: false, logicalType: "decimal" },
				{ kind: "int", nullable: false },
			],
		});
	});

	it("fails for a nominal type without a schema fragment", async () => {
		class Opaque {
			readonly tag = "opaque";
		}
		const OpaqueSchema = Schema.declare(
			(input: unknown): input is Opaque => input instanceof Opaque,
			{ identifier: "Opaque" },
		);
		const error = await run(
			Effect.flip(
				Effect.flatMap(TypeAdapter, (adapter) =>
					adapter.deriveSchema(Schema.Struct({ value: OpaqueSchema })),
				),
			),
		);
		expect(error._tag).toBe("SchemaError");
		expect(error.message).toBe(
			"No schema is known for type 'Opaque' at $.value; register a deriveSchema hook for it",
		);
	});

	it("lets a deriveSchema hook supply the fragment", async () => {
		class Opaque {
			readonly tag = "opaque";
		}
		const OpaqueSchema = Schema.declare(
			(input: unknown): input is Opaque => input instanceof Opaque,
			{ identifier: "Opaque" },
		);
		const schema = await run(
			Effect.gen(function* () {
				const adapter = yield* TypeAdapter;
				yield* adapter.registerHook({
					point: "deriveSchema",
					implementation: (descriptor) =>
						Effect.succeed(
							descriptor._tag === "Nominal" && descriptor.name === "Opaque"
								? HookOutcome.applied<SchemaNode>({ kind: "bytes", nullable: false })
								: HookOutcome.notApplicable(),
						),
				});
				return yield* adapter.deriveSchema(OpaqueSchema);
			}),
		);
		expect(schema.root).toEqual({ kind: "bytes", nullable: false });
	});
});
