import { Effect, Equal, Hash, Option, Schema } from "effect";
import { describe, expect, it } from "vitest";
import { resolveLogicalType } from "../src/converters/logical-types.js";
import { type ResolverEnv, resolveSchema } from "../src/descriptors/resolver.js";
import {
	Descriptor,
	type TypeDescriptor,
	formatDescriptor,
} from "../src/descriptors/type-descriptor.js";

const makeEnv = (maxUnionMembers = 64): ResolverEnv => ({
	hooks: [
		{ implementation: resolveLogicalType, order: 0, sequence: 0, name: "logical" },
	],
	maxUnionMembers,
	cache: new Map(),
});

const resolve = <A, I>(schema: Schema.Schema<A, I, never>, env = makeEnv()) =>
	Effect.runSync(resolveSchema(schema, env));

const resolveError = <A, I>(schema: Schema.Schema<A, I, never>, env = makeEnv()) =>
	Effect.runSync(Effect.flip(resolveSchema(schema, env)));

const expectDescriptor = (actual: TypeDescriptor, expected: TypeDescriptor) => {
	expect(formatDescriptor(actual)).toBe(formatDescriptor(expected));
	expect(Equal.equals(actual, expected)).toBe(true);
};

describe("resolveSchema", () => {
	describe("scalars", () => {
		it("maps keywords to their kinds", () => {
			expectDescriptor(resolve(Schema.String), Descriptor.text());
			expectDescriptor(resolve(Schema.Number), Descriptor.float());
			expectDescriptor(resolve(Schema.Boolean), Descriptor.boolean());
			expectDescriptor(resolve(Schema.Null), Descriptor.null());
		});

		it("resolves logical types through the resolve hook", () => {
			expectDescriptor(resolve(Schema.Int), Descriptor.int());
			expectDescriptor(resolve(Schema.Int.pipe(Schema.positive())), Descriptor.int());
			expectDescriptor(resolve(Schema.BigIntFromSelf), Descriptor.nominal("BigInt"));
			expectDescriptor(resolve(Schema.DateFromSelf), Descriptor.nominal("Date"));
			expectDescriptor(resolve(Schema.Uint8ArrayFromSelf), Descriptor.bytes());
		});

		it("resolves transformations by their type side", () => {
			expectDescriptor(resolve(Schema.NumberFromString), Descriptor.float());
		});
	});

	describe("optional normalization", () => {
		it("resolves NullOr and both union orders to the same descriptor", () => {
			const expected = Descriptor.optional(Descriptor.text(), "null");
			expectDescriptor(resolve(Schema.NullOr(Schema.String)), expected);
			expectDescriptor(resolve(Schema.Union(Schema.String, Schema.Null)), expected);
			expectDescriptor(resolve(Schema.Union(Schema.Null, Schema.String)), expected);
		});

		it("spells an undefined-only absence as undefined", () => {
			expectDescriptor(
				resolve(Schema.UndefinedOr(Schema.Number)),
				Descriptor.optional(Descriptor.float(), "undefined"),
			);
		});

		it("keeps the remaining members of a wider union together", () => {
			expectDescriptor(
				resolve(Schema.Union(Schema.String, Schema.Number, Schema.Null)),
				Descriptor.optional(
					Descriptor.union([Descriptor.text(), Descriptor.float()]),
					"null",
				),
			);
		});

		it("does not wrap an optional twice", () => {
			expectDescriptor(
				resolve(Schema.NullOr(Schema.NullOr(Schema.Boolean))),
				Descriptor.optional(Descriptor.boolean(), "null"),
			);
		});
	});

	describe("enums", () => {
		it("collapses literal unions into one enum", () => {
			expectDescriptor(
				resolve(Schema.Literal("draft", "published")),
				Descriptor.enum([
					{ symbol: "draft", value: "draft" },
					{ symbol: "published", value: "published" },
				]),
			);
		});

		it("uses member names of Schema.Enums as symbols", () => {
			const Color = { Red: "red", Green: "green" } as const;
			expectDescriptor(
				resolve(Schema.Enums(Color).annotations({ identifier: "Color" })),
				Descriptor.enum(
					[
						{ symbol: "Red", value: "red" },
						{ symbol: "Green", value: "green" },
					],
					Option.some("Color"),
				),
			);
		});

		it("rejects literals whose symbols collide", () => {
			const error = resolveError(Schema.Literal(1, "1"));
			expect(error._tag).toBe("UnsupportedTypeError");
			expect(error.reason).toBe("duplicate enum symbol '1'");
		});
	});

	describe("records", () => {
		it("resolves fields in declaration order with their flags", () => {
			const Profile = Schema.Struct({
				name: Schema.String,
				nickname: Schema.optional(Schema.String),
				tags: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
			}).annotations({ identifier: "Profile" });

			const descriptor = resolve(Profile);
			expect(formatDescriptor(descriptor)).toBe("record Profile");
			if (descriptor._tag !== "Record") {
				throw new Error("expected a record");
			}
			expect(descriptor.fields.map((field) => field.name)).toEqual([
				"name",
				"nickname",
				"tags",
			]);
			expect(descriptor.fields.map((field) => field.optional)).toEqual([
				false,
				true,
				false,
			]);
			expect(descriptor.fields.map((field) => formatDescriptor(field.type))).toEqual([
				"text",
				"optional<text>",
				"sequence<text>",
			]);

			const tags = descriptor.fields[2];
			expect(Option.isSome(tags.default)).toBe(true);
			expect(Option.getOrThrow(tags.default)).toEqual([]);
			expect(Option.isNone(descriptor.fields[0].default)).toBe(true);
		});

		it("gives equal declarations equal descriptors", () => {
			const first = resolve(Schema.Struct({ x: Schema.Number, y: Schema.Number }));
			const second = resolve(Schema.Struct({ x: Schema.Number, y: Schema.Number }));
			expect(Equal.equals(first, second)).toBe(true);
			expect(Hash.hash(first)).toBe(Hash.hash(second));
		});

		it("resolves string-keyed records to mappings", () => {
			expectDescriptor(
				resolve(Schema.Record({ key: Schema.String, value: Schema.NullOr(Schema.Int) })),
				Descriptor.mapping(Descriptor.optional(Descriptor.int(), "null")),
			);
		});
	});

	describe("recursion", () => {
		interface Category {
			readonly name: string;
			readonly children: ReadonlyArray<Category>;
		}

		const Category: Schema.Schema<Category> = Schema.Struct({
			name: Schema.String,
			children: Schema.Array(Schema.suspend((): Schema.Schema<Category> => Category)),
		}).annotations({ identifier: "Category" });

		it("turns the back reference into a ref", () => {
			expectDescriptor(
				resolve(Category),
				Descriptor.record(
					[
						{ name: "name", type: Descriptor.text() },
						{
							name: "children",
							type: Descriptor.sequence(Descriptor.ref("Category")),
						},
					],
					Option.some("Category"),
				),
			);
		});
	});

	describe("unsupported constructs", () => {
		it("reports constructs without a representation", () => {
			const error = resolveError(Schema.Unknown);
			expect(error.reason).toBe("unsupported construct UnknownKeyword");
		});

		it("enforces the union member limit", () => {
			const error = resolveError(
				Schema.Union(Schema.String, Schema.Number, Schema.Boolean),
				makeEnv(2),
			);
			expect(error.reason).toBe("union has 3 members, more than the limit of 2");
		});

		it("needs an identifier on declarations", () => {
			const Opaque = Schema.declare((input: unknown): input is symbol => typeof input === "symbol");
			const error = resolveError(Opaque);
			expect(error.reason).toBe("declaration without an identifier");
		});

		it("resolves a declaration with an identifier to a nominal type", () => {
			class Money {
				constructor(readonly cents: number) {}
			}
			const MoneySchema = Schema.declare(
				(input: unknown): input is Money => input instanceof Money,
				{ identifier: "Money" },
			);
			expectDescriptor(resolve(MoneySchema), Descriptor.nominal("Money"));
		});
	});
});
