import { Effect, Option, Schema } from "effect";
import { describe, expect, it } from "vitest";
import { makeAdapterLayer } from "../src/adapter/adapter-layer.js";
import { TypeAdapter, type TypeAdapterShape } from "../src/adapter/adapter-service.js";
import { DecodeError, EncodeError } from "../src/errors/codec-errors.js";
import { Intermediate } from "../src/intermediate/intermediate-value.js";
import type { Schema as DerivedSchema } from "../src/schema/schema-types.js";
import { csvCodec } from "../src/serializers/codecs/csv.js";
import { textCodecs } from "../src/serializers/presets.js";

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);
const bytesOf = (source: string): Uint8Array => new TextEncoder().encode(source);

const codec = csvCodec();

const encodeMany = codec.encodeMany;
const decodeMany = codec.decodeMany;
if (encodeMany === undefined || decodeMany === undefined) {
	throw new Error("csv codec must support several values");
}

const Crew: DerivedSchema = {
	root: { kind: "ref", name: "Crew", nullable: false },
	definitions: {
		Crew: {
			kind: "record",
			name: "Crew",
			nullable: false,
			fields: [
				{
					name: "name",
					node: { kind: "text", nullable: false },
					optional: false,
					default: Option.none(),
				},
				{
					name: "size",
					node: { kind: "int", nullable: false },
					optional: false,
					default: Option.none(),
				},
				{
					name: "ratio",
					node: { kind: "float", nullable: true },
					optional: false,
					default: Option.none(),
				},
				{
					name: "active",
					node: { kind: "boolean", nullable: false },
					optional: false,
					default: Option.some(Intermediate.boolean(true)),
				},
			],
		},
	},
};

describe("csvCodec", () => {
	it("writes one record as a header and a row", () => {
		const value = Intermediate.mapping([
			["name", Intermediate.text("Elvira")],
			["size", Intermediate.int(12)],
			["ratio", Intermediate.null()],
		]);
		expect(text(codec.encode(value, undefined))).toBe("name,size,ratio\nElvira,12,\n");
	});

	it("quotes cells holding commas, quotes or line breaks", () => {
		const value = Intermediate.mapping([
			["name", Intermediate.text('Bow, "North"')],
			["note", Intermediate.text("two\nlines")],
		]);
		const encoded = codec.encode(value, undefined);
		expect(text(encoded)).toBe('name,note\n"Bow, ""North""","two\nlines"\n');
		expect(codec.decode(encoded, undefined)).toEqual(value);
	});

	it("writes the columns of every record in first-seen order", () => {
		const rows = [
			Intermediate.mapping([["a", Intermediate.int(1)]]),
			Intermediate.mapping([["b", Intermediate.boolean(false)]]),
		];
		expect(text(encodeMany(rows, undefined))).toBe("a,b\n1,\n,false\n");
	});

	it("rejects fields that hold sequences or records", () => {
		const value = Intermediate.mapping([
			["name", Intermediate.text("Elvira")],
			["tags", Intermediate.sequence([Intermediate.text("x")])],
		]);
		expect(() => codec.encode(value, undefined)).toThrow(EncodeError);
		expect(() => codec.encode(value, undefined)).toThrow(
			"CSV cells must be scalar; field 'tags' holds a sequence",
		);

		const nested = Intermediate.mapping([["home", Intermediate.mapping([])]]);
		expect(() => codec.encode(nested, undefined)).toThrow(
			"CSV cells must be scalar; field 'home' holds a mapping",
		);
	});

	it("rejects values that are not records", () => {
		expect(() => codec.encode(Intermediate.int(1), undefined)).toThrow(
			"CSV rows must be records; value 0 is a int",
		);
	});

	it("reads every cell as text without a schema", () => {
		expect(codec.decode(bytesOf("name,size\r\nElvira,12\r\n"), undefined)).toEqual(
			Intermediate.mapping([
				["name", Intermediate.text("Elvira")],
				["size", Intermediate.text("12")],
			]),
		);
	});

	it("reads cells as their field types with a schema", () => {
		expect(codec.decode(bytesOf("name,size,ratio,active\nElvira,12,,false\n"), Crew)).toEqual(
			Intermediate.mapping([
				["name", Intermediate.text("Elvira")],
				["size", Intermediate.int(12)],
				["ratio", Intermediate.null()],
				["active", Intermediate.boolean(false)],
			]),
		);
		expect(codec.decode(bytesOf("name,size,ratio\n,7,NaN\n"), Crew)).toEqual(
			Intermediate.mapping([
				["name", Intermediate.text("")],
				["size", Intermediate.int(7)],
				["ratio", Intermediate.float(Number.NaN)],
				["active", Intermediate.boolean(true)],
			]),
		);
	});

	it("reports cells that do not fit their field", () => {
		expect(() => codec.decode(bytesOf("name,size\nElvira,many\n"), Crew)).toThrow(
			"Expected int at $.size, received string",
		);
	});

	it("fails on malformed tables", () => {
		expect(() => codec.decode(bytesOf("a,b\n1\n"), undefined)).toThrow(
			"Row 1 has 1 cells, the header has 2",
		);
		expect(() => codec.decode(bytesOf('a\n"open\n'), undefined)).toThrow(DecodeError);
		expect(() => codec.decode(bytesOf("a\n1\n2\n"), undefined)).toThrow(
			"Expected one CSV row, found 2",
		);
	});

	it("reads several rows", () => {
		expect(decodeMany(bytesOf("name,size\nA,1\nB,2\n"), Crew)).toEqual([
			Intermediate.mapping([
				["name", Intermediate.text("A")],
				["size", Intermediate.int(1)],
				["active", Intermediate.boolean(true)],
			]),
			Intermediate.mapping([
				["name", Intermediate.text("B")],
				["size", Intermediate.int(2)],
				["active", Intermediate.boolean(true)],
			]),
		]);
		expect(decodeMany(new Uint8Array(), undefined)).toEqual([]);
	});
});

// ============================================================================
// Through the adapter
// ============================================================================

class Vessel extends Schema.Class<Vessel>("Vessel")({
	name: Schema.String,
	launched: Schema.NullOr(Schema.DateFromSelf),
}) {}

const withTextAdapter = <A, E>(f: (adapter: TypeAdapterShape) => Effect.Effect<A, E>) =>
	Effect.runPromise(
		Effect.provide(Effect.flatMap(TypeAdapter, f), makeAdapterLayer({ codecs: textCodecs() })),
	);

describe("csv through the adapter", () => {
	const launched = new Date(Date.UTC(1970, 11, 31));
	const vessel = new Vessel({ name: "Elvira", launched });

	it("writes one record and reads it back", async () => {
		const { bytes, loaded } = await withTextAdapter((adapter) =>
			Effect.gen(function* () {
				const bytes = yield* adapter.dump(Vessel, vessel, "csv");
				const loaded = yield* adapter.load(Vessel, bytes, "csv");
				return { bytes, loaded };
			}),
		);
		expect(text(bytes).split("\n")).toEqual(["name,launched", "Elvira,31449600000", ""]);
		expect(loaded).toBeInstanceOf(Vessel);
		expect(loaded.name).toBe("Elvira");
		expect(loaded.launched?.getTime()).toBe(launched.getTime());
	});

	it("writes many records under one header", async () => {
		const { bytes, loaded } = await withTextAdapter((adapter) =>
			Effect.gen(function* () {
				const bytes = yield* adapter.dumpMany(
					Vessel,
					[vessel, new Vessel({ name: "Ada", launched: null })],
					"csv",
				);
				const loaded = yield* adapter.loadMany(Vessel, bytes, "csv");
				return { bytes, loaded };
			}),
		);
		expect(text(bytes)).toBe("name,launched\nElvira,31449600000\nAda,\n");
		expect(loaded.map((item) => item.name)).toEqual(["Elvira", "Ada"]);
		expect(loaded[1].launched).toBeNull();
	});

	it("rejects records with nested fields", async () => {
		const Fleet = Schema.Struct({ name: Schema.String, ships: Schema.Array(Schema.String) });
		const error = await withTextAdapter((adapter) =>
			Effect.flip(adapter.dump(Fleet, { name: "North", ships: ["Ada"] }, "csv")),
		);
		expect(error._tag).toBe("EncodeError");
		expect(error.message).toBe("CSV cells must be scalar; field 'ships' holds a sequence");
	});

	it("installs only the text formats", async () => {
		const formats = await withTextAdapter((adapter) => adapter.formats());
		expect(formats.map((format) => format.name)).toEqual(["json", "yaml", "csv"]);
	});
});
