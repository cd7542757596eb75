import { Option } from "effect";
import { Packr } from "msgpackr";
import { describe, expect, it } from "vitest";
import { EncodeError } from "../src/errors/codec-errors.js";
import { SchemaMismatchError } from "../src/errors/conversion-errors.js";
import { Intermediate } from "../src/intermediate/intermediate-value.js";
import type {
	Schema as DerivedSchema,
	SchemaField,
	SchemaNode,
} from "../src/schema/schema-types.js";
import { packedCodec } from "../src/serializers/codecs/packed.js";

const packr = new Packr({ useRecords: false, mapsAsObjects: true, useBigInt64: true });
const unpack = (bytes: Uint8Array): unknown => packr.unpack(bytes);

const INT: SchemaNode = { kind: "int", nullable: false };

const required = (name: string, node: SchemaNode): SchemaField => ({
	name,
	node,
	optional: false,
	default: Option.none(),
});

const recordSchema = (fields: ReadonlyArray<SchemaField>): DerivedSchema => ({
	root: { kind: "ref", name: "Point", nullable: false },
	definitions: {
		Point: { kind: "record", name: "Point", nullable: false, fields },
	},
});

const PointV1 = recordSchema([required("x", INT), required("y", INT)]);

const PointV2 = recordSchema([
	required("x", INT),
	required("y", INT),
	{
		name: "label",
		node: { kind: "text", nullable: false },
		optional: false,
		default: Option.some(Intermediate.text("origin")),
	},
]);

const point = (x: number, y: number) =>
	Intermediate.mapping([
		["x", Intermediate.int(x)],
		["y", Intermediate.int(y)],
	]);

describe("packedCodec", () => {
	const codec = packedCodec();

	it("writes records as positional rows", () => {
		expect(unpack(codec.encode(point(1, 2), PointV1))).toEqual([1, 2]);
	});

	it("drops trailing absent fields", () => {
		const schema = recordSchema([
			required("x", INT),
			{
				name: "note",
				node: { kind: "text", nullable: true },
				optional: true,
				default: Option.none(),
			},
		]);
		const value = Intermediate.mapping([["x", Intermediate.int(7)]]);
		const encoded = codec.encode(value, schema);
		expect(unpack(encoded)).toEqual([7]);
		expect(codec.decode(encoded, schema)).toEqual(value);
	});

	it("decodes rows written before a field with a default was added", () => {
		const encoded = codec.encode(point(3, 4), PointV1);
		expect(codec.decode(encoded, PointV2)).toEqual(
			Intermediate.mapping([
				["x", Intermediate.int(3)],
				["y", Intermediate.int(4)],
				["label", Intermediate.text("origin")],
			]),
		);
	});

	it("fails for a short row missing a required field", () => {
		const encoded = packr.pack([1]);
		expect(() => codec.decode(encoded, PointV1)).toThrow(SchemaMismatchError);
		expect(() => codec.decode(encoded, PointV1)).toThrow(
			"Expected int at $.y, received nothing",
		);
	});

	it("does not write keys the record does not declare", () => {
		const value = Intermediate.mapping([
			["x", Intermediate.int(1)],
			["y", Intermediate.int(2)],
			["z", Intermediate.int(3)],
		]);
		expect(codec.decode(codec.encode(value, PointV1), PointV1)).toEqual(point(1, 2));
	});

	it("writes enums as symbol indexes", () => {
		const schema: DerivedSchema = {
			root: { kind: "enum", nullable: false, symbols: ["low", "high"] },
			definitions: {},
		};
		const encoded = codec.encode(Intermediate.text("high"), schema);
		expect(unpack(encoded)).toBe(1);
		expect(codec.decode(encoded, schema)).toEqual(Intermediate.text("high"));
		expect(() => codec.encode(Intermediate.text("medium"), schema)).toThrow(
			"Expected one of low, high at $, received Text(\"medium\")",
		);
	});

	it("tags union values with their branch", () => {
		const schema: DerivedSchema = {
			root: {
				kind: "union",
				nullable: false,
				branches: [{ kind: "text", nullable: false }, INT],
			},
			definitions: {},
		};
		const encoded = codec.encode(Intermediate.int(5), schema);
		expect(unpack(encoded)).toEqual([1, 5]);
		expect(codec.decode(encoded, schema)).toEqual(Intermediate.int(5));
	});

	it("writes floats as eight big-endian bytes", () => {
		const schema: DerivedSchema = {
			root: { kind: "float", nullable: false },
			definitions: {},
		};
		const encoded = codec.encode(Intermediate.float(1.5), schema);
		expect(Array.from(new Uint8Array(encoded.subarray(encoded.length - 8)))).toEqual([
			0x3f, 0xf8, 0, 0, 0, 0, 0, 0,
		]);
		expect(codec.decode(encoded, schema)).toEqual(Intermediate.float(1.5));

		const decoded = codec.decode(codec.encode(Intermediate.float(-0), schema), schema);
		expect(decoded._tag === "Float" && Object.is(decoded.value, -0)).toBe(true);
	});

	it("needs a schema", () => {
		expect(() => codec.encode(point(1, 2), undefined)).toThrow(EncodeError);
		expect(() => codec.encode(point(1, 2), undefined)).toThrow(
			"The packed format needs a schema",
		);
	});

	it("writes and reads several rows", () => {
		const encodeMany = codec.encodeMany;
		const decodeMany = codec.decodeMany;
		if (encodeMany === undefined || decodeMany === undefined) {
			throw new Error("packed codec must support several values");
		}
		const values = [point(1, 2), point(3, 4)];
		expect(decodeMany(encodeMany(values, PointV1), PointV1)).toEqual(values);
	});
});
