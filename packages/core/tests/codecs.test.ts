import { Option } from "effect";
import { describe, expect, it } from "vitest";
import { DecodeError } from "../src/errors/codec-errors.js";
import { NumericRangeError, SchemaMismatchError } from "../src/errors/conversion-errors.js";
import { Intermediate } from "../src/intermediate/intermediate-value.js";
import type { Schema as DerivedSchema, SchemaNode } from "../src/schema/schema-types.js";
import { jsonCodec } from "../src/serializers/codecs/json.js";
import { msgpackCodec } from "../src/serializers/codecs/msgpack.js";
import { yamlCodec } from "../src/serializers/codecs/yaml.js";

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);
const bytesOf = (source: string): Uint8Array => new TextEncoder().encode(source);

const schemaOf = (root: SchemaNode): DerivedSchema => ({ root, definitions: {} });

const field = (name: string, node: SchemaNode) => ({
	name,
	node,
	optional: false,
	default: Option.none(),
});

const measurement = schemaOf({
	kind: "record",
	nullable: false,
	fields: [
		field("id", { kind: "int", nullable: false }),
		field("reading", { kind: "float", nullable: false }),
		field("raw", { kind: "bytes", nullable: false }),
	],
});

// ============================================================================
// JSON
// ============================================================================

describe("jsonCodec", () => {
	const codec = jsonCodec();

	it("writes compact JSON by default", () => {
		const value = Intermediate.mapping([
			["name", Intermediate.text("Ada")],
			["n", Intermediate.int(1)],
			["ok", Intermediate.boolean(true)],
			["none", Intermediate.null()],
		]);
		expect(text(codec.encode(value, undefined))).toBe(
			'{"name":"Ada","n":1,"ok":true,"none":null}',
		);
	});

	it("indents when asked", () => {
		const value = Intermediate.mapping([["a", Intermediate.int(1)]]);
		expect(text(jsonCodec({ indent: 2 }).encode(value, undefined))).toBe('{\n  "a": 1\n}');
	});

	it("writes values JSON cannot hold as strings", () => {
		const value = Intermediate.mapping([
			["id", Intermediate.int(2n ** 64n)],
			["reading", Intermediate.float(Number.NaN)],
			["raw", Intermediate.bytes(new Uint8Array([1, 2, 3]))],
		]);
		expect(text(codec.encode(value, undefined))).toBe(
			'{"id":"18446744073709551616","reading":"NaN","raw":"AQID"}',
		);
	});

	it("restores them when decoding with a schema", () => {
		const decoded = codec.decode(
			bytesOf('{"id":"18446744073709551616","reading":"-0","raw":"AQID"}'),
			measurement,
		);
		expect(decoded._tag).toBe("Mapping");
		if (decoded._tag === "Mapping") {
			const [id, [, reading], raw] = decoded.entries;
			expect(id).toEqual(["id", Intermediate.int(2n ** 64n)]);
			expect(reading._tag).toBe("Float");
			expect(reading._tag === "Float" && Object.is(reading.value, -0)).toBe(true);
			expect(raw).toEqual(["raw", Intermediate.bytes(new Uint8Array([1, 2, 3]))]);
		}
	});

	it("takes values at face value without a schema", () => {
		expect(codec.decode(bytesOf('{"a":1,"b":1.5,"c":"AQID"}'), undefined)).toEqual(
			Intermediate.mapping([
				["a", Intermediate.int(1)],
				["b", Intermediate.float(1.5)],
				["c", Intermediate.text("AQID")],
			]),
		);
	});

	it("fills defaults and keeps unknown keys", () => {
		const schema = schemaOf({
			kind: "record",
			nullable: false,
			fields: [
				field("x", { kind: "int", nullable: false }),
				{
					name: "label",
					node: { kind: "text", nullable: false },
					optional: false,
					default: Option.some(Intermediate.text("origin")),
				},
			],
		});
		expect(codec.decode(bytesOf('{"x":1,"extra":true}'), schema)).toEqual(
			Intermediate.mapping([
				["x", Intermediate.int(1)],
				["label", Intermediate.text("origin")],
				["extra", Intermediate.boolean(true)],
			]),
		);
	});

	it("rejects values that do not fit the schema", () => {
		expect(() => codec.decode(bytesOf('{"id":"ten","reading":1,"raw":""}'), measurement)).toThrow(
			SchemaMismatchError,
		);
		expect(() => codec.decode(bytesOf('{"id":"ten","reading":1,"raw":""}'), measurement)).toThrow(
			"Expected int at $.id, received string",
		);
	});

	it("picks the union branch that fits", () => {
		const schema = schemaOf({
			kind: "union",
			nullable: false,
			branches: [
				{ kind: "int", nullable: false },
				{ kind: "text", nullable: false },
			],
		});
		expect(codec.decode(bytesOf('"hello"'), schema)).toEqual(Intermediate.text("hello"));
		expect(codec.decode(bytesOf("7"), schema)).toEqual(Intermediate.int(7));
	});

	it("writes and reads JSON Lines", () => {
		const values = [
			Intermediate.mapping([["a", Intermediate.int(1)]]),
			Intermediate.mapping([["a", Intermediate.int(2)]]),
		];
		const encodeMany = codec.encodeMany;
		const decodeMany = codec.decodeMany;
		if (encodeMany === undefined || decodeMany === undefined) {
			throw new Error("json codec must support several values");
		}
		const encoded = encodeMany(values, undefined);
		expect(text(encoded)).toBe('{"a":1}\n{"a":2}\n');
		expect(decodeMany(bytesOf('{"a":1}\n\n{"a":2}\n'), undefined)).toEqual(values);
	});
});

// ============================================================================
// YAML
// ============================================================================

describe("yamlCodec", () => {
	const codec = yamlCodec();

	it("writes block mappings", () => {
		const value = Intermediate.mapping([
			["name", Intermediate.text("Ada")],
			["age", Intermediate.int(36)],
		]);
		expect(text(codec.encode(value, undefined))).toBe("name: Ada\nage: 36\n");
	});

	it("reads integers without losing precision", () => {
		expect(codec.decode(bytesOf("big: 123456789012345678901234567890\n"), undefined)).toEqual(
			Intermediate.mapping([["big", Intermediate.int(123456789012345678901234567890n)]]),
		);
	});

	it("uses YAML's own spelling of special floats", () => {
		expect(text(codec.encode(Intermediate.float(Number.POSITIVE_INFINITY), undefined))).toBe(
			".inf\n",
		);
		const decoded = codec.decode(bytesOf(".nan\n"), undefined);
		expect(decoded._tag === "Float" && Number.isNaN(decoded.value)).toBe(true);
	});

	it("reads an integral number as a float under a float node", () => {
		expect(codec.decode(bytesOf("3\n"), schemaOf({ kind: "float", nullable: false }))).toEqual(
			Intermediate.float(3),
		);
	});

	it("writes several values as a document stream", () => {
		const encodeMany = codec.encodeMany;
		const decodeMany = codec.decodeMany;
		if (encodeMany === undefined || decodeMany === undefined) {
			throw new Error("yaml codec must support several values");
		}
		const values = [
			Intermediate.mapping([["name", Intermediate.text("a")]]),
			Intermediate.mapping([["name", Intermediate.text("b")]]),
		];
		const encoded = encodeMany(values, undefined);
		expect(text(encoded)).toBe("---\nname: a\n---\nname: b\n");
		expect(decodeMany(encoded, undefined)).toEqual(values);
	});

	it("reports the document that fails to parse", () => {
		const decodeMany = codec.decodeMany;
		if (decodeMany === undefined) {
			throw new Error("yaml codec must support several values");
		}
		expect(() => decodeMany(bytesOf("a: [1, 2\n"), undefined)).toThrow(DecodeError);
		expect(() => decodeMany(bytesOf("a: [1, 2\n"), undefined)).toThrow(/^Document 0: /);
	});
});

// ============================================================================
// MessagePack
// ============================================================================

describe("msgpackCodec", () => {
	const codec = msgpackCodec();

	it("keeps bytes as bytes without a schema", () => {
		const value = Intermediate.mapping([
			["raw", Intermediate.bytes(new Uint8Array([9, 8]))],
			["n", Intermediate.int(5)],
		]);
		expect(codec.decode(codec.encode(value, undefined), undefined)).toEqual(value);
	});

	it("round-trips 64-bit integers and special floats", () => {
		const value = Intermediate.sequence([
			Intermediate.int(-(2n ** 63n)),
			Intermediate.float(Number.NEGATIVE_INFINITY),
			Intermediate.float(0.25),
			Intermediate.bytes(new Uint8Array([1])),
		]);
		expect(codec.decode(codec.encode(value, undefined), undefined)).toEqual(value);
	});

	it("fails for integers beyond 64 bits", () => {
		const value = Intermediate.mapping([["n", Intermediate.int(2n ** 63n)]]);
		expect(() => codec.encode(value, undefined)).toThrow(NumericRangeError);
		expect(() => codec.encode(value, undefined)).toThrow(
			"Value 9223372036854775808 at $.n does not fit a signed 64-bit integer",
		);
	});

	it("writes several values back to back", () => {
		const encodeMany = codec.encodeMany;
		const decodeMany = codec.decodeMany;
		if (encodeMany === undefined || decodeMany === undefined) {
			throw new Error("msgpack codec must support several values");
		}
		const values = [Intermediate.text("a"), Intermediate.int(2), Intermediate.null()];
		expect(decodeMany(encodeMany(values, undefined), undefined)).toEqual(values);
	});
});
