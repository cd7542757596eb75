import { Encoding } from "effect";
import { mismatch } from "../../converters/converter-helpers.js";
import { DecodeError, EncodeError } from "../../errors/codec-errors.js";
import {
	Intermediate,
	type IntermediateValue,
	type MappingEntry,
	type MappingValue,
} from "../../intermediate/intermediate-value.js";
import { ROOT_PATH } from "../../registry/converter-types.js";
import {
	type Schema,
	type SchemaNode,
	dereference,
} from "../../schema/schema-types.js";
import { utf8Decode, utf8Encode } from "../bytes.js";
import type { FormatCodec } from "../format-codec.js";
import { type PlainRules, fromPlain } from "../plain-values.js";

const CSV_RULES: PlainRules = {
	format: "csv",
	bigInt: "text",
	nonFiniteAsText: true,
	bytesAsBase64: true,
};

const INTEGER_TEXT = /^-?\d+$/;
const SPECIAL_FLOATS = new Set(["NaN", "Infinity", "-Infinity", "-0"]);

// ============================================================================
// Writing
// ============================================================================

const cellText = (value: IntermediateValue, field: string): string => {
	switch (value._tag) {
		case "Null":
			return "";
		case "Boolean":
			return value.value ? "true" : "false";
		case "Int":
			return value.value.toString();
		case "Float":
			return Object.is(value.value, -0) ? "-0" : String(value.value);
		case "Text":
			return value.value;
		case "Bytes":
			return Encoding.encodeBase64(value.value);
		case "Sequence":
		case "Mapping":
			throw new EncodeError({
				format: "csv",
				message: `CSV cells must be scalar; field '${field}' holds a ${value._tag.toLowerCase()}`,
			});
	}
};

/**
 * Values containing commas, quotes or line breaks are wrapped in quotes,
 * with inner quotes doubled.
 */
const escapeCell = (text: string): string =>
	/[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;

const asRow = (value: IntermediateValue, index: number): MappingValue => {
	if (value._tag !== "Mapping") {
		throw new EncodeError({
			format: "csv",
			message: `CSV rows must be records; value ${index} is a ${value._tag.toLowerCase()}`,
		});
	}
	return value;
};

const writeTable = (values: ReadonlyArray<IntermediateValue>): string => {
	if (values.length === 0) {
		return "";
	}
	const rows = values.map(asRow);

	// columns in first-seen order across all rows
	const columns: Array<string> = [];
	for (const row of rows) {
		for (const [key] of row.entries) {
			if (!columns.includes(key)) {
				columns.push(key);
			}
		}
	}

	const lines = rows.map((row) => {
		const cells = new Map(row.entries);
		return columns
			.map((column) => {
				const cell = cells.get(column);
				return cell === undefined ? "" : escapeCell(cellText(cell, column));
			})
			.join(",");
	});

	return `${[columns.map(escapeCell).join(","), ...lines].join("\n")}\n`;
};

// ============================================================================
// Parsing
// ============================================================================

/**
 * Splits CSV text into rows of cells. Quoted cells may hold commas,
 * doubled quotes and line breaks; rows end with LF or CRLF.
 */
const parseRows = (text: string): ReadonlyArray<ReadonlyArray<string>> => {
	const rows: Array<Array<string>> = [];
	let row: Array<string> = [];
	let cell = "";
	let quoted = false;
	let index = 0;

	const endRow = () => {
		row.push(cell);
		rows.push(row);
		row = [];
		cell = "";
	};

	while (index < text.length) {
		const char = text[index];
		if (quoted) {
			if (char === '"' && text[index + 1] === '"') {
				cell += '"';
				index += 2;
				continue;
			}
			if (char === '"') {
				quoted = false;
			} else {
				cell += char;
			}
			index += 1;
			continue;
		}
		if (char === '"' && cell === "") {
			quoted = true;
		} else if (char === ",") {
			row.push(cell);
			cell = "";
		} else if (char === "\n") {
			endRow();
		} else if (char === "\r" && text[index + 1] === "\n") {
			endRow();
			index += 1;
		} else {
			cell += char;
		}
		index += 1;
	}

	if (quoted) {
		throw new DecodeError({ format: "csv", message: "Unterminated quoted cell" });
	}
	if (cell !== "" || row.length > 0) {
		endRow();
	}
	return rows;
};

/**
 * Turns a cell into the plain value its schema node reads. Empty cells
 * are null for nullable nodes, "" for text and absent otherwise, so
 * defaults apply.
 */
const cellValue = (text: string, target: SchemaNode, schema: Schema): unknown => {
	const node = dereference(schema, target);
	if (text === "") {
		if (node.nullable || node.kind === "null") {
			return null;
		}
		return node.kind === "text" ? "" : undefined;
	}
	switch (node.kind) {
		case "boolean":
			return text === "true" ? true : text === "false" ? false : text;
		case "float":
			return SPECIAL_FLOATS.has(text) || Number.isNaN(Number(text)) ? text : Number(text);
		case "union": {
			const kinds = node.branches.map((branch) => dereference(schema, branch).kind);
			if ((text === "true" || text === "false") && kinds.includes("boolean")) {
				return text === "true";
			}
			if (INTEGER_TEXT.test(text) && kinds.includes("int")) {
				return BigInt(text);
			}
			if (kinds.includes("float") && !Number.isNaN(Number(text))) {
				return Number(text);
			}
			return text;
		}
		default:
			return text;
	}
};

const columnNode = (schema: Schema, column: string): SchemaNode | undefined => {
	const root = dereference(schema, schema.root);
	if (root.kind === "record") {
		return root.fields.find((field) => field.name === column)?.node;
	}
	return root.kind === "mapping" ? root.values : undefined;
};

const readTable = (
	bytes: Uint8Array,
	schema: Schema | undefined,
	pathOf: (index: number) => string,
): ReadonlyArray<IntermediateValue> => {
	const [header, ...rows] = parseRows(utf8Decode(bytes));
	if (header === undefined) {
		return [];
	}

	if (schema !== undefined) {
		const root = dereference(schema, schema.root);
		if (root.kind !== "record" && root.kind !== "mapping") {
			throw mismatch(ROOT_PATH, root.kind, "a CSV row");
		}
	}

	return rows.map((cells, index) => {
		if (cells.length !== header.length) {
			throw new DecodeError({
				format: "csv",
				message: `Row ${index + 1} has ${cells.length} cells, the header has ${header.length}`,
			});
		}
		if (schema === undefined) {
			return Intermediate.fromEntries(
				header.map(
					(column, position): MappingEntry => [column, Intermediate.text(cells[position])],
				),
			);
		}
		const plain: Record<string, unknown> = {};
		header.forEach((column, position) => {
			const node = columnNode(schema, column);
			const value =
				node === undefined ? cells[position] : cellValue(cells[position], node, schema);
			if (value !== undefined) {
				plain[column] = value;
			}
		});
		return fromPlain(plain, schema.root, schema, CSV_RULES, pathOf(index));
	});
};

// ============================================================================
// Codec
// ============================================================================

/**
 * Creates a CSV codec for flat records: a header row of field names, then
 * one row per record. Cells hold scalars only; a field holding a sequence
 * or a nested record fails with EncodeError.
 *
 * Null and the empty string share the empty cell. With a schema, cells
 * are read back as the field's type; without one every cell is text.
 *
 * @example
 * ```typescript
 * const codec = csvCodec()
 * const bytes = codec.encodeMany?.(rows, schema)
 * ```
 */
export const csvCodec = (): FormatCodec => ({
	name: "csv",
	extensions: ["csv"],
	requiresSchema: false,
	encode: (value) => utf8Encode(writeTable([value])),
	decode: (bytes, schema) => {
		const rows = readTable(bytes, schema, () => ROOT_PATH);
		if (rows.length !== 1) {
			throw new DecodeError({
				format: "csv",
				message: `Expected one CSV row, found ${rows.length}`,
			});
		}
		return rows[0];
	},
	encodeMany: (values) => utf8Encode(writeTable(values)),
	decodeMany: (bytes, schema) =>
		readTable(bytes, schema, (index) => `${ROOT_PATH}[${index}]`),
});
