import { ConverterKey } from "../registry/converter-key.js";
import type { AdapterPlugin } from "../plugins/plugin-types.js";
import { KIND_CONVERTERS } from "./builtin-converters.js";
import {
	BIG_DECIMAL,
	BIG_INT,
	DATE,
	bigDecimalConverter,
	bigIntConverter,
	dateConverter,
	deriveLogicalSchema,
	resolveLogicalType,
} from "./logical-types.js";

export const BUILTIN_PLUGIN_NAME = "builtin";

/**
 * Converters for every structural kind, the logical types (`Schema.Int`,
 * bigint, Date, BigDecimal, Uint8Array) and their schema fragments.
 *
 * Kind converters sit at specificity 0 so that any converter a caller files
 * under a kind key with a higher specificity overrides them.
 */
export const builtinPlugin: AdapterPlugin = {
	name: BUILTIN_PLUGIN_NAME,
	converters: [
		...KIND_CONVERTERS.map(({ kind, converter }) => ({
			target: ConverterKey.kind(kind),
			converter,
			specificity: 0,
			name: `builtin:${kind.toLowerCase()}`,
		})),
		{ target: ConverterKey.named(DATE), converter: dateConverter, name: "builtin:date" },
		{ target: ConverterKey.named(BIG_INT), converter: bigIntConverter, name: "builtin:bigint" },
		{
			target: ConverterKey.named(BIG_DECIMAL),
			converter: bigDecimalConverter,
			name: "builtin:bigdecimal",
		},
	],
	hooks: [
		{ point: "resolveType", implementation: resolveLogicalType, name: "builtin:logical-types" },
		{ point: "deriveSchema", implementation: deriveLogicalSchema, name: "builtin:logical-schemas" },
	],
};
