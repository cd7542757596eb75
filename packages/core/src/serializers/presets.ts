import type { AdapterPlugin } from "../plugins/plugin-types.js";
import { csvCodec } from "./codecs/csv.js";
import { jsonCodec } from "./codecs/json.js";
import { msgpackCodec } from "./codecs/msgpack.js";
import { packedCodec } from "./codecs/packed.js";
import { yamlCodec } from "./codecs/yaml.js";
import type { FormatCodec } from "./format-codec.js";

// ============================================================================
// Preset Codec Sets
// ============================================================================

/**
 * The codecs an adapter installs unless told otherwise:
 * - JSON (.json, .jsonl, .ndjson)
 * - YAML (.yaml, .yml)
 * - MessagePack (.msgpack, .mp)
 * - packed (.packed), schema-driven binary
 * - CSV (.csv), flat records only
 */
export const defaultCodecs = (): ReadonlyArray<FormatCodec> => [
	jsonCodec(),
	yamlCodec(),
	msgpackCodec(),
	packedCodec(),
	csvCodec(),
];

/**
 * Only the text formats (JSON, YAML and CSV).
 */
export const textCodecs = (): ReadonlyArray<FormatCodec> => [
	jsonCodec(),
	yamlCodec(),
	csvCodec(),
];

export const CODECS_PLUGIN_NAME = "codecs";

/**
 * Wraps a codec set as the plugin the adapter layer installs.
 *
 * @example
 * ```typescript
 * const layer = makeAdapterLayer({ codecs: textCodecs() })
 * ```
 */
export const codecsPlugin = (codecs: ReadonlyArray<FormatCodec>): AdapterPlugin => ({
	name: CODECS_PLUGIN_NAME,
	codecs,
});
