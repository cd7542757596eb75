/**
 * Pick built-in codecs by format name or file extension.
 */

import { Effect } from "effect";
import { UnsupportedFormatError } from "../errors/codec-errors.js";
import { csvCodec } from "./codecs/csv.js";
import { jsonCodec } from "./codecs/json.js";
import { msgpackCodec } from "./codecs/msgpack.js";
import { packedCodec } from "./codecs/packed.js";
import { yamlCodec } from "./codecs/yaml.js";
import type { FormatCodec } from "./format-codec.js";

const CODEC_FACTORIES: Readonly<Record<string, () => FormatCodec>> = {
	json: () => jsonCodec(),
	jsonl: () => jsonCodec(),
	ndjson: () => jsonCodec(),
	yaml: () => yamlCodec(),
	yml: () => yamlCodec(),
	msgpack: () => msgpackCodec(),
	mp: () => msgpackCodec(),
	packed: () => packedCodec(),
	csv: () => csvCodec(),
};

export const BUILTIN_FORMATS: ReadonlyArray<string> = Object.keys(CODEC_FACTORIES);

/**
 * Infer which built-in FormatCodec instances are needed for a list of
 * format names or extensions (with or without a leading dot).
 *
 * Names that map to the same codec yield it once, in first-seen order.
 * An unknown name fails with UnsupportedFormatError.
 */
export const inferCodecs = (
	formats: ReadonlyArray<string>,
): Effect.Effect<ReadonlyArray<FormatCodec>, UnsupportedFormatError> =>
	Effect.gen(function* () {
		const seen = new Set<string>();
		const codecs: FormatCodec[] = [];

		for (const format of formats) {
			const key = format.replace(/^\./, "").toLowerCase();
			const factory = Object.hasOwn(CODEC_FACTORIES, key)
				? CODEC_FACTORIES[key]
				: undefined;
			if (factory === undefined) {
				return yield* Effect.fail(
					new UnsupportedFormatError({
						format,
						message: `Unknown built-in format '${format}'. Known formats: ${BUILTIN_FORMATS.join(", ")}`,
					}),
				);
			}

			const codec = factory();
			if (!seen.has(codec.name)) {
				seen.add(codec.name);
				codecs.push(codec);
			}
		}

		return codecs;
	});
