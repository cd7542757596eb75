/**
 * Plugin system types.
 * Plugins contribute converters, hooks and format codecs to an adapter.
 */

import type { Schema } from "effect";
import type { TypeDescriptor } from "../descriptors/type-descriptor.js";
import type { AnyHookRegistration } from "../hooks/hook-types.js";
import type { ConverterKey } from "../registry/converter-key.js";
import type { RegisterConverterOptions } from "../registry/converter-registry.js";
import type { Converter } from "../registry/converter-types.js";
import type { FormatCodec } from "../serializers/format-codec.js";

// ============================================================================
// Registrations
// ============================================================================

/**
 * What a converter is filed for. A schema or a descriptor files it under
 * `ConverterKey.exact`; pass a key to target a name, shape, field set or
 * kind instead.
 */
export type ConverterTarget = Schema.Schema.Any | TypeDescriptor | ConverterKey;

export interface ConverterRegistration extends RegisterConverterOptions {
	readonly target: ConverterTarget;
	readonly converter: Converter;
}

export interface CodecRegistration {
	readonly codec: FormatCodec;
	/** Take over the name of an already registered codec */
	readonly replace?: boolean;
}

// ============================================================================
// Adapter Plugin Interface
// ============================================================================

/**
 * A bundle of registrations installed as a unit.
 *
 * Plugins are installed in dependency order: a plugin naming others in
 * `dependencies` is installed after them. Within a plugin, hooks are
 * registered first (so schema targets resolve through them), then
 * converters, then codecs.
 *
 * @example
 * ```ts
 * const moneyPlugin: AdapterPlugin = {
 *   name: "money",
 *   version: "1.0.0",
 *   converters: [{
 *     target: ConverterKey.named("Money"),
 *     converter: moneyConverter,
 *     name: "money:cents",
 *   }],
 *   hooks: [{ point: "deriveSchema", implementation: moneySchema }],
 * }
 * ```
 */
export interface AdapterPlugin {
	/** Plugin name (required, must be non-empty) */
	readonly name: string;
	/** Plugin version (optional, for informational purposes) */
	readonly version?: string;
	/** Plugin dependencies (names of plugins that must be installed first) */
	readonly dependencies?: ReadonlyArray<string>;
	readonly converters?: ReadonlyArray<ConverterRegistration>;
	readonly hooks?: ReadonlyArray<AnyHookRegistration>;
	/** Format codecs; a bare codec is registered without `replace` */
	readonly codecs?: ReadonlyArray<FormatCodec | CodecRegistration>;
}
