import { Config, type ConfigError, Effect, type LogLevel } from "effect";
import type { AdapterPlugin } from "../plugins/plugin-types.js";
import type { FormatCodec } from "../serializers/format-codec.js";

// ============================================================================
// Adapter Options
// ============================================================================

export interface AdapterOptions {
	/** Installed after the built-in plugin and the codecs, in dependency order */
	readonly plugins?: ReadonlyArray<AdapterPlugin>;
	/**
	 * Codecs to install. Defaults to `defaultCodecs()`; pass an empty array
	 * for an adapter without formats.
	 */
	readonly codecs?: ReadonlyArray<FormatCodec>;
	/** Largest number of non-null members a union may have */
	readonly maxUnionMembers?: number;
	/** Format used when a call names none */
	readonly defaultFormat?: string;
	/** Minimum level for the adapter's own registration logs */
	readonly logLevel?: LogLevel.LogLevel;
}

export interface ResolvedAdapterConfig {
	readonly maxUnionMembers: number;
	readonly defaultFormat: string;
}

export const DEFAULT_MAX_UNION_MEMBERS = 64;
export const DEFAULT_FORMAT = "json";

const maxUnionMembersConfig = Config.integer("ROUNDTRIP_MAX_UNION_MEMBERS").pipe(
	Config.validate({
		message: "ROUNDTRIP_MAX_UNION_MEMBERS must be a positive integer",
		validation: (value) => value > 0,
	}),
	Config.withDefault(DEFAULT_MAX_UNION_MEMBERS),
);

const defaultFormatConfig = Config.string("ROUNDTRIP_DEFAULT_FORMAT").pipe(
	Config.withDefault(DEFAULT_FORMAT),
);

/**
 * Fills settings the options leave out from the environment (through the
 * current ConfigProvider), then from the defaults.
 */
export const resolveAdapterConfig = (
	options: AdapterOptions,
): Effect.Effect<ResolvedAdapterConfig, ConfigError.ConfigError> =>
	Effect.gen(function* () {
		const maxUnionMembers =
			options.maxUnionMembers ?? (yield* maxUnionMembersConfig);
		const defaultFormat = options.defaultFormat ?? (yield* defaultFormatConfig);
		return { maxUnionMembers, defaultFormat };
	});
