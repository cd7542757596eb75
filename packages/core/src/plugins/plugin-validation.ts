/**
 * Plugin validation functions.
 * Validates that plugins conform to the AdapterPlugin interface and that
 * their dependencies can be satisfied.
 */

import { Effect } from "effect";
import { PluginError } from "../errors/plugin-errors.js";
import { HOOK_POINTS, type AnyHookRegistration } from "../hooks/hook-types.js";
import type { FormatCodec } from "../serializers/format-codec.js";
import type {
	AdapterPlugin,
	CodecRegistration,
	ConverterRegistration,
} from "./plugin-types.js";

// ============================================================================
// Plugin Validation
// ============================================================================

export const isCodecRegistration = (
	entry: FormatCodec | CodecRegistration,
): entry is CodecRegistration => "codec" in entry;

export const codecOf = (entry: FormatCodec | CodecRegistration): FormatCodec =>
	isCodecRegistration(entry) ? entry.codec : entry;

/**
 * Validates that a plugin conforms to the AdapterPlugin interface.
 *
 * Checks:
 * - `name` is a non-empty string
 * - `codecs` entries have `name`, `extensions`, `encode`, and `decode`
 * - `hooks` entries name a known hook point and carry a function
 * - `converters` entries carry both conversion functions
 */
export const validatePlugin = (
	plugin: AdapterPlugin,
): Effect.Effect<void, PluginError> => {
	return Effect.gen(function* () {
		if (typeof plugin.name !== "string" || plugin.name.trim() === "") {
			return yield* Effect.fail(
				new PluginError({
					plugin: "(unnamed)",
					reason: "invalid_name",
					message: "Plugin name must be a non-empty string",
				}),
			);
		}

		const pluginName = plugin.name;

		const codecs = plugin.codecs ?? [];
		for (let i = 0; i < codecs.length; i++) {
			const codecError = validateCodec(codecOf(codecs[i]), i, pluginName);
			if (codecError !== null) {
				return yield* Effect.fail(codecError);
			}
		}

		const hooks = plugin.hooks ?? [];
		for (let i = 0; i < hooks.length; i++) {
			const hookError = validateHook(hooks[i], i, pluginName);
			if (hookError !== null) {
				return yield* Effect.fail(hookError);
			}
		}

		const converters = plugin.converters ?? [];
		for (let i = 0; i < converters.length; i++) {
			const converterError = validateConverter(converters[i], i, pluginName);
			if (converterError !== null) {
				return yield* Effect.fail(converterError);
			}
		}
	});
};

/**
 * Validates a FormatCodec entry.
 * Returns null if valid, PluginError if invalid.
 */
export const validateCodec = (
	codec: FormatCodec,
	index: number,
	pluginName: string,
): PluginError | null => {
	if (typeof codec.name !== "string" || codec.name.trim() === "") {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_codec",
			message: `Codec at index ${index} must have a non-empty 'name' string`,
		});
	}

	if (!Array.isArray(codec.extensions)) {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_codec",
			message: `Codec '${codec.name}' must have an 'extensions' array`,
		});
	}

	for (const ext of codec.extensions) {
		if (typeof ext !== "string" || ext.trim() === "" || ext.startsWith(".")) {
			return new PluginError({
				plugin: pluginName,
				reason: "invalid_codec",
				message: `Codec '${codec.name}' has an invalid extension (must be a non-empty string without a leading dot)`,
			});
		}
	}

	if (typeof codec.encode !== "function") {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_codec",
			message: `Codec '${codec.name}' must have an 'encode' function`,
		});
	}

	if (typeof codec.decode !== "function") {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_codec",
			message: `Codec '${codec.name}' must have a 'decode' function`,
		});
	}

	return null;
};

/**
 * Validates a hook registration.
 * Returns null if valid, PluginError if invalid.
 */
export const validateHook = (
	hook: AnyHookRegistration,
	index: number,
	pluginName: string,
): PluginError | null => {
	if (!HOOK_POINTS.includes(hook.point)) {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_hook",
			message: `Hook at index ${index} names unknown hook point '${String(hook.point)}'`,
		});
	}

	if (typeof hook.implementation !== "function") {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_hook",
			message: `Hook '${hook.name ?? hook.point}' must have an 'implementation' function`,
		});
	}

	if (hook.order !== undefined && !Number.isFinite(hook.order)) {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_hook",
			message: `Hook '${hook.name ?? hook.point}' has a non-finite 'order'`,
		});
	}

	return null;
};

/**
 * Validates a converter registration.
 * Returns null if valid, PluginError if invalid.
 */
export const validateConverter = (
	registration: ConverterRegistration,
	index: number,
	pluginName: string,
): PluginError | null => {
	const label = registration.name ?? `at index ${index}`;

	if (typeof registration.target !== "object" || registration.target === null) {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_converter",
			message: `Converter ${label} must have a 'target'`,
		});
	}

	if (
		typeof registration.converter?.toIntermediate !== "function" ||
		typeof registration.converter.fromIntermediate !== "function"
	) {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_converter",
			message: `Converter ${label} must have 'toIntermediate' and 'fromIntermediate' functions`,
		});
	}

	if (
		registration.specificity !== undefined &&
		!Number.isFinite(registration.specificity)
	) {
		return new PluginError({
			plugin: pluginName,
			reason: "invalid_converter",
			message: `Converter ${label} has a non-finite 'specificity'`,
		});
	}

	return null;
};

// ============================================================================
// Dependency Validation
// ============================================================================

/**
 * Validates that all plugin dependencies are satisfied.
 * For each plugin with `dependencies`, verifies that every dependency name
 * appears in the plugin array or among the plugins already installed.
 */
export const validateDependencies = (
	plugins: ReadonlyArray<AdapterPlugin>,
	installed: ReadonlyArray<string> = [],
): Effect.Effect<void, PluginError> => {
	return Effect.gen(function* () {
		const availablePlugins = new Set<string>(installed);
		for (const plugin of plugins) {
			availablePlugins.add(plugin.name);
		}

		for (const plugin of plugins) {
			if (
				plugin.dependencies === undefined ||
				plugin.dependencies.length === 0
			) {
				continue;
			}

			const missingDependencies = plugin.dependencies.filter(
				(dependency) => !availablePlugins.has(dependency),
			);

			if (missingDependencies.length > 0) {
				const missingList = missingDependencies.join(", ");
				return yield* Effect.fail(
					new PluginError({
						plugin: plugin.name,
						reason: "missing_dependencies",
						message:
							missingDependencies.length === 1
								? `Missing dependency: ${missingList}`
								: `Missing dependencies: ${missingList}`,
					}),
				);
			}
		}
	});
};

/**
 * Validates that no two plugins in the array share a name, and that none
 * reuses the name of an installed plugin.
 */
export const validateUniqueNames = (
	plugins: ReadonlyArray<AdapterPlugin>,
	installed: ReadonlyArray<string> = [],
): Effect.Effect<void, PluginError> => {
	return Effect.gen(function* () {
		const seen = new Set<string>(installed);
		for (const plugin of plugins) {
			if (seen.has(plugin.name)) {
				return yield* Effect.fail(
					new PluginError({
						plugin: plugin.name,
						reason: "duplicate_plugin",
						message: `Plugin '${plugin.name}' is already installed`,
					}),
				);
			}
			seen.add(plugin.name);
		}
	});
};
