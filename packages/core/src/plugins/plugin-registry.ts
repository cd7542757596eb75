/**
 * Plugin install planning.
 * Validates plugins and puts them in the order they must be installed.
 */

import { Effect } from "effect";
import { PluginError } from "../errors/plugin-errors.js";
import type { AdapterPlugin } from "./plugin-types.js";
import {
	validateDependencies,
	validatePlugin,
	validateUniqueNames,
} from "./plugin-validation.js";

// ============================================================================
// Install Plan
// ============================================================================

/**
 * Validates `plugins` and returns them in install order.
 *
 * This function:
 * 1. Validates each plugin individually (name, codecs, hooks, converters)
 * 2. Rejects names that repeat, within the array or against `installed`
 * 3. Validates dependencies (each must be in the array or in `installed`)
 * 4. Orders the plugins so every plugin follows its dependencies; plugins
 *    with no ordering constraint keep their given order
 *
 * A dependency cycle fails with a PluginError naming the plugins in it.
 */
export const planInstall = (
	plugins: ReadonlyArray<AdapterPlugin>,
	installed: ReadonlyArray<string> = [],
): Effect.Effect<ReadonlyArray<AdapterPlugin>, PluginError> => {
	if (plugins.length === 0) {
		return Effect.succeed([]);
	}

	return Effect.gen(function* () {
		for (const plugin of plugins) {
			yield* validatePlugin(plugin);
		}
		yield* validateUniqueNames(plugins, installed);
		yield* validateDependencies(plugins, installed);
		return yield* orderByDependencies(plugins, installed);
	});
};

const orderByDependencies = (
	plugins: ReadonlyArray<AdapterPlugin>,
	installed: ReadonlyArray<string>,
): Effect.Effect<ReadonlyArray<AdapterPlugin>, PluginError> => {
	const done = new Set<string>(installed);
	const ordered: Array<AdapterPlugin> = [];
	let remaining = [...plugins];

	while (remaining.length > 0) {
		const ready = remaining.filter((plugin) =>
			(plugin.dependencies ?? []).every((dependency) => done.has(dependency)),
		);
		if (ready.length === 0) {
			const cycle = remaining.map((plugin) => plugin.name);
			return Effect.fail(
				new PluginError({
					plugin: cycle[0] ?? "(unknown)",
					reason: "circular_dependencies",
					message: `Circular dependencies between plugins: ${cycle.join(", ")}`,
				}),
			);
		}
		// one plugin per pass keeps independent plugins in their given order
		const next = ready[0];
		ordered.push(next);
		done.add(next.name);
		remaining = remaining.filter((plugin) => plugin !== next);
	}

	return Effect.succeed(ordered);
};
