import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { makeAdapterLayer } from "../src/adapter/adapter-layer.js";
import { TypeAdapter } from "../src/adapter/adapter-service.js";
import { PluginError } from "../src/errors/plugin-errors.js";
import { Intermediate } from "../src/intermediate/intermediate-value.js";
import { planInstall } from "../src/plugins/plugin-registry.js";
import type { AdapterPlugin } from "../src/plugins/plugin-types.js";
import type { FormatCodec } from "../src/serializers/format-codec.js";

const plugin = (name: string, dependencies?: ReadonlyArray<string>): AdapterPlugin => ({
	name,
	dependencies,
});

const planNames = (
	plugins: ReadonlyArray<AdapterPlugin>,
	installed: ReadonlyArray<string> = [],
) => Effect.runSync(planInstall(plugins, installed)).map((entry) => entry.name);

const planError = (
	plugins: ReadonlyArray<AdapterPlugin>,
	installed: ReadonlyArray<string> = [],
) => Effect.runSync(Effect.flip(planInstall(plugins, installed)));

const tsvCodec: FormatCodec = {
	name: "tsv",
	extensions: ["tsv"],
	requiresSchema: false,
	encode: () => new TextEncoder().encode("a\tb\n"),
	decode: () => Intermediate.sequence([]),
};

describe("planInstall", () => {
	it("installs dependencies first and keeps the given order otherwise", () => {
		expect(
			planNames([plugin("audit", ["money"]), plugin("money"), plugin("geo")]),
		).toEqual(["money", "audit", "geo"]);
	});

	it("accepts dependencies that are already installed", () => {
		expect(planNames([plugin("audit", ["builtin"])], ["builtin"])).toEqual(["audit"]);
	});

	it("rejects dependency cycles", () => {
		const error = planError([plugin("a", ["b"]), plugin("b", ["a"]), plugin("c")]);
		expect(error.reason).toBe("circular_dependencies");
		expect(error.message).toBe("Circular dependencies between plugins: a, b");
	});

	it("rejects missing dependencies", () => {
		const single = planError([plugin("audit", ["money"])]);
		expect(single.reason).toBe("missing_dependencies");
		expect(single.plugin).toBe("audit");
		expect(single.message).toBe("Missing dependency: money");

		const several = planError([plugin("audit", ["money", "geo"])]);
		expect(several.message).toBe("Missing dependencies: money, geo");
	});

	it("rejects names that repeat", () => {
		expect(planError([plugin("money"), plugin("money")]).message).toBe(
			"Plugin 'money' is already installed",
		);
		expect(planError([plugin("builtin")], ["builtin"]).reason).toBe("duplicate_plugin");
	});

	it("rejects an empty name", () => {
		const error = planError([plugin("  ")]);
		expect(error.reason).toBe("invalid_name");
		expect(error.plugin).toBe("(unnamed)");
		expect(error.message).toBe("Plugin name must be a non-empty string");
	});

	it("rejects a codec extension with a leading dot", () => {
		const error = planError([
			{ name: "tables", codecs: [{ ...tsvCodec, extensions: [".tsv"] }] },
		]);
		expect(error.reason).toBe("invalid_codec");
		expect(error.message).toBe(
			"Codec 'tsv' has an invalid extension (must be a non-empty string without a leading dot)",
		);
	});
});

describe("TypeAdapter.use", () => {
	const run = <A, E>(effect: Effect.Effect<A, E, TypeAdapter>) =>
		Effect.runPromise(Effect.provide(effect, makeAdapterLayer()));

	it("installs plugins after the built-in ones", async () => {
		const names = await run(
			Effect.gen(function* () {
				const adapter = yield* TypeAdapter;
				yield* adapter.use([
					{ name: "tables", dependencies: ["tsv-base"], codecs: [] },
					{ name: "tsv-base", codecs: [tsvCodec] },
				]);
				return yield* adapter.plugins();
			}),
		);
		expect(names).toEqual(["builtin", "codecs", "tsv-base", "tables"]);
	});

	it("makes plugin codecs available by extension", async () => {
		const formats = await run(
			Effect.gen(function* () {
				const adapter = yield* TypeAdapter;
				yield* adapter.use({ name: "tsv-base", codecs: [tsvCodec] });
				return yield* adapter.formats();
			}),
		);
		expect(formats.map((format) => format.name)).toEqual([
			"json",
			"yaml",
			"msgpack",
			"packed",
			"csv",
			"tsv",
		]);
	});

	it("rejects a plugin whose name is taken and installs nothing", async () => {
		const result = await run(
			Effect.gen(function* () {
				const adapter = yield* TypeAdapter;
				const error = yield* Effect.flip(
					adapter.use([{ name: "tsv-base", codecs: [tsvCodec] }, { name: "builtin" }]),
				);
				const names = yield* adapter.plugins();
				return { error, names };
			}),
		);
		expect(result.error._tag).toBe("PluginError");
		expect(result.error.message).toBe("Plugin 'builtin' is already installed");
		expect(result.names).toEqual(["builtin", "codecs"]);
	});

	it("fails the layer when a configured plugin is invalid", async () => {
		const error = await Effect.runPromise(
			Effect.flip(
				Effect.provide(
					TypeAdapter,
					makeAdapterLayer({ plugins: [plugin("audit", ["money"])] }),
				),
			),
		);
		expect(error).toBeInstanceOf(PluginError);
		expect(error instanceof PluginError && error.message).toBe("Missing dependency: money");
	});
});
