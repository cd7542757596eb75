import { ConfigError, ConfigProvider, Effect, Schema } from "effect";
import { describe, expect, it } from "vitest";
import type { AdapterOptions } from "../src/adapter/adapter-config.js";
import { makeAdapterLayer } from "../src/adapter/adapter-layer.js";
import { TypeAdapter, type TypeAdapterShape } from "../src/adapter/adapter-service.js";

const Point = Schema.Struct({ x: Schema.Int, y: Schema.Int });

const withEnv =
	(env: Record<string, string>, options: AdapterOptions = {}) =>
	<A, E>(f: (adapter: TypeAdapterShape) => Effect.Effect<A, E>) =>
		Effect.runPromise(
			Effect.provide(Effect.flatMap(TypeAdapter, f), makeAdapterLayer(options)).pipe(
				Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
			),
		);

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe("adapter configuration", () => {
	it("defaults to JSON", async () => {
		const bytes = await withEnv({})((adapter) => adapter.dump(Point, { x: 1, y: 2 }));
		expect(text(bytes)).toBe('{"x":1,"y":2}');
	});

	it("reads the default format from the environment", async () => {
		const bytes = await withEnv({ ROUNDTRIP_DEFAULT_FORMAT: "yaml" })((adapter) =>
			adapter.dump(Point, { x: 1, y: 2 }),
		);
		expect(text(bytes)).toBe("x: 1\ny: 2\n");
	});

	it("prefers options over the environment", async () => {
		const bytes = await withEnv(
			{ ROUNDTRIP_DEFAULT_FORMAT: "yaml" },
			{ defaultFormat: "json" },
		)((adapter) => adapter.dump(Point, { x: 1, y: 2 }));
		expect(text(bytes)).toBe('{"x":1,"y":2}');
	});

	it("limits union members from the environment", async () => {
		const error = await withEnv({ ROUNDTRIP_MAX_UNION_MEMBERS: "2" })((adapter) =>
			Effect.flip(adapter.resolve(Schema.Union(Schema.String, Schema.Number, Schema.Boolean))),
		);
		expect(error.reason).toBe("union has 3 members, more than the limit of 2");
	});

	it("limits union members from options", async () => {
		const descriptorTag = await withEnv({}, { maxUnionMembers: 3 })((adapter) =>
			Effect.map(
				adapter.resolve(Schema.Union(Schema.String, Schema.Number, Schema.Boolean)),
				(descriptor) => descriptor._tag,
			),
		);
		expect(descriptorTag).toBe("Union");
	});

	it.each(["0", "many"])("fails the layer for a union limit of %s", async (limit) => {
		const error = await Effect.runPromise(
			Effect.flip(Effect.provide(TypeAdapter, makeAdapterLayer())).pipe(
				Effect.withConfigProvider(
					ConfigProvider.fromMap(new Map([["ROUNDTRIP_MAX_UNION_MEMBERS", limit]])),
				),
			),
		);
		expect(ConfigError.isConfigError(error)).toBe(true);
	});
});
