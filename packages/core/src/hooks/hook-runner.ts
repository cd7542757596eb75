/**
 * Hook runner functions for executing plugin hooks.
 *
 * First-success hooks stop at the first applied outcome.
 * Chained hooks each see the output of the previous one.
 * A failing hook aborts the run and surfaces its error unchanged.
 */

import { Effect, Option } from "effect";
import type {
	AnyHookRegistration,
	HookEntry,
	HookOutcome,
	HookTable,
} from "./hook-types.js";

// ============================================================================
// Hook Table
// ============================================================================

export const emptyHookTable: HookTable = {
	resolveType: [],
	toIntermediate: [],
	fromIntermediate: [],
	selectCodec: [],
	deriveSchema: [],
};

const compareEntries = <H>(a: HookEntry<H>, b: HookEntry<H>): number =>
	a.order !== b.order ? a.order - b.order : a.sequence - b.sequence;

const append = <H>(
	entries: ReadonlyArray<HookEntry<H>>,
	registration: {
		readonly implementation: H;
		readonly order?: number;
		readonly name?: string;
	},
	sequence: number,
): ReadonlyArray<HookEntry<H>> =>
	[
		...entries,
		{
			implementation: registration.implementation,
			order: registration.order ?? 0,
			sequence,
			name: registration.name ?? `hook#${sequence}`,
		},
	].sort(compareEntries);

/**
 * Returns a new table with the registration filed under its hook point,
 * keeping each list sorted by ascending order, then registration sequence.
 */
export const insertHook = (
	table: HookTable,
	registration: AnyHookRegistration,
	sequence: number,
): HookTable => {
	switch (registration.point) {
		case "resolveType":
			return {
				...table,
				resolveType: append(table.resolveType, registration, sequence),
			};
		case "toIntermediate":
			return {
				...table,
				toIntermediate: append(table.toIntermediate, registration, sequence),
			};
		case "fromIntermediate":
			return {
				...table,
				fromIntermediate: append(table.fromIntermediate, registration, sequence),
			};
		case "selectCodec":
			return {
				...table,
				selectCodec: append(table.selectCodec, registration, sequence),
			};
		case "deriveSchema":
			return {
				...table,
				deriveSchema: append(table.deriveSchema, registration, sequence),
			};
	}
};

// ============================================================================
// First-Success
// ============================================================================

/**
 * Runs hooks in order until one returns an applied outcome.
 * Returns none when every hook declined (or there are no hooks).
 */
export const runFirstSuccess = <H, A, E>(
	entries: ReadonlyArray<HookEntry<H>>,
	invoke: (implementation: H) => Effect.Effect<HookOutcome<A>, E>,
): Effect.Effect<Option.Option<A>, E> => {
	if (entries.length === 0) {
		return Effect.succeed(Option.none());
	}

	return Effect.gen(function* () {
		for (const entry of entries) {
			const outcome = yield* invoke(entry.implementation);
			if (outcome._tag === "Applied") {
				return Option.some(outcome.value);
			}
		}
		return Option.none<A>();
	});
};

// ============================================================================
// Chained
// ============================================================================

/**
 * Runs every hook in order, threading the value through. A hook that
 * declines passes the value on untouched.
 *
 * If there are no hooks, returns the initial value unchanged.
 */
export const runChained = <H, A, E>(
	entries: ReadonlyArray<HookEntry<H>>,
	initial: A,
	invoke: (implementation: H, value: A) => Effect.Effect<HookOutcome<A>, E>,
): Effect.Effect<A, E> => {
	if (entries.length === 0) {
		return Effect.succeed(initial);
	}

	return Effect.reduce(entries, initial, (value, entry) =>
		Effect.map(invoke(entry.implementation, value), (outcome) =>
			outcome._tag === "Applied" ? outcome.value : value,
		),
	);
};
