import { Data } from "effect";

// ============================================================================
// Plugin System Errors
// ============================================================================

/**
 * Error raised when a plugin or a single registration fails validation.
 * Used for init-time and registration-time configuration problems.
 */
export class PluginError extends Data.TaggedError("PluginError")<{
	readonly plugin: string;
	readonly reason: string;
	readonly message: string;
}> {}
