import { Data } from "effect";

// ============================================================================
// Effect TaggedError Codec Error Types
// ============================================================================

/**
 * The bytes handed to a codec are structurally invalid for its format.
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly format: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class EncodeError extends Data.TaggedError("EncodeError")<{
	readonly format: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class UnsupportedFormatError extends Data.TaggedError(
	"UnsupportedFormatError",
)<{
	readonly format: string;
	readonly message: string;
}> {}
