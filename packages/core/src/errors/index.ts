// ============================================================================
// Conversion Errors (re-exported from conversion-errors.ts)
// ============================================================================

export type { ConversionError } from "./conversion-errors.js";
export {
	AmbiguousConverterError,
	NoConverterError,
	NumericRangeError,
	SchemaError,
	SchemaMismatchError,
	UnsupportedTypeError,
} from "./conversion-errors.js";

// ============================================================================
// Codec Errors (re-exported from codec-errors.ts)
// ============================================================================

export {
	DecodeError,
	EncodeError,
	UnsupportedFormatError,
} from "./codec-errors.js";

// ============================================================================
// Plugin Errors (re-exported from plugin-errors.ts)
// ============================================================================

export { PluginError } from "./plugin-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type {
	DecodeError,
	EncodeError,
	UnsupportedFormatError,
} from "./codec-errors.js";
import type {
	ConversionError,
	SchemaError,
	UnsupportedTypeError,
} from "./conversion-errors.js";

/**
 * Everything `dump` can fail with.
 */
export type DumpError =
	| UnsupportedTypeError
	| ConversionError
	| SchemaError
	| UnsupportedFormatError
	| EncodeError;

/**
 * Everything `load` can fail with.
 */
export type LoadError = DumpError | DecodeError;
