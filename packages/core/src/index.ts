/**
 * Main entry point for the roundtrip library.
 *
 * Exports the Effect-based API: the TypeAdapter service and its Layer,
 * the intermediate value model, type descriptors, the converter registry,
 * hooks, plugins, derived schemas and format codecs.
 */

// ============================================================================
// Adapter Service
// ============================================================================

export { TypeAdapter } from "./adapter/adapter-service.js";
export type { FormatInfo, TypeAdapterShape } from "./adapter/adapter-service.js";

export {
	DefaultAdapterLayer,
	buildRegistrationTable,
	makeAdapterLayer,
	makeTypeAdapter,
} from "./adapter/adapter-layer.js";
export type { AdapterLayerError } from "./adapter/adapter-layer.js";

export {
	DEFAULT_FORMAT,
	DEFAULT_MAX_UNION_MEMBERS,
	resolveAdapterConfig,
} from "./adapter/adapter-config.js";
export type {
	AdapterOptions,
	ResolvedAdapterConfig,
} from "./adapter/adapter-config.js";

export {
	deriveWith,
	makeEngine,
	resolveWith,
	selectCodec,
	validateTyped,
} from "./adapter/conversion.js";
export type { Engine } from "./adapter/conversion.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	AmbiguousConverterError,
	NoConverterError,
	NumericRangeError,
	SchemaError,
	SchemaMismatchError,
	UnsupportedTypeError,
	DecodeError,
	EncodeError,
	UnsupportedFormatError,
	PluginError,
} from "./errors/index.js";

export type { ConversionError, DumpError, LoadError } from "./errors/index.js";

// ============================================================================
// Intermediate Values
// ============================================================================

export {
	Intermediate,
	describe as describeIntermediate,
	equals as intermediateEquals,
	getEntry,
} from "./intermediate/intermediate-value.js";

export type {
	BooleanValue,
	BytesValue,
	FloatValue,
	IntValue,
	IntermediateTag,
	IntermediateValue,
	MappingEntry,
	MappingValue,
	NullValue,
	SequenceValue,
	TextValue,
} from "./intermediate/intermediate-value.js";

// ============================================================================
// Type Descriptors
// ============================================================================

export {
	Descriptor,
	childDescriptors,
	collectDefinitions,
	eraseName,
	formatDescriptor,
	nominalName,
} from "./descriptors/type-descriptor.js";

export type {
	AbsentSpelling,
	DescriptorKind,
	EnumMember,
	FieldDescriptor,
	FieldInput,
	LiteralValue,
	RecordConstruct,
	RecordDescriptor,
	TypeDescriptor,
} from "./descriptors/type-descriptor.js";

export { resolveAst, resolveSchema } from "./descriptors/resolver.js";
export type { ResolverEnv } from "./descriptors/resolver.js";

// ============================================================================
// Converter Registry
// ============================================================================

export {
	ConverterKey,
	fallbackChain,
	formatKey,
	isConverterKey,
} from "./registry/converter-key.js";
export type { ConverterKeyLevel } from "./registry/converter-key.js";

export {
	emptyConverterTable,
	listConverters,
	lookupConverter,
	registerConverter,
} from "./registry/converter-registry.js";
export type {
	ConverterEntry,
	ConverterTable,
	RegisterConverterOptions,
} from "./registry/converter-registry.js";

export { ROOT_PATH, appendPath } from "./registry/converter-types.js";
export type {
	Converter,
	ConverterContext,
	PathSegment,
} from "./registry/converter-types.js";

export {
	makeConverter,
	mismatchIntermediate,
	mismatchTyped,
	outOfRange,
} from "./converters/converter-helpers.js";

export { BUILTIN_PLUGIN_NAME, builtinPlugin } from "./converters/builtin-plugin.js";
export { BIG_DECIMAL, BIG_INT, DATE } from "./converters/logical-types.js";

// ============================================================================
// Hooks
// ============================================================================

export { HOOK_POINTS, HOOK_POLICIES, HookOutcome } from "./hooks/hook-types.js";
export type {
	AnyHookRegistration,
	DeriveSchemaContext,
	DeriveSchemaHook,
	FromIntermediateContext,
	FromIntermediateHook,
	HookPoint,
	HookPolicy,
	HookRegistration,
	ResolveTypeContext,
	ResolveTypeHook,
	SelectCodecHook,
	ToIntermediateContext,
	ToIntermediateHook,
} from "./hooks/hook-types.js";

// ============================================================================
// Plugin System
// ============================================================================

export type {
	AdapterPlugin,
	CodecRegistration,
	ConverterRegistration,
	ConverterTarget,
} from "./plugins/plugin-types.js";

export {
	validateDependencies,
	validatePlugin,
} from "./plugins/plugin-validation.js";

export { planInstall } from "./plugins/plugin-registry.js";

// ============================================================================
// Derived Schemas
// ============================================================================

export { dereference } from "./schema/schema-types.js";
export type {
	EnumNode,
	MappingNode,
	RecordNode,
	RefNode,
	ScalarNode,
	Schema as DerivedSchema,
	SchemaField,
	SchemaKind,
	SchemaNode,
	SequenceNode,
	TupleNode,
	UnionNode,
} from "./schema/schema-types.js";

export { deriveSchema } from "./schema/schema-deriver.js";
export type { DeriverEnv } from "./schema/schema-deriver.js";

// ============================================================================
// Format Codecs
// ============================================================================

export type { FormatCodec } from "./serializers/format-codec.js";
export { jsonCodec } from "./serializers/codecs/json.js";
export type { JsonCodecOptions } from "./serializers/codecs/json.js";
export { yamlCodec } from "./serializers/codecs/yaml.js";
export type { YamlCodecOptions } from "./serializers/codecs/yaml.js";
export { msgpackCodec } from "./serializers/codecs/msgpack.js";
export { packedCodec } from "./serializers/codecs/packed.js";
export { csvCodec } from "./serializers/codecs/csv.js";

export { BUILTIN_FORMATS, inferCodecs } from "./serializers/infer-codecs.js";
export {
	CODECS_PLUGIN_NAME,
	codecsPlugin,
	defaultCodecs,
	textCodecs,
} from "./serializers/presets.js";
