/**
 * TallyKit Serialization - Main Entry Point
 *
 * Fixed-size padded blocks and typed JSON documents for election records.
 */

// Errors and JSON types
export {
  SerializationError,
  SerializationErrorCode,
  TruncationError,
  ParseError,
  UnsupportedTypeError,
  MalformedBlockError,
  SchemaMismatchError
} from './types.js';
export type { JsonObject, JsonValue } from './types.js';

// Padding codec
export {
  PAD_BYTE,
  PAD_INDICATOR_SIZE,
  BlockSizeClass,
  addPadding,
  blockCapacity,
  isBlockSizeClass,
  paddedDecode,
  paddedEncode,
  removePadding
} from './padding.js';

// Typed serializer
export { t, isJsonObject } from './descriptors.js';
export type {
  Infer,
  ObjectShape,
  ObjectValue,
  OptionalDescriptor,
  TypeDescriptor
} from './descriptors.js';
export { fromJson, fromRaw, parseJson, toJson, toRaw } from './serialize.js';
export {
  JSON_INDENT,
  createSerializationContext,
  defaultSerializationContext
} from './context.js';
export type { SerializationContext, SerializationContextOptions } from './context.js';

// Coercion registry
export {
  CoercionRegistry,
  createCoercionRegistry,
  createDefaultCoercions,
  dateTimeCoercion,
  enumCoercion,
  hexCoercion
} from './codecs/index.js';
export type { Coercion, CoercionTable, CoercionTypeMap, CoercionTypeName } from './codecs/index.js';

// Document I/O
export {
  DEFAULT_FILE_EXTENSION,
  constructPath,
  fromFile,
  fromFileDescriptor,
  fromListInFile,
  fromListInFileDescriptor,
  toFile
} from './files.js';

// Domain value types
export { BigInteger, ElementModP, ElementModQ, parseHexDigits } from './domain/group.js';
export type { GroupConstants } from './domain/group.js';
export {
  BallotBoxState,
  ContestErrorType,
  ElectionType,
  ProofUsage,
  ReportingUnitType,
  SpecVersion,
  VoteVariationType
} from './domain/enums.js';

// Logging
export {
  BufferAdapter,
  ConsoleAdapter,
  Logger,
  LogLevel,
  logger,
  parseLogLevel
} from './logger.js';
export type {
  LogEntry,
  LogEnvironment,
  LoggerAdapter,
  LoggerConfig,
  LogMetadata
} from './logger.js';
