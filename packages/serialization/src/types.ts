/**
 * TallyKit Serialization Types
 * Shared JSON types and the error taxonomy for the serialization package
 */

/**
 * Any value JSON text can hold
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A parsed JSON object
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Error codes for serialization operations
 */
export enum SerializationErrorCode {
  TRUNCATION = 'TRUNCATION',
  PARSE_ERROR = 'PARSE_ERROR',
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',
  MALFORMED_BLOCK = 'MALFORMED_BLOCK',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  INVALID_BLOCK_SIZE = 'INVALID_BLOCK_SIZE',
  FILE_READ_FAILED = 'FILE_READ_FAILED',
  FILE_WRITE_FAILED = 'FILE_WRITE_FAILED'
}

/**
 * Base error class for serialization operations
 */
export class SerializationError extends Error {
  public readonly code: SerializationErrorCode;
  public readonly cause?: unknown;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SerializationErrorCode,
    message: string,
    cause?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SerializationError';
    this.code = code;
    this.cause = cause;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Payload exceeds the capacity of a padded block and truncation was not allowed
 */
export class TruncationError extends SerializationError {
  constructor(payloadLength: number, capacity: number) {
    super(
      SerializationErrorCode.TRUNCATION,
      `Padded data of ${payloadLength} bytes exceeds allowed padded data size of ${capacity}`,
      undefined,
      { payloadLength, capacity }
    );
    this.name = 'TruncationError';
  }
}

/**
 * Input text is not valid JSON
 */
export class ParseError extends SerializationError {
  constructor(message: string, cause?: unknown) {
    super(SerializationErrorCode.PARSE_ERROR, message, cause);
    this.name = 'ParseError';
  }
}

/**
 * A value or declared type has neither a structural nor a registered mapping
 */
export class UnsupportedTypeError extends SerializationError {
  public readonly path: string;

  constructor(typeName: string, path: string, reason?: string) {
    super(
      SerializationErrorCode.UNSUPPORTED_TYPE,
      `Unsupported type ${typeName} at ${path}${reason ? `: ${reason}` : ''}`,
      undefined,
      { typeName, path }
    );
    this.name = 'UnsupportedTypeError';
    this.path = path;
  }
}

/**
 * A padded block whose length or padding indicator is inconsistent with its size class
 */
export class MalformedBlockError extends SerializationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(SerializationErrorCode.MALFORMED_BLOCK, message, undefined, details);
    this.name = 'MalformedBlockError';
  }
}

/**
 * Parsed JSON does not have the shape a type descriptor expects
 */
export class SchemaMismatchError extends SerializationError {
  public readonly path: string;

  constructor(path: string, expected: string, cause?: unknown) {
    super(SerializationErrorCode.SCHEMA_MISMATCH, `Expected ${expected} at ${path}`, cause, {
      path,
      expected
    });
    this.name = 'SchemaMismatchError';
    this.path = path;
  }
}
