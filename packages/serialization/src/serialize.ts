import type { JsonValue } from './types.js';
import { ParseError } from './types.js';
import { JSON_INDENT, type SerializationContext } from './context.js';
import type { TypeDescriptor } from './descriptors.js';

const ROOT_PATH = '$';
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Convert a typed value to its JSON form
 */
export function toJson<T>(
  descriptor: TypeDescriptor<T>,
  value: T,
  context: SerializationContext
): JsonValue {
  return descriptor.format(value, context, ROOT_PATH);
}

/**
 * Rebuild a typed value from already-parsed JSON
 */
export function fromJson<T>(
  descriptor: TypeDescriptor<T>,
  json: JsonValue,
  context: SerializationContext
): T {
  return descriptor.parse(json, context, ROOT_PATH);
}

/**
 * Serialize a value to canonical JSON text (descriptor field order, 2-space indent)
 */
export function toRaw<T>(
  descriptor: TypeDescriptor<T>,
  value: T,
  context: SerializationContext
): string {
  return JSON.stringify(toJson(descriptor, value, context), null, JSON_INDENT);
}

/**
 * Parse JSON text, failing with ParseError when it is not JSON
 */
export function parseJson(raw: string | Uint8Array): JsonValue {
  let text: string;
  try {
    text = typeof raw === 'string' ? raw : utf8Decoder.decode(raw);
  } catch (error) {
    throw new ParseError('Invalid UTF-8 in JSON document', error);
  }
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParseError('Invalid JSON document', error);
  }
}

/**
 * Deserialize JSON text as the type a descriptor describes
 */
export function fromRaw<T>(
  descriptor: TypeDescriptor<T>,
  raw: string | Uint8Array,
  context: SerializationContext
): T {
  return fromJson(descriptor, parseJson(raw), context);
}
