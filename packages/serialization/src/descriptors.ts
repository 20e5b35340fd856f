/**
 * Type descriptors: explicit, composable JSON mappings per value type.
 *
 * Structural descriptors (strings, arrays, objects...) map directly to JSON.
 * Coerced descriptors delegate to the context's coercion registry.
 */

import { hexlify, isHexString, getBytes } from 'ethers';
import type { JsonObject, JsonValue } from './types.js';
import { SchemaMismatchError, UnsupportedTypeError } from './types.js';
import type { SerializationContext } from './context.js';
import type { Coercion, CoercionTable, CoercionTypeName } from './codecs/registry.js';
import { enumCoercion, type EnumLike } from './codecs/coercions.js';
import type { BigInteger, ElementModP, ElementModQ } from './domain/group.js';
import type {
  BallotBoxState,
  ContestErrorType,
  ElectionType,
  ProofUsage,
  ReportingUnitType,
  SpecVersion,
  VoteVariationType
} from './domain/enums.js';

export interface TypeDescriptor<T> {
  readonly typeName: string;
  format(value: T, context: SerializationContext, path: string): JsonValue;
  parse(json: JsonValue, context: SerializationContext, path: string): T;
}

/**
 * Descriptor of an object field that may be absent
 */
export interface OptionalDescriptor<T> extends TypeDescriptor<T | undefined> {
  readonly optional: true;
}

export type Infer<D> = D extends TypeDescriptor<infer T> ? T : never;

export type ObjectShape = { readonly [key: string]: TypeDescriptor<unknown> };

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type OptionalKeys<S extends ObjectShape> = {
  [K in keyof S]: S[K] extends { readonly optional: true } ? K : never;
}[keyof S];

type RequiredKeys<S extends ObjectShape> = Exclude<keyof S, OptionalKeys<S>>;

export type ObjectValue<S extends ObjectShape> = Simplify<
  { [K in RequiredKeys<S>]: Infer<S[K]> } & {
    [K in OptionalKeys<S>]?: Exclude<Infer<S[K]>, undefined>;
  }
>;

export function isJsonObject(json: JsonValue): json is JsonObject {
  return typeof json === 'object' && json !== null && !Array.isArray(json);
}

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalDescriptor(descriptor: TypeDescriptor<unknown>): boolean {
  return 'optional' in descriptor && descriptor.optional === true;
}

function hasRequiredFields<S extends ObjectShape>(
  shape: S,
  fields: unknown
): fields is ObjectValue<S> {
  if (!isRecordLike(fields)) {
    return false;
  }
  const present: Record<string, unknown> = fields;
  return Object.entries(shape).every(
    ([key, descriptor]) => isOptionalDescriptor(descriptor) || present[key] !== undefined
  );
}

const childPath = (path: string, key: string | number): string =>
  typeof key === 'number' ? `${path}[${key}]` : `${path}.${key}`;

function string(): TypeDescriptor<string> {
  return {
    typeName: 'string',
    format(value, _context, path) {
      if (typeof value !== 'string') {
        throw new UnsupportedTypeError(typeof value, path, 'expected string');
      }
      return value;
    },
    parse(json, _context, path) {
      if (typeof json !== 'string') {
        throw new SchemaMismatchError(path, 'string');
      }
      return json;
    }
  };
}

function number(): TypeDescriptor<number> {
  return {
    typeName: 'number',
    format(value, _context, path) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new UnsupportedTypeError(typeof value, path, 'expected a finite number');
      }
      return value;
    },
    parse(json, _context, path) {
      if (typeof json !== 'number') {
        throw new SchemaMismatchError(path, 'number');
      }
      return json;
    }
  };
}

function integer(): TypeDescriptor<number> {
  return {
    typeName: 'integer',
    format(value, _context, path) {
      if (!Number.isSafeInteger(value)) {
        throw new UnsupportedTypeError(typeof value, path, 'expected a safe integer');
      }
      return value;
    },
    parse(json, _context, path) {
      if (typeof json !== 'number' || !Number.isSafeInteger(json)) {
        throw new SchemaMismatchError(path, 'integer');
      }
      return json;
    }
  };
}

function boolean(): TypeDescriptor<boolean> {
  return {
    typeName: 'boolean',
    format(value, _context, path) {
      if (typeof value !== 'boolean') {
        throw new UnsupportedTypeError(typeof value, path, 'expected boolean');
      }
      return value;
    },
    parse(json, _context, path) {
      if (typeof json !== 'boolean') {
        throw new SchemaMismatchError(path, 'boolean');
      }
      return json;
    }
  };
}

/**
 * Byte strings as 0x-prefixed lowercase hex
 */
function bytes(): TypeDescriptor<Uint8Array> {
  return {
    typeName: 'bytes',
    format(value, _context, path) {
      if (!(value instanceof Uint8Array)) {
        throw new UnsupportedTypeError(typeof value, path, 'expected Uint8Array');
      }
      return hexlify(value);
    },
    parse(json, _context, path) {
      if (typeof json !== 'string' || !isHexString(json) || json.length % 2 !== 0) {
        throw new SchemaMismatchError(path, '0x-prefixed hex bytes');
      }
      return getBytes(json);
    }
  };
}

function literal<T extends string | number | boolean>(expected: T): TypeDescriptor<T> {
  const matches = (value: unknown): value is T => value === expected;
  return {
    typeName: JSON.stringify(expected),
    format(value, _context, path) {
      if (!matches(value)) {
        throw new UnsupportedTypeError(typeof value, path, `expected ${JSON.stringify(expected)}`);
      }
      return value;
    },
    parse(json, _context, path) {
      if (!matches(json)) {
        throw new SchemaMismatchError(path, JSON.stringify(expected));
      }
      return json;
    }
  };
}

function array<T>(element: TypeDescriptor<T>): TypeDescriptor<T[]> {
  return {
    typeName: `${element.typeName}[]`,
    format(value, context, path) {
      if (!Array.isArray(value)) {
        throw new UnsupportedTypeError(typeof value, path, 'expected an array');
      }
      return value.map((item, index) => element.format(item, context, childPath(path, index)));
    },
    parse(json, context, path) {
      if (!Array.isArray(json)) {
        throw new SchemaMismatchError(path, `array of ${element.typeName}`);
      }
      return json.map((item, index) => element.parse(item, context, childPath(path, index)));
    }
  };
}

/**
 * String-keyed map; keys are written in sorted order
 */
function record<T>(value: TypeDescriptor<T>): TypeDescriptor<Record<string, T>> {
  return {
    typeName: `Record<string, ${value.typeName}>`,
    format(entries, context, path) {
      if (!isRecordLike(entries)) {
        throw new UnsupportedTypeError(typeof entries, path, 'expected an object');
      }
      return Object.fromEntries(
        Object.keys(entries)
          .sort()
          .map((key): [string, JsonValue] => [
            key,
            value.format(entries[key], context, childPath(path, key))
          ])
      );
    },
    parse(json, context, path) {
      if (!isJsonObject(json)) {
        throw new SchemaMismatchError(path, `object of ${value.typeName}`);
      }
      // fromEntries defines own properties, so a "__proto__" key survives
      return Object.fromEntries(
        Object.entries(json).map(([key, item]): [string, T] => [
          key,
          value.parse(item, context, childPath(path, key))
        ])
      );
    }
  };
}

/**
 * Object field that may be missing or null; omitted from output when undefined
 */
function optional<T>(inner: TypeDescriptor<T>): OptionalDescriptor<T> {
  return {
    typeName: `${inner.typeName}?`,
    optional: true,
    format(value, context, path) {
      return value === undefined ? null : inner.format(value, context, path);
    },
    parse(json, context, path) {
      return json === null ? undefined : inner.parse(json, context, path);
    }
  };
}

function nullable<T>(inner: TypeDescriptor<T>): TypeDescriptor<T | null> {
  return {
    typeName: `${inner.typeName} | null`,
    format(value, context, path) {
      return value === null ? null : inner.format(value, context, path);
    },
    parse(json, context, path) {
      return json === null ? null : inner.parse(json, context, path);
    }
  };
}

/**
 * Record type with named fields. Fields are written in shape order and
 * unknown JSON fields are ignored when parsing.
 */
function object<S extends ObjectShape>(shape: S, typeName = 'object'): TypeDescriptor<ObjectValue<S>> {
  return {
    typeName,
    format(value, context, path) {
      if (!isRecordLike(value)) {
        throw new UnsupportedTypeError(typeof value, path, `expected ${typeName}`);
      }
      const fields = new Map<string, unknown>(Object.entries(value));
      const result: JsonObject = {};
      for (const [key, descriptor] of Object.entries(shape)) {
        const field = fields.get(key);
        if (field === undefined && isOptionalDescriptor(descriptor)) {
          continue;
        }
        result[key] = descriptor.format(field, context, childPath(path, key));
      }
      return result;
    },
    parse(json, context, path) {
      if (!isJsonObject(json)) {
        throw new SchemaMismatchError(path, typeName);
      }
      const fields: Record<string, unknown> = {};
      for (const [key, descriptor] of Object.entries(shape)) {
        const fieldPath = childPath(path, key);
        const field = Object.prototype.hasOwnProperty.call(json, key) ? json[key] : undefined;
        if (field === undefined) {
          if (isOptionalDescriptor(descriptor)) {
            continue;
          }
          throw new SchemaMismatchError(fieldPath, descriptor.typeName);
        }
        const parsed = descriptor.parse(field, context, fieldPath);
        if (parsed !== undefined) {
          fields[key] = parsed;
        }
      }
      if (!hasRequiredFields(shape, fields)) {
        throw new SchemaMismatchError(path, typeName);
      }
      return fields;
    }
  };
}

/**
 * Descriptor for an enum that has no registry entry of its own
 */
function enumeration<T extends string | number>(
  enumObject: EnumLike<T>,
  typeName: string
): TypeDescriptor<T> {
  const coercion = enumCoercion<T>(typeName, enumObject);
  return {
    typeName,
    format: (value, _context, path) => coercion.format(value, path),
    parse: (json, _context, path) => coercion.parse(json, path)
  };
}

/**
 * Descriptor resolved through the context's coercion registry at call time
 */
function coerced<T>(
  name: CoercionTypeName,
  select: (table: CoercionTable) => Coercion<T> | undefined
): TypeDescriptor<T> {
  return {
    typeName: name,
    format: (value, context, path) => context.registry.resolve(name, select, path).format(value, path),
    parse: (json, context, path) => context.registry.resolve(name, select, path).parse(json, path)
  };
}

export const t = {
  string,
  number,
  integer,
  boolean,
  bytes,
  literal,
  array,
  record,
  optional,
  nullable,
  object,
  enumeration,
  coerced,
  datetime: (): TypeDescriptor<Date> => coerced('datetime', table => table.datetime),
  bigInteger: (): TypeDescriptor<BigInteger> => coerced('BigInteger', table => table.BigInteger),
  elementModP: (): TypeDescriptor<ElementModP> =>
    coerced('ElementModP', table => table.ElementModP),
  elementModQ: (): TypeDescriptor<ElementModQ> =>
    coerced('ElementModQ', table => table.ElementModQ),
  electionType: (): TypeDescriptor<ElectionType> =>
    coerced('ElectionType', table => table.ElectionType),
  reportingUnitType: (): TypeDescriptor<ReportingUnitType> =>
    coerced('ReportingUnitType', table => table.ReportingUnitType),
  voteVariationType: (): TypeDescriptor<VoteVariationType> =>
    coerced('VoteVariationType', table => table.VoteVariationType),
  specVersion: (): TypeDescriptor<SpecVersion> => coerced('SpecVersion', table => table.SpecVersion),
  ballotBoxState: (): TypeDescriptor<BallotBoxState> =>
    coerced('BallotBoxState', table => table.BallotBoxState),
  proofUsage: (): TypeDescriptor<ProofUsage> => coerced('ProofUsage', table => table.ProofUsage),
  contestErrorType: (): TypeDescriptor<ContestErrorType> =>
    coerced('ContestErrorType', table => table.ContestErrorType)
};
