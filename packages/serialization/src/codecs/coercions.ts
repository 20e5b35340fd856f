import type { JsonValue } from '../types.js';
import { SchemaMismatchError, UnsupportedTypeError } from '../types.js';
import {
  BigInteger,
  ElementModP,
  ElementModQ,
  GroupConstants,
  parseHexDigits
} from '../domain/group.js';
import {
  BallotBoxState,
  ContestErrorType,
  ElectionType,
  ProofUsage,
  ReportingUnitType,
  SpecVersion,
  VoteVariationType
} from '../domain/enums.js';
import type { Coercion, CoercionTable } from './registry.js';

/**
 * Object form of a TypeScript enum (numeric enums carry reverse mappings)
 */
export type EnumLike<T extends string | number> = { readonly [key: string]: T | string };

/**
 * Values of an enum, without the name entries numeric enums add
 */
export function enumMembers<T extends string | number>(enumObject: EnumLike<T>): Array<T | string> {
  const values = Object.values(enumObject);
  const numeric = values.filter(value => typeof value === 'number');
  return numeric.length > 0 ? numeric : values;
}

export function isEnumMember<T extends string | number>(
  enumObject: EnumLike<T>,
  value: unknown
): value is T {
  return enumMembers(enumObject).some(member => member === value);
}

/**
 * Coercion for a string or numeric enum
 */
export function enumCoercion<T extends string | number>(
  typeName: string,
  enumObject: EnumLike<T>
): Coercion<T> {
  return {
    parse(json: JsonValue, path: string): T {
      if (!isEnumMember(enumObject, json)) {
        throw new SchemaMismatchError(
          path,
          `${typeName} (one of ${enumMembers(enumObject).join(', ')})`
        );
      }
      return json;
    },

    format(value: T, path: string): JsonValue {
      if (!isEnumMember(enumObject, value)) {
        throw new UnsupportedTypeError(typeName, path, `${String(value)} is not a member`);
      }
      return value;
    }
  };
}

export const dateTimeCoercion: Coercion<Date> = {
  parse(json: JsonValue, path: string): Date {
    if (typeof json !== 'string') {
      throw new SchemaMismatchError(path, 'datetime string');
    }
    const date = new Date(json);
    if (Number.isNaN(date.getTime())) {
      throw new SchemaMismatchError(path, 'datetime string');
    }
    return date;
  },

  format(value: Date, path: string): JsonValue {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new UnsupportedTypeError('datetime', path, 'expected a valid Date');
    }
    return value.toISOString();
  }
};

/**
 * Coercion for hex-encoded integers of exactly one class, optionally bounded
 * by a modulus in both directions
 */
export function hexCoercion<T extends BigInteger>(
  typeName: string,
  type: new (value: bigint) => T,
  modulus?: bigint
): Coercion<T> {
  const bound = modulus === undefined ? undefined : `below 0x${modulus.toString(16)}`;

  return {
    parse(json: JsonValue, path: string): T {
      const value = typeof json === 'string' ? parseHexDigits(json) : undefined;
      if (value === undefined) {
        throw new SchemaMismatchError(path, `${typeName} hex string`);
      }
      if (modulus !== undefined && value >= modulus) {
        throw new SchemaMismatchError(path, `${typeName} ${bound}`);
      }
      return new type(value);
    },

    format(value: T, path: string): JsonValue {
      if (!(value instanceof type) || value.constructor !== type) {
        const actual = value instanceof BigInteger ? value.constructor.name : typeof value;
        throw new UnsupportedTypeError(typeName, path, `got ${actual}`);
      }
      if (modulus !== undefined && value.value >= modulus) {
        throw new UnsupportedTypeError(typeName, path, `${value.toHex()} is not ${bound}`);
      }
      return value.toHex();
    }
  };
}

/**
 * The fixed list of supported domain coercions
 */
export function createDefaultCoercions(constants?: GroupConstants): CoercionTable {
  return {
    datetime: dateTimeCoercion,
    BigInteger: hexCoercion('BigInteger', BigInteger),
    ElementModP: hexCoercion('ElementModP', ElementModP, constants?.largePrime),
    ElementModQ: hexCoercion('ElementModQ', ElementModQ, constants?.smallPrime),
    ElectionType: enumCoercion<ElectionType>('ElectionType', ElectionType),
    ReportingUnitType: enumCoercion<ReportingUnitType>('ReportingUnitType', ReportingUnitType),
    VoteVariationType: enumCoercion<VoteVariationType>('VoteVariationType', VoteVariationType),
    SpecVersion: enumCoercion<SpecVersion>('SpecVersion', SpecVersion),
    BallotBoxState: enumCoercion<BallotBoxState>('BallotBoxState', BallotBoxState),
    ProofUsage: enumCoercion<ProofUsage>('ProofUsage', ProofUsage),
    ContestErrorType: enumCoercion<ContestErrorType>('ContestErrorType', ContestErrorType)
  };
}
