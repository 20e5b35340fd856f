import type { JsonValue } from '../types.js';
import { UnsupportedTypeError } from '../types.js';
import type { BigInteger, ElementModP, ElementModQ } from '../domain/group.js';
import type {
  BallotBoxState,
  ContestErrorType,
  ElectionType,
  ProofUsage,
  ReportingUnitType,
  SpecVersion,
  VoteVariationType
} from '../domain/enums.js';

/**
 * Every type with a registered coercion, keyed by its canonical name
 */
export interface CoercionTypeMap {
  datetime: Date;
  BigInteger: BigInteger;
  ElementModP: ElementModP;
  ElementModQ: ElementModQ;
  ElectionType: ElectionType;
  ReportingUnitType: ReportingUnitType;
  VoteVariationType: VoteVariationType;
  SpecVersion: SpecVersion;
  BallotBoxState: BallotBoxState;
  ProofUsage: ProofUsage;
  ContestErrorType: ContestErrorType;
}

export type CoercionTypeName = keyof CoercionTypeMap;

/**
 * Parse/format pair for a type without an unambiguous JSON mapping
 */
export interface Coercion<T> {
  parse(json: JsonValue, path: string): T;
  format(value: T, path: string): JsonValue;
}

export type CoercionTable = {
  readonly [K in CoercionTypeName]?: Coercion<CoercionTypeMap[K]>;
};

/**
 * Read-only lookup of coercions by type name. Built once, never mutated.
 */
export class CoercionRegistry {
  private readonly table: CoercionTable;

  constructor(table: CoercionTable) {
    this.table = Object.freeze({ ...table });
    Object.freeze(this);
  }

  /**
   * Resolve the coercion for a type, failing with UnsupportedTypeError when none is registered
   */
  resolve<T>(
    name: CoercionTypeName,
    select: (table: CoercionTable) => Coercion<T> | undefined,
    path = '$'
  ): Coercion<T> {
    const coercion = select(this.table);
    if (!coercion) {
      throw new UnsupportedTypeError(name, path, 'no coercion registered');
    }
    return coercion;
  }

  has(name: CoercionTypeName): boolean {
    return this.table[name] !== undefined;
  }

  /**
   * Names of all registered coercions
   */
  names(): CoercionTypeName[] {
    const names: CoercionTypeName[] = [];
    for (const name of Object.keys(this.table)) {
      if (isCoercionTypeName(this.table, name)) {
        names.push(name);
      }
    }
    return names;
  }
}

function isCoercionTypeName(table: CoercionTable, name: string): name is CoercionTypeName {
  return Object.prototype.hasOwnProperty.call(table, name);
}

export function createCoercionRegistry(table: CoercionTable): CoercionRegistry {
  return new CoercionRegistry(table);
}
