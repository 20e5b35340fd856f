import { getBigInt, toBeHex } from 'ethers';

const BN_0 = BigInt(0);
const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * Moduli an election's group elements are checked against
 */
export interface GroupConstants {
  /** Modulus of ElementModP values */
  largePrime: bigint;
  /** Modulus of ElementModQ values */
  smallPrime: bigint;
}

/**
 * Non-negative integer of arbitrary size, written as uppercase hex in JSON
 */
export class BigInteger {
  public readonly value: bigint;

  constructor(value: bigint) {
    if (value < BN_0) {
      throw new RangeError(`${new.target.name} must be non-negative, got ${value}`);
    }
    this.value = value;
  }

  /**
   * Even-length uppercase hex without a 0x prefix
   */
  toHex(): string {
    return toBeHex(this.value).slice(2).toUpperCase();
  }

  equals(other: BigInteger): boolean {
    return other.constructor === this.constructor && other.value === this.value;
  }

  toString(): string {
    return this.toHex();
  }
}

/**
 * Element of the multiplicative group mod the large prime
 */
export class ElementModP extends BigInteger {}

/**
 * Element of the group mod the small prime (exponents, challenges, hashes)
 */
export class ElementModQ extends BigInteger {}

/**
 * Parse hex digits (no 0x prefix, either case) into a bigint
 */
export function parseHexDigits(hex: string): bigint | undefined {
  if (!HEX_DIGITS.test(hex)) {
    return undefined;
  }
  return getBigInt(`0x${hex}`);
}
