import { BigInteger, ElementModP, ElementModQ, parseHexDigits } from '../../src/domain/group';

describe('Group values', () => {
  it('should reject negative values', () => {
    expect(() => new BigInteger(BigInt(-1))).toThrow(RangeError);
    expect(() => new ElementModQ(BigInt(-5))).toThrow('ElementModQ must be non-negative, got -5');
  });

  it('should render hex through toString', () => {
    expect(String(new ElementModP(BigInt(255)))).toBe('FF');
    expect(new BigInteger(BigInt(256)).toHex()).toBe('0100');
  });

  it('should compare by class and value', () => {
    const p = new ElementModP(BigInt(7));

    expect(p.equals(new ElementModP(BigInt(7)))).toBe(true);
    expect(p.equals(new ElementModP(BigInt(8)))).toBe(false);
    expect(p.equals(new ElementModQ(BigInt(7)))).toBe(false);
  });

  it('should parse bare hex digits only', () => {
    expect(parseHexDigits('ff')).toBe(BigInt(255));
    expect(parseHexDigits('00FF')).toBe(BigInt(255));
    expect(parseHexDigits('0xff')).toBeUndefined();
    expect(parseHexDigits('g1')).toBeUndefined();
  });
});
