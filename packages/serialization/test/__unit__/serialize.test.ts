import { fromJson, fromRaw, parseJson, toJson, toRaw } from '../../src/serialize';
import { t } from '../../src/descriptors';
import {
  createSerializationContext,
  defaultSerializationContext
} from '../../src/context';
import { createCoercionRegistry } from '../../src/codecs/registry';
import { createDefaultCoercions } from '../../src/codecs/coercions';
import { BigInteger, ElementModP, ElementModQ } from '../../src/domain/group';
import {
  BallotBoxState,
  ContestErrorType,
  ElectionType,
  ProofUsage,
  ReportingUnitType,
  SpecVersion,
  VoteVariationType
} from '../../src/domain/enums';
import {
  ParseError,
  SchemaMismatchError,
  SerializationError,
  UnsupportedTypeError
} from '../../src/types';

const context = defaultSerializationContext;

const tally = t.object(
  {
    name: t.string(),
    count: t.integer()
  },
  'Tally'
);

const ballotRecord = t.object(
  {
    objectId: t.string(),
    createdAt: t.datetime(),
    state: t.ballotBoxState(),
    electionType: t.electionType(),
    unit: t.reportingUnitType(),
    variation: t.voteVariationType(),
    specVersion: t.specVersion(),
    usage: t.proofUsage(),
    contestError: t.contestErrorType(),
    nonce: t.bigInteger(),
    pad: t.elementModP(),
    data: t.elementModQ(),
    weights: t.array(t.number()),
    flags: t.record(t.boolean()),
    digest: t.bytes(),
    note: t.optional(t.string()),
    spoiledAt: t.nullable(t.datetime())
  },
  'BallotRecord'
);

describe('Typed serializer', () => {
  describe('toRaw', () => {
    it('should write fields in descriptor order with 2-space indentation', () => {
      expect(toRaw(tally, { count: 2, name: 'a' }, context)).toBe(
        '{\n  "name": "a",\n  "count": 2\n}'
      );
    });

    it('should write record keys in sorted order', () => {
      expect(toRaw(t.record(t.integer()), { b: 1, a: 2 }, context)).toBe(
        '{\n  "a": 2,\n  "b": 1\n}'
      );
    });

    it('should keep a record key named __proto__', () => {
      const counts = fromRaw(t.record(t.integer()), '{"__proto__":1,"a":2}', context);

      expect(Object.keys(counts)).toEqual(['__proto__', 'a']);
      expect(toRaw(t.record(t.integer()), counts, context)).toBe(
        '{\n  "__proto__": 1,\n  "a": 2\n}'
      );
    });

    it('should be deterministic', () => {
      const value = { name: 'precinct-7', count: 41 };
      expect(toRaw(tally, value, context)).toBe(toRaw(tally, { ...value }, context));
    });

    it('should omit undefined optional fields', () => {
      const descriptor = t.object({ id: t.string(), note: t.optional(t.string()) });

      expect(toRaw(descriptor, { id: 'x' }, context)).toBe('{\n  "id": "x"\n}');
      expect(toJson(descriptor, { id: 'x', note: 'n' }, context)).toEqual({ id: 'x', note: 'n' });
    });

    it('should reject values JSON cannot represent', () => {
      expect(() => toRaw(t.number(), Number.NaN, context)).toThrow(UnsupportedTypeError);
      expect(() => toRaw(t.integer(), 1.5, context)).toThrow(UnsupportedTypeError);
      expect(() => toRaw(t.array(t.number()), [1, Infinity], context)).toThrow(
        'Unsupported type number at $[1]: expected a finite number'
      );
    });
  });

  describe('fromRaw', () => {
    it('should fail with ParseError on malformed JSON', () => {
      expect(() => fromRaw(tally, '{not json', context)).toThrow(ParseError);
      expect(() => parseJson('')).toThrow(ParseError);
    });

    it('should keep the JSON failure as the cause', () => {
      expect.assertions(2);
      try {
        fromRaw(tally, '{not json', context);
      } catch (error) {
        expect(error).toBeInstanceOf(SerializationError);
        expect(error).toMatchObject({ cause: expect.any(SyntaxError) });
      }
    });

    it('should accept UTF-8 bytes', () => {
      const bytes = new TextEncoder().encode('{"name":"é","count":1}');
      expect(fromRaw(tally, bytes, context)).toEqual({ name: 'é', count: 1 });
    });

    it('should fail with ParseError on bytes that are not UTF-8', () => {
      const bytes = new Uint8Array([0x22, 0xff, 0xfe, 0x22]);

      expect(() => fromRaw(t.string(), bytes, context)).toThrow(ParseError);
      expect(() => parseJson(bytes)).toThrow('Invalid UTF-8 in JSON document');
    });

    it('should ignore fields the descriptor does not name', () => {
      const value = fromRaw(tally, '{"name":"a","count":2,"extra":true}', context);

      expect(value).toEqual({ name: 'a', count: 2 });
      expect(value).not.toHaveProperty('extra');
    });

    it('should report a missing required field with its path', () => {
      expect(() => fromRaw(tally, '{"name":"a"}', context)).toThrow(SchemaMismatchError);
      expect(() => fromRaw(tally, '{"name":"a"}', context)).toThrow('Expected integer at $.count');
    });

    it('should report a wrong JSON type with its path', () => {
      expect(() => fromRaw(tally, '{"name":1,"count":2}', context)).toThrow(
        'Expected string at $.name'
      );
      expect(() => fromRaw(t.array(tally), '[{"name":"a","count":"2"}]', context)).toThrow(
        'Expected integer at $[0].count'
      );
      expect(() => fromRaw(tally, '[]', context)).toThrow('Expected Tally at $');
    });

    it('should treat null as absent for optional fields', () => {
      const descriptor = t.object({ id: t.string(), note: t.optional(t.string()) });
      const value = fromRaw(descriptor, '{"id":"x","note":null}', context);

      expect(value).toEqual({ id: 'x' });
      expect(value).not.toHaveProperty('note');
    });

    it('should keep null for nullable values', () => {
      expect(fromRaw(t.nullable(t.string()), 'null', context)).toBeNull();
      expect(fromRaw(t.nullable(t.string()), '"s"', context)).toBe('s');
    });

    it('should check literal values', () => {
      expect(fromJson(t.literal('ballot'), 'ballot', context)).toBe('ballot');
      expect(() => fromJson(t.literal('ballot'), 'tally', context)).toThrow(
        'Expected "ballot" at $'
      );
    });
  });

  describe('round trip', () => {
    const value = {
      objectId: 'ballot-1',
      createdAt: new Date(Date.UTC(2024, 10, 5, 13, 30, 0)),
      state: BallotBoxState.CAST,
      electionType: ElectionType.General,
      unit: ReportingUnitType.Precinct,
      variation: VoteVariationType.OneOfM,
      specVersion: SpecVersion.EG1_0,
      usage: ProofUsage.SelectionValue,
      contestError: ContestErrorType.OverVote,
      nonce: new BigInteger(BigInt('123456789012345678901234567890')),
      pad: new ElementModP(BigInt(4096)),
      data: new ElementModQ(BigInt(0)),
      weights: [0.5, 1, 2.25],
      flags: { audited: true, challenged: false },
      digest: new Uint8Array([0, 1, 254, 255]),
      spoiledAt: null
    };

    it('should reproduce a value built from every supported type', () => {
      const raw = toRaw(ballotRecord, value, context);
      expect(fromRaw(ballotRecord, raw, context)).toEqual(value);
    });

    it('should write coerced fields in their JSON forms', () => {
      expect(toJson(ballotRecord, value, context)).toEqual({
        objectId: 'ballot-1',
        createdAt: '2024-11-05T13:30:00.000Z',
        state: 1,
        electionType: 'general',
        unit: 'precinct',
        variation: 'one_of_m',
        specVersion: 'v1.0',
        usage: "Prove selection's value (0 or 1)",
        contestError: 'over_vote',
        nonce: '018EE90FF6C373E0EE4E3F0AD2',
        pad: '1000',
        data: '00',
        weights: [0.5, 1, 2.25],
        flags: { audited: true, challenged: false },
        digest: '0x0001feff',
        spoiledAt: null
      });
    });

    it('should round trip a list of records', () => {
      const list = t.array(tally);
      const values = [
        { name: 'a', count: 1 },
        { name: 'b', count: 0 }
      ];

      expect(fromRaw(list, toRaw(list, values, context), context)).toEqual(values);
    });
  });

  describe('coercion registry lookups', () => {
    const { ElementModP: _omitted, ...withoutModP } = createDefaultCoercions();
    const restricted = createSerializationContext({
      registry: createCoercionRegistry(withoutModP)
    });

    it('should fail with UnsupportedTypeError when a coercion is not registered', () => {
      expect(() => fromRaw(t.elementModP(), '"0A"', restricted)).toThrow(UnsupportedTypeError);
      expect(() => toRaw(t.elementModP(), new ElementModP(BigInt(10)), restricted)).toThrow(
        'Unsupported type ElementModP at $: no coercion registered'
      );
    });

    it('should report the field path of the unregistered type', () => {
      const descriptor = t.object({ keys: t.array(t.elementModP()) });

      expect(() => fromRaw(descriptor, '{"keys":["01"]}', restricted)).toThrow(
        'Unsupported type ElementModP at $.keys[0]: no coercion registered'
      );
    });

    it('should still serve the coercions that are registered', () => {
      expect(fromRaw(t.elementModQ(), '"0A"', restricted)).toEqual(new ElementModQ(BigInt(10)));
    });

    it('should check group element bounds from the context constants', () => {
      const bounded = createSerializationContext({
        constants: { largePrime: BigInt(23), smallPrime: BigInt(11) }
      });

      expect(fromJson(t.elementModP(), '16', bounded)).toEqual(new ElementModP(BigInt(22)));
      expect(() => fromJson(t.elementModP(), '17', bounded)).toThrow(SchemaMismatchError);
      expect(fromJson(t.elementModQ(), '0A', bounded)).toEqual(new ElementModQ(BigInt(10)));
      expect(() => fromJson(t.elementModQ(), '0B', bounded)).toThrow('Expected ElementModQ below 0xb at $');
    });

    it('should check group element bounds when writing', () => {
      const bounded = createSerializationContext({
        constants: { largePrime: BigInt(23), smallPrime: BigInt(11) }
      });

      expect(toRaw(t.elementModP(), new ElementModP(BigInt(22)), bounded)).toBe('"16"');
      expect(() => toRaw(t.elementModP(), new ElementModP(BigInt(99)), bounded)).toThrow(
        'Unsupported type ElementModP at $: 63 is not below 0x17'
      );
      expect(() => toRaw(t.elementModP(), new ElementModQ(BigInt(1)), context)).toThrow(
        'Unsupported type ElementModP at $: got ElementModQ'
      );
    });

    it('should hold only the registry it serves from', () => {
      const bounded = createSerializationContext({
        constants: { largePrime: BigInt(23), smallPrime: BigInt(11) }
      });

      expect(Object.keys(bounded)).toEqual(['registry']);
      expect(Object.isFrozen(bounded)).toBe(true);
      expect(Object.keys(restricted)).toEqual(['registry']);
      expect(() => fromJson(t.elementModP(), '63', bounded)).toThrow(SchemaMismatchError);
      expect(fromJson(t.elementModP(), '63', context)).toEqual(new ElementModP(BigInt(0x63)));
    });
  });
});
