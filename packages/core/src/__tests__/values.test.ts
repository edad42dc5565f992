import { describe, expect, it } from 'vitest';
import { EncodingRejectedError, UnsupportedValueError } from '../errors.js';
import {
  bool,
  group,
  int,
  nullValue,
  object,
  real,
  sequence,
  set,
  text,
  units,
} from '../label.js';
import { ODL_QUOTER, PVL_QUOTER } from '../quoting.js';
import type { LabelValue } from '../types.js';
import { encodeValue } from '../values.js';

const encode = (value: LabelValue) => encodeValue(value, PVL_QUOTER);

describe('encodeValue', () => {
  describe('scalars', () => {
    it('writes NULL, TRUE and FALSE', () => {
      expect(encode(nullValue())).toBe('NULL');
      expect(encode(bool(true))).toBe('TRUE');
      expect(encode(bool(false))).toBe('FALSE');
    });

    it('writes integers in plain decimal', () => {
      expect(encode(int(0))).toBe('0');
      expect(encode(int(-42))).toBe('-42');
      expect(encode(int(12345678901234567890n))).toBe('12345678901234567890');
    });

    it('keeps a fractional digit on integral reals', () => {
      expect(encode(real(1))).toBe('1.0');
      expect(encode(real(-3))).toBe('-3.0');
      expect(encode(real(0.5))).toBe('0.5');
      expect(encode(real(3.14159))).toBe('3.14159');
      expect(encode(real(-0))).toBe('-0.0');
    });

    it('rejects non-finite numbers', () => {
      expect(() => encode(real(Number.NaN))).toThrow(UnsupportedValueError);
      expect(() => encode(real(Number.POSITIVE_INFINITY))).toThrow(UnsupportedValueError);
      expect(() => encode(int(Number.NEGATIVE_INFINITY))).toThrow(/has no label representation/);
    });
  });

  describe('text', () => {
    it('leaves plain words unquoted', () => {
      expect(encode(text('MARS'))).toBe('MARS');
      expect(encode(text('Gale_Crater'))).toBe('Gale_Crater');
    });

    it('quotes text that would read back as something else', () => {
      expect(encode(text('hello world'))).toBe('"hello world"');
      expect(encode(text(''))).toBe('""');
      expect(encode(text('END'))).toBe('"END"');
      expect(encode(text('true'))).toBe('"true"');
      expect(encode(text('42'))).toBe('"42"');
    });

    it("switches to single quotes for text containing '\"'", () => {
      expect(encode(text('say "hi"'))).toBe(`'say "hi"'`);
      expect(encode(text("it's"))).toBe(`"it's"`);
    });

    it('fails when no quote mark fits', () => {
      expect(() => encode(text(`it's "both"`))).toThrow(EncodingRejectedError);
    });

    it('follows the quoter it is given', () => {
      expect(() => encodeValue(text('say "hi"'), ODL_QUOTER)).toThrow(EncodingRejectedError);
      expect(encodeValue(text('Ångström'), PVL_QUOTER)).toBe('Ångström');
      expect(() => encodeValue(text('Ångström'), ODL_QUOTER)).toThrow(/7-bit ASCII/);
    });
  });

  describe('units', () => {
    it('appends the unit in angle brackets', () => {
      expect(encode(units(int(1), 'km'))).toBe('1 <km>');
      expect(encode(units(real(2.5), 'm/s'))).toBe('2.5 <m/s>');
      expect(encode(units(text('n/a'), 'DEG'))).toBe('n/a <DEG>');
    });

    it('refuses to wrap anything but a scalar', () => {
      const wrapped: LabelValue = JSON.parse(
        '{"kind":"units","value":{"kind":"sequence","items":[]},"unit":"m"}',
      );
      expect(() => encode(wrapped)).toThrow(/cannot carry units/);
    });
  });

  describe('collections', () => {
    it('writes sequences in order', () => {
      expect(encode(sequence([int(1), int(2), int(3)]))).toBe('(1, 2, 3)');
      expect(encode(sequence([int(3), int(1), int(2)]))).toBe('(3, 1, 2)');
      expect(encode(sequence([]))).toBe('()');
    });

    it('writes sets as a braced permutation of their elements', () => {
      const output = encode(set([int(1), int(2), int(3)]));
      const match = /^\{(.*)\}$/.exec(output);

      expect(match).not.toBeNull();
      expect(match?.[1].split(', ').sort()).toEqual(['1', '2', '3']);
      expect(encode(set([]))).toBe('{}');
    });

    it('writes equal set elements once', () => {
      expect(encode(set([int(1), int(1)]))).toBe('{1}');
      expect(encode(set([int(1), text('a'), int(1), text('a')]))).toBe('{1, a}');
    });

    it('encodes nested collections and units elements', () => {
      const value = sequence([
        int(1),
        sequence([text('a b'), nullValue()]),
        units(int(5), 'px'),
      ]);
      expect(encode(value)).toBe('(1, ("a b", NULL), 5 <px>)');
    });

    it('does not accept mappings as values', () => {
      expect(() => encode(sequence([object([])]))).toThrow(UnsupportedValueError);
      expect(() => encode(group([['A', int(1)]]))).toThrow(/cannot be written as a value/);
    });
  });

  describe('unsupported kinds', () => {
    it('reports the value it could not write', () => {
      const rogue: LabelValue = JSON.parse('{"kind":"complex","re":1,"im":2}');
      expect(() => encode(rogue)).toThrow("{ kind: 'complex', re: 1, im: 2 } is not serializable");
    });
  });
});
