import { describe, expect, it } from 'vitest';
import { EncodingRejectedError, LabelConfigError } from '../errors.js';
import {
  ISIS_GRAMMAR,
  ODL_GRAMMAR,
  ODL_QUOTER,
  OMNI_GRAMMAR,
  PVL_GRAMMAR,
  createQuoter,
  GRAMMARS,
  getGrammar,
  looksNumeric,
  needsQuotes,
  quoteString,
} from '../quoting.js';

describe('looksNumeric', () => {
  it('recognises decimal and based numbers', () => {
    for (const value of ['0', '-12', '+3', '1.5', '.5', '1.', '6.02e23', '1E-3', '16#FF#', '2#1011#']) {
      expect(looksNumeric(value), value).toBe(true);
    }
  });

  it('leaves other text alone', () => {
    for (const value of ['', 'abc', '1a', '-', '+', '0x10', '1e', '16#FF']) {
      expect(looksNumeric(value), value).toBe(false);
    }
  });
});

describe('needsQuotes', () => {
  it('accepts bare identifiers', () => {
    expect(needsQuotes('MARS')).toBe(false);
    expect(needsQuotes('IMAGE_LINE_1')).toBe(false);
    expect(needsQuotes('a-b')).toBe(false);
  });

  it('requires quotes for empty text, whitespace and comments', () => {
    expect(needsQuotes('')).toBe(true);
    expect(needsQuotes('two words')).toBe(true);
    expect(needsQuotes('tab\there')).toBe(true);
    expect(needsQuotes('line\nbreak')).toBe(true);
    expect(needsQuotes('/*note')).toBe(true);
  });

  it('requires quotes for reserved keywords in any case', () => {
    for (const value of ['END', 'end', 'End_Group', 'begin_object', 'Null', 'FALSE']) {
      expect(needsQuotes(value), value).toBe(true);
    }
  });

  it('requires quotes for numeric-looking text', () => {
    expect(needsQuotes('42')).toBe(true);
    expect(needsQuotes('8#777#')).toBe(true);
  });

  it('depends on the grammar for reserved characters', () => {
    expect(needsQuotes('a:b', PVL_GRAMMAR)).toBe(false);
    expect(needsQuotes('a:b', ODL_GRAMMAR)).toBe(true);
    expect(needsQuotes('a!b', PVL_GRAMMAR)).toBe(true);
    expect(needsQuotes('a!b', OMNI_GRAMMAR)).toBe(false);
    expect(needsQuotes('x<y', ISIS_GRAMMAR)).toBe(true);
  });
});

describe('quoteString', () => {
  it('prefers double quotes', () => {
    expect(quoteString('two words')).toBe('"two words"');
  });

  it('falls back to single quotes where the grammar has them', () => {
    expect(quoteString('say "hi"', PVL_GRAMMAR)).toBe(`'say "hi"'`);
  });

  it('rejects text that contains every quote mark', () => {
    expect(() => quoteString(`it's "x"`, PVL_GRAMMAR)).toThrow(EncodingRejectedError);
    expect(() => quoteString('say "hi"', ODL_GRAMMAR)).toThrow(EncodingRejectedError);
  });

  it('records why the text was rejected', () => {
    try {
      quoteString('café', ODL_GRAMMAR);
      expect.unreachable('quoteString should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingRejectedError);
      if (err instanceof EncodingRejectedError) {
        expect(err.grammar).toBe('ODL');
        expect(err.text).toBe('café');
        expect(err.reason).toBe('only printable 7-bit ASCII may be written');
      }
    }
  });

  it('allows line breaks inside ODL strings', () => {
    expect(quoteString('first\nsecond', ODL_GRAMMAR)).toBe('"first\nsecond"');
  });
});

describe('createQuoter', () => {
  it('routes non-ASCII text to the rejecting quote path in ASCII-only grammars', () => {
    expect(ODL_QUOTER.needsQuotes('naïve')).toBe(true);
    expect(() => ODL_QUOTER.quote('naïve')).toThrow(EncodingRejectedError);
    expect(createQuoter(PVL_GRAMMAR).needsQuotes('naïve')).toBe(false);
  });

  it('names the quoter after its grammar', () => {
    expect(createQuoter(ISIS_GRAMMAR).name).toBe('ISIS');
  });
});

describe('getGrammar', () => {
  it('looks grammars up case-insensitively', () => {
    expect(getGrammar('ODL')).toBe(ODL_GRAMMAR);
    expect(getGrammar('omni')).toBe(OMNI_GRAMMAR);
    for (const [name, grammar] of Object.entries(GRAMMARS)) {
      expect(getGrammar(name)).toBe(grammar);
    }
  });

  it('rejects unknown names', () => {
    expect(() => getGrammar('xml')).toThrow(LabelConfigError);
  });
});
