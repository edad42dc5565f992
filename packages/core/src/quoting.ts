// ============================================================================
// @odlkit/core - Text Quoting
// ============================================================================
//
// The encoder asks a TextQuoter two things about every text value: does it
// have to be quoted, and what is its quoted form. The grammars below answer
// for the label families odlkit writes.
//
//   Grammar   quote marks   ASCII only   notes
//   -------   -----------   ----------   ---------------------------------
//   PVL       " then '      no
//   ODL       "             yes          '...' is a symbol, not a string
//   ISIS      " then '      no
//   Omni      " then '      no           fewest reserved characters
//
// No grammar has an escape sequence inside quotes, so text containing every
// allowed quote mark cannot be written at all.
// ============================================================================

import { EncodingRejectedError, LabelConfigError } from './errors.js';

/**
 * Decides whether text needs quoting and produces the quoted form.
 * `quote` throws {@link EncodingRejectedError} when no legal form exists.
 */
export interface TextQuoter {
  readonly name: string;
  needsQuotes(text: string): boolean;
  quote(text: string): string;
}

export interface Grammar {
  readonly name: string;
  /** Tried in order; the first one absent from the text wins. */
  readonly quoteMarks: readonly string[];
  readonly reservedCharacters: ReadonlySet<string>;
  /** Compared case-insensitively. */
  readonly reservedKeywords: ReadonlySet<string>;
  readonly asciiOnly: boolean;
}

const RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  'BEGIN_GROUP',
  'END_GROUP',
  'BEGIN_OBJECT',
  'END_OBJECT',
  'GROUP',
  'OBJECT',
  'END',
  'NULL',
  'TRUE',
  'FALSE',
]);

const PVL_RESERVED = '&<>\'{},[]=!#()%+";~|';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const BASED_INTEGER = /^[+-]?\d+#[0-9A-Za-z]+#$/;
const NON_ASCII_OR_CONTROL = /[^\x20-\x7e\t\r\n]/;

function chars(list: string): ReadonlySet<string> {
  return new Set(list);
}

export const PVL_GRAMMAR: Grammar = Object.freeze({
  name: 'PVL',
  quoteMarks: Object.freeze(['"', "'"]),
  reservedCharacters: chars(PVL_RESERVED),
  reservedKeywords: RESERVED_KEYWORDS,
  asciiOnly: false,
});

export const ODL_GRAMMAR: Grammar = Object.freeze({
  name: 'ODL',
  quoteMarks: Object.freeze(['"']),
  reservedCharacters: chars(`${PVL_RESERVED}*/^:`),
  reservedKeywords: RESERVED_KEYWORDS,
  asciiOnly: true,
});

export const ISIS_GRAMMAR: Grammar = Object.freeze({
  name: 'ISIS',
  quoteMarks: Object.freeze(['"', "'"]),
  reservedCharacters: chars(PVL_RESERVED),
  reservedKeywords: RESERVED_KEYWORDS,
  asciiOnly: false,
});

export const OMNI_GRAMMAR: Grammar = Object.freeze({
  name: 'Omni',
  quoteMarks: Object.freeze(['"', "'"]),
  reservedCharacters: chars('\'{},[]=()";<>'),
  reservedKeywords: RESERVED_KEYWORDS,
  asciiOnly: false,
});

export const GRAMMARS: Readonly<Record<'pvl' | 'odl' | 'isis' | 'omni', Grammar>> = Object.freeze({
  pvl: PVL_GRAMMAR,
  odl: ODL_GRAMMAR,
  isis: ISIS_GRAMMAR,
  omni: OMNI_GRAMMAR,
});

/** True when the text would be read back as a number. */
export function looksNumeric(value: string): boolean {
  return DECIMAL.test(value) || BASED_INTEGER.test(value);
}

/**
 * Whether `value` must be quoted to be read back as the same text.
 */
export function needsQuotes(value: string, grammar: Grammar = PVL_GRAMMAR): boolean {
  if (value.length === 0) return true;
  if (/\s/.test(value)) return true;
  if (value.includes('/*')) return true;
  if (grammar.reservedKeywords.has(value.toUpperCase())) return true;
  if (looksNumeric(value)) return true;

  for (const ch of value) {
    if (grammar.reservedCharacters.has(ch) || grammar.quoteMarks.includes(ch)) {
      return true;
    }
  }
  return false;
}

/**
 * Quote `value` with the first quote mark of the grammar it does not contain.
 *
 * @throws {EncodingRejectedError} if no quote mark fits, or the grammar is
 * ASCII-only and the text is not.
 */
export function quoteString(value: string, grammar: Grammar = PVL_GRAMMAR): string {
  if (grammar.asciiOnly && NON_ASCII_OR_CONTROL.test(value)) {
    throw new EncodingRejectedError(value, grammar.name, 'only printable 7-bit ASCII may be written');
  }

  const mark = grammar.quoteMarks.find((q) => !value.includes(q));
  if (mark === undefined) {
    throw new EncodingRejectedError(
      value,
      grammar.name,
      `text contains every quote mark (${grammar.quoteMarks.join(' ')})`,
    );
  }
  return `${mark}${value}${mark}`;
}

export function createQuoter(grammar: Grammar): TextQuoter {
  return Object.freeze({
    name: grammar.name,
    needsQuotes: (value: string) =>
      needsQuotes(value, grammar) || (grammar.asciiOnly && NON_ASCII_OR_CONTROL.test(value)),
    quote: (value: string) => quoteString(value, grammar),
  });
}

export const PVL_QUOTER = createQuoter(PVL_GRAMMAR);
export const ODL_QUOTER = createQuoter(ODL_GRAMMAR);
export const ISIS_QUOTER = createQuoter(ISIS_GRAMMAR);
export const OMNI_QUOTER = createQuoter(OMNI_GRAMMAR);

const GRAMMAR_ALIASES: ReadonlyMap<string, Grammar> = new Map(Object.entries(GRAMMARS));

/**
 * Look up a built-in grammar by name, case-insensitively.
 */
export function getGrammar(name: string): Grammar {
  const grammar = GRAMMAR_ALIASES.get(name.toLowerCase());
  if (!grammar) {
    throw new LabelConfigError(
      `Unknown grammar "${name}". Available: ${[...GRAMMAR_ALIASES.keys()].join(', ')}`,
      'grammar',
    );
  }
  return grammar;
}
