// ============================================================================
// @odlkit/core - Dialects (Token Tables)
// ============================================================================
//
//   Dialect   group / end group       object / end object       terminal  end line
//   -------   ---------------------   -----------------------   --------  -----------
//   Default   BEGIN_GROUP/END_GROUP   BEGIN_OBJECT/END_OBJECT   END       repeat name
//   Cube      Group/End_Group         Object/End_Object         End       bare
//   PDS3      GROUP/END               OBJECT/END                END       repeat name,
//                                                                         aligned
//
// A dialect is plain immutable data. The encoder looks tokens up here and
// never branches on the dialect's name.
// ============================================================================

import { LabelConfigError } from './errors.js';

/** Structural tokens written in place of a key. */
export interface TokenTable {
  readonly group: string;
  readonly endGroup: string;
  readonly object: string;
  readonly endObject: string;
  /** Written once after the last statement, with no line break after it. */
  readonly terminal: string;
}

/**
 * How a block's closing line is written:
 * - `repeat-name`: `END_GROUP = NAME`
 * - `bare`: `End_Group`
 */
export type EndLineStyle = 'repeat-name' | 'bare';

export interface Dialect {
  readonly name: string;
  readonly tokens: TokenTable;
  readonly endLineStyle: EndLineStyle;
  /**
   * Pad every key so all assignment tokens of the document share one column.
   * The column is computed per encode call from the whole tree.
   */
  readonly alignAssignments: boolean;
  /** One level of indentation. */
  readonly indent: string;
}

export const DEFAULT_DIALECT: Dialect = Object.freeze({
  name: 'default',
  tokens: Object.freeze({
    group: 'BEGIN_GROUP',
    endGroup: 'END_GROUP',
    object: 'BEGIN_OBJECT',
    endObject: 'END_OBJECT',
    terminal: 'END',
  }),
  endLineStyle: 'repeat-name',
  alignAssignments: false,
  indent: '  ',
});

/** ISIS cube labels. */
export const CUBE_DIALECT: Dialect = Object.freeze({
  name: 'cube',
  tokens: Object.freeze({
    group: 'Group',
    endGroup: 'End_Group',
    object: 'Object',
    endObject: 'End_Object',
    terminal: 'End',
  }),
  endLineStyle: 'bare',
  alignAssignments: false,
  indent: '  ',
});

/**
 * PDS3 labels.
 *
 * Groups and objects both close with `END = NAME`. The close line alone does
 * not say which kind of block it ends; a reader has to pair it with the
 * matching open line.
 */
export const PDS3_DIALECT: Dialect = Object.freeze({
  name: 'pds3',
  tokens: Object.freeze({
    group: 'GROUP',
    endGroup: 'END',
    object: 'OBJECT',
    endObject: 'END',
    terminal: 'END',
  }),
  endLineStyle: 'repeat-name',
  alignAssignments: true,
  indent: '  ',
});

export const DIALECTS: Readonly<Record<'default' | 'cube' | 'pds3', Dialect>> = Object.freeze({
  default: DEFAULT_DIALECT,
  cube: CUBE_DIALECT,
  pds3: PDS3_DIALECT,
});

const ALIASES: ReadonlyMap<string, Dialect> = new Map([
  ['default', DEFAULT_DIALECT],
  ['pvl', DEFAULT_DIALECT],
  ['cube', CUBE_DIALECT],
  ['isis', CUBE_DIALECT],
  ['pds3', PDS3_DIALECT],
]);

export interface DialectOptions {
  name: string;
  tokens?: Partial<TokenTable>;
  endLineStyle?: EndLineStyle;
  alignAssignments?: boolean;
  indent?: string;
}

/**
 * Create a custom dialect. Anything not given, or given as `undefined`, is taken from {@link DEFAULT_DIALECT}.
 */
export function defineDialect(options: DialectOptions): Dialect {
  const indent = options.indent ?? DEFAULT_DIALECT.indent;
  if (/[^ \t]/.test(indent)) {
    throw new LabelConfigError(`Indent must be spaces or tabs, got ${JSON.stringify(indent)}`, 'indent');
  }

  const given = options.tokens ?? {};
  const fallback = DEFAULT_DIALECT.tokens;
  const tokens: TokenTable = Object.freeze({
    group: given.group ?? fallback.group,
    endGroup: given.endGroup ?? fallback.endGroup,
    object: given.object ?? fallback.object,
    endObject: given.endObject ?? fallback.endObject,
    terminal: given.terminal ?? fallback.terminal,
  });
  for (const [slot, token] of Object.entries(tokens)) {
    if (token.length === 0 || /\s/.test(token)) {
      throw new LabelConfigError(`Token "${slot}" must be a non-empty word, got ${JSON.stringify(token)}`, slot);
    }
  }

  return Object.freeze({
    name: options.name,
    tokens,
    endLineStyle: options.endLineStyle ?? DEFAULT_DIALECT.endLineStyle,
    alignAssignments: options.alignAssignments ?? DEFAULT_DIALECT.alignAssignments,
    indent,
  });
}

/**
 * Look up a built-in dialect by name (`default`/`pvl`, `cube`/`isis`, `pds3`).
 */
export function getDialect(name: string): Dialect {
  const dialect = ALIASES.get(name.toLowerCase());
  if (!dialect) {
    throw new LabelConfigError(
      `Unknown dialect "${name}". Available: ${[...ALIASES.keys()].join(', ')}`,
      'dialect',
    );
  }
  return dialect;
}
