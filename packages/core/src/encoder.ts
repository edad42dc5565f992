// ============================================================================
// @odlkit/core - Label Encoder
// ============================================================================
//
// Writes a label tree as text, one statement per line:
//
//   A = 1
//   BEGIN_GROUP = X
//     B = 2
//   END_GROUP = X
//   END
//
// Every dialect shares this traversal; the dialect only supplies tokens,
// the end-line style, the indent unit and whether keys are padded to a
// common column. Per-call values (the column) travel in an EncodeContext,
// so one encoder instance can serve any number of concurrent calls.
//
// The terminal token is written without a trailing line break. Callers that
// want one append it themselves.
// ============================================================================

import { assignmentColumn } from './align.js';
import { CUBE_DIALECT, DEFAULT_DIALECT, type Dialect, PDS3_DIALECT, getDialect } from './dialects.js';
import { logEncodeFailure, timer } from './logger.js';
import { ISIS_QUOTER, ODL_QUOTER, PVL_QUOTER, type TextQuoter } from './quoting.js';
import { type LabelSink, StringSink } from './sink.js';
import type { LabelMapping, LabelValue } from './types.js';
import { encodeValue } from './values.js';

const ASSIGNMENT = ' = ';
const NEWLINE = '\n';

/** Values fixed for the duration of one encode call. */
export interface EncodeContext {
  readonly dialect: Dialect;
  readonly quoter: TextQuoter;
  /** Width keys are padded to before ` = `; 0 when the dialect does not align. */
  readonly column: number;
}

export interface EncoderOptions {
  /** Defaults to the grammar that matches the dialect (see {@link defaultQuoterFor}). */
  quoter?: TextQuoter;
}

const DIALECT_QUOTERS: ReadonlyMap<Dialect, TextQuoter> = new Map([
  [PDS3_DIALECT, ODL_QUOTER],
  [CUBE_DIALECT, ISIS_QUOTER],
]);

/**
 * ODL quoting for PDS3, ISIS quoting for cube labels, PVL quoting otherwise.
 */
export function defaultQuoterFor(dialect: Dialect): TextQuoter {
  return DIALECT_QUOTERS.get(dialect) ?? PVL_QUOTER;
}

/**
 * Build the per-call context, running the column pre-pass when the dialect
 * aligns assignments.
 */
export function createContext(tree: LabelMapping, dialect: Dialect, quoter: TextQuoter): EncodeContext {
  const column = dialect.alignAssignments ? assignmentColumn(tree, dialect.indent.length) : 0;
  return { dialect, quoter, column };
}

// ---------------------------------------------------------------------------
// Lines
// ---------------------------------------------------------------------------

function indentFor(level: number, context: EncodeContext): string {
  return context.dialect.indent.repeat(level);
}

function writeAssignment(
  key: string,
  value: string,
  level: number,
  context: EncodeContext,
  sink: LabelSink,
): void {
  const lead = `${indentFor(level, context)}${key}`.padEnd(context.column);
  sink.write(`${lead}${ASSIGNMENT}${value}${NEWLINE}`);
}

function writeBlockEnd(
  token: string,
  name: string,
  level: number,
  context: EncodeContext,
  sink: LabelSink,
): void {
  if (context.dialect.endLineStyle === 'bare') {
    sink.write(`${indentFor(level, context)}${token}${NEWLINE}`);
    return;
  }
  writeAssignment(token, name, level, context, sink);
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

function encodeNested(
  name: string,
  block: LabelMapping,
  level: number,
  context: EncodeContext,
  sink: LabelSink,
): void {
  const { tokens } = context.dialect;
  const [begin, end] =
    block.kind === 'group' ? [tokens.group, tokens.endGroup] : [tokens.object, tokens.endObject];

  writeAssignment(begin, name, level, context, sink);
  encodeBlock(block, level + 1, context, sink);
  writeBlockEnd(end, name, level, context, sink);
}

function encodeStatement(
  key: string,
  value: LabelValue,
  level: number,
  context: EncodeContext,
  sink: LabelSink,
): void {
  switch (value.kind) {
    case 'group':
    case 'object':
      encodeNested(key, value, level, context, sink);
      return;
    default:
      writeAssignment(key, encodeValue(value, context.quoter), level, context, sink);
  }
}

/**
 * Write every statement of `block` at nesting `level`, in entry order.
 */
export function encodeBlock(
  block: LabelMapping,
  level: number,
  context: EncodeContext,
  sink: LabelSink,
): void {
  for (const [key, value] of block.entries) {
    encodeStatement(key, value, level, context, sink);
  }
}

// ---------------------------------------------------------------------------
// Encoder
// ---------------------------------------------------------------------------

/**
 * Encodes label trees in one dialect.
 *
 * @example
 * ```ts
 * const encoder = new LabelEncoder(PDS3_DIALECT);
 * encoder.encode(tree, process.stdout);
 * ```
 */
export class LabelEncoder {
  readonly dialect: Dialect;
  readonly quoter: TextQuoter;

  constructor(dialect: Dialect = DEFAULT_DIALECT, options: EncoderOptions = {}) {
    this.dialect = dialect;
    this.quoter = options.quoter ?? defaultQuoterFor(dialect);
  }

  /**
   * Append the label for `tree` to `sink`. On failure the lines written before
   * the failing statement stay in the sink and nothing after it is written.
   *
   * @throws {UnsupportedValueError}
   * @throws {EncodingRejectedError}
   */
  encode(tree: LabelMapping, sink: LabelSink): void {
    const t = timer(`encode (${this.dialect.name})`);
    const context = createContext(tree, this.dialect, this.quoter);

    try {
      encodeBlock(tree, 0, context, sink);
    } catch (err) {
      logEncodeFailure(this.dialect.name, err);
      throw err;
    }
    sink.write(this.dialect.tokens.terminal);

    t.endWith({ statements: tree.entries.length, column: context.column });
  }

  /** Encode into a private buffer; a failed call returns nothing partial. */
  encodeToString(tree: LabelMapping): string {
    const sink = new StringSink();
    this.encode(tree, sink);
    return sink.toString();
  }

  encodeValue(value: LabelValue): string {
    return encodeValue(value, this.quoter);
  }
}

/**
 * Encoder for a built-in dialect name, with that dialect's default quoting.
 */
export function createEncoder(dialectName: string, options: EncoderOptions = {}): LabelEncoder {
  return new LabelEncoder(getDialect(dialectName), options);
}

export function encodeLabel(
  tree: LabelMapping,
  options: EncoderOptions & { dialect?: Dialect } = {},
): string {
  return new LabelEncoder(options.dialect, options).encodeToString(tree);
}
