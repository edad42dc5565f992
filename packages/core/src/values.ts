// ============================================================================
// @odlkit/core - Value Text
// ============================================================================
//
// Turns the right-hand side of an assignment into text:
//
//   units      1 <km>
//   text       raw, or quoted when the quoter says so
//   boolean    TRUE | FALSE
//   integer    42
//   real       3.5, 1.0
//   null       NULL
//   sequence   (1, 2, 3)
//   set        {1, 2, 3}, duplicates written once
//
// Mappings never appear here; they are block statements (see encoder.ts).
// ============================================================================

import { inspect } from 'node:util';
import { UnsupportedValueError } from './errors.js';
import { isScalar } from './label.js';
import type { TextQuoter } from './quoting.js';
import type { LabelScalar, LabelValue, SetValue } from './types.js';

const NULL_TOKEN = 'NULL';
const TRUE_TOKEN = 'TRUE';
const FALSE_TOKEN = 'FALSE';
const SEPARATOR = ', ';

/** Debug representation carried by {@link UnsupportedValueError}. */
export function represent(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Number.POSITIVE_INFINITY });
}

function unsupported(value: never): never {
  throw new UnsupportedValueError(represent(value));
}

function finite(value: number): number {
  if (!Number.isFinite(value)) {
    throw new UnsupportedValueError(represent(value), 'has no label representation');
  }
  return value;
}

function encodeInteger(value: number | bigint): string {
  return typeof value === 'bigint' ? value.toString() : String(finite(value));
}

function encodeReal(value: number): string {
  if (!Number.isInteger(finite(value))) return String(value);
  return Object.is(value, -0) ? '-0.0' : value.toFixed(1);
}

function encodeText(value: string, quoter: TextQuoter): string {
  return quoter.needsQuotes(value) ? quoter.quote(value) : value;
}

function encodeScalar(value: LabelScalar, quoter: TextQuoter): string {
  switch (value.kind) {
    case 'text':
      return encodeText(value.value, quoter);
    case 'boolean':
      return value.value ? TRUE_TOKEN : FALSE_TOKEN;
    case 'integer':
      return encodeInteger(value.value);
    case 'real':
      return encodeReal(value.value);
    case 'null':
      return NULL_TOKEN;
    default:
      return unsupported(value);
  }
}

function encodeItems(items: Iterable<LabelValue>, quoter: TextQuoter): string {
  const parts: string[] = [];
  for (const item of items) {
    parts.push(encodeValue(item, quoter));
  }
  return parts.join(SEPARATOR);
}

/** Elements with the same text are one element of the set. */
function encodeSet(value: SetValue, quoter: TextQuoter): string {
  const parts = new Set<string>();
  for (const item of value.items) {
    parts.add(encodeValue(item, quoter));
  }
  return `{${[...parts].join(SEPARATOR)}}`;
}

/**
 * Text for one value. The whole string is built before anything is written,
 * so a failure leaves no partial statement behind.
 *
 * @throws {UnsupportedValueError} for kinds with no label text
 * @throws {EncodingRejectedError} when the quoter refuses a text value
 */
export function encodeValue(value: LabelValue, quoter: TextQuoter): string {
  switch (value.kind) {
    case 'units':
      if (!isScalar(value.value)) {
        throw new UnsupportedValueError(represent(value), 'cannot carry units');
      }
      return `${encodeScalar(value.value, quoter)} <${value.unit}>`;
    case 'text':
    case 'boolean':
    case 'integer':
    case 'real':
    case 'null':
      return encodeScalar(value, quoter);
    case 'sequence':
      return `(${encodeItems(value.items, quoter)})`;
    case 'set':
      return encodeSet(value, quoter);
    case 'object':
    case 'group':
      throw new UnsupportedValueError(represent(value), 'cannot be written as a value');
    default:
      return unsupported(value);
  }
}
