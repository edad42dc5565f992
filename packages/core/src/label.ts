// ============================================================================
// @odlkit/core - Label Builders
// ============================================================================

import type {
  BooleanValue,
  GroupValue,
  IntegerValue,
  LabelEntry,
  LabelMapping,
  LabelScalar,
  LabelValue,
  NullValue,
  ObjectValue,
  RealValue,
  SequenceValue,
  SetValue,
  TextValue,
  UnitsValue,
} from './types.js';

/** Entries as a list of pairs (keys may repeat) or as a record. */
export type MappingInput = readonly LabelEntry[] | Readonly<Record<string, LabelValue>>;

const NULL: NullValue = Object.freeze({ kind: 'null' });

function isEntryList(input: MappingInput): input is readonly LabelEntry[] {
  return Array.isArray(input);
}

function toEntries(input: MappingInput): readonly LabelEntry[] {
  const entries: LabelEntry[] = isEntryList(input)
    ? input.map(([key, value]): LabelEntry => Object.freeze([key, value] as const))
    : Object.entries(input).map(([key, value]): LabelEntry => Object.freeze([key, value] as const));
  return Object.freeze(entries);
}

export function nullValue(): NullValue {
  return NULL;
}

export function bool(value: boolean): BooleanValue {
  return Object.freeze({ kind: 'boolean', value });
}

export function int(value: number | bigint): IntegerValue {
  return Object.freeze({ kind: 'integer', value });
}

export function real(value: number): RealValue {
  return Object.freeze({ kind: 'real', value });
}

export function text(value: string): TextValue {
  return Object.freeze({ kind: 'text', value });
}

/**
 * Wrap a scalar with a unit annotation.
 *
 * @example
 * ```ts
 * units(int(1), 'km') // encodes as `1 <km>`
 * ```
 */
export function units(value: LabelScalar, unit: string): UnitsValue {
  return Object.freeze({ kind: 'units', value, unit });
}

export function sequence(items: Iterable<LabelValue>): SequenceValue {
  return Object.freeze({ kind: 'sequence', items: Object.freeze([...items]) });
}

export function set(items: Iterable<LabelValue>): SetValue {
  return Object.freeze({ kind: 'set', items: new Set(items) });
}

/** A nested mapping written with OBJECT-family tokens. */
export function object(input: MappingInput): ObjectValue {
  return Object.freeze({ kind: 'object', entries: toEntries(input) });
}

/** A nested mapping written with GROUP-family tokens. */
export function group(input: MappingInput): GroupValue {
  return Object.freeze({ kind: 'group', entries: toEntries(input) });
}

/** A document root. Roots carry no tokens of their own, so the tag is `object`. */
export function mapping(input: MappingInput): ObjectValue {
  return object(input);
}

export function isMapping(value: LabelValue): value is LabelMapping {
  return value.kind === 'object' || value.kind === 'group';
}

export function isScalar(value: LabelValue): value is LabelScalar {
  switch (value.kind) {
    case 'null':
    case 'boolean':
    case 'integer':
    case 'real':
    case 'text':
      return true;
    default:
      return false;
  }
}
