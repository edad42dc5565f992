// ============================================================================
// @odlkit/core - Label Data Model
// ============================================================================
//
// A label is an ordered tree of key/value statements. Every value carries a
// `kind` tag, fixed when the tree is built, and the encoder dispatches on that
// tag alone. Trees are treated as read-only: nothing in this package mutates
// a value it was given.
// ============================================================================

/** The absent value, written `NULL`. */
export interface NullValue {
  readonly kind: 'null';
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number | bigint;
}

export interface RealValue {
  readonly kind: 'real';
  readonly value: number;
}

export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

/** Values that may sit inside a units wrapper. */
export type LabelScalar = NullValue | BooleanValue | IntegerValue | RealValue | TextValue;

/** A scalar annotated with a unit, written `value <unit>`. */
export interface UnitsValue {
  readonly kind: 'units';
  readonly value: LabelScalar;
  readonly unit: string;
}

/** Ordered sequence, written `(a, b, c)`. */
export interface SequenceValue {
  readonly kind: 'sequence';
  readonly items: readonly LabelValue[];
}

/**
 * Unordered set, written `{a, b, c}`. Element order follows whatever the
 * iterable yields and is not part of the contract.
 */
export interface SetValue {
  readonly kind: 'set';
  readonly items: ReadonlySet<LabelValue> | readonly LabelValue[];
}

/** One `key = value` statement of a mapping. Keys may repeat. */
export type LabelEntry = readonly [key: string, value: LabelValue];

/**
 * A mapping written with OBJECT-family tokens.
 */
export interface ObjectValue {
  readonly kind: 'object';
  readonly entries: readonly LabelEntry[];
}

/**
 * A mapping written with GROUP-family tokens. Only the tag differs from
 * {@link ObjectValue}.
 */
export interface GroupValue {
  readonly kind: 'group';
  readonly entries: readonly LabelEntry[];
}

/** Anything that opens a block. */
export type LabelMapping = ObjectValue | GroupValue;

export type LabelValue =
  | LabelScalar
  | UnitsValue
  | SequenceValue
  | SetValue
  | LabelMapping;

export type LabelKind = LabelValue['kind'];
