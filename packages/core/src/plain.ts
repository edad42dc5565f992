// ============================================================================
// @odlkit/core - Trees From Plain Data
// ============================================================================
//
// Builds label trees from JSON/YAML-shaped data:
//
//   null, true, "text", 42       → null, boolean, text, integer
//   1.5                          → real
//   [a, b]                       → sequence
//   { "K": v, ... }              → object (key order kept)
//   { "$group":  {...} | [[k, v], ...] }
//   { "$object": {...} | [[k, v], ...] }
//   { "$set":    [a, b] }
//   { "$units":  [value, "km"] | { "value": v, "unit": "km" } }
//   { "$real":   1 }             → real, for integral reals JSON cannot tell apart
//   { "$text":   "42" }          → text, never reinterpreted
//
// Pair lists allow repeated keys, which a JSON object cannot hold.
// ============================================================================

import { LabelInputError } from './errors.js';
import { bool, group, int, isMapping, isScalar, nullValue, object, real, sequence, set, text, units } from './label.js';
import type { LabelEntry, LabelMapping, LabelScalar, LabelValue } from './types.js';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function fail(path: string, reason: string): never {
  throw new LabelInputError(`${path}: ${reason}`);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function numberFromPlain(value: number, path: string): LabelValue {
  if (!Number.isFinite(value)) fail(path, `${value} is not a finite number`);
  return Number.isInteger(value) ? int(value) : real(value);
}

function entriesFromPlain(input: unknown, path: string): LabelEntry[] {
  if (Array.isArray(input)) {
    return input.map((pair: unknown, i): LabelEntry => {
      if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== 'string') {
        return fail(`${path}[${i}]`, 'expected a [key, value] pair');
      }
      const key: string = pair[0];
      return [key, fromPlain(pair[1], `${path}.${key}`)];
    });
  }
  if (isPlainRecord(input)) {
    return Object.entries(input).map(([key, value]): LabelEntry => [key, fromPlain(value, `${path}.${key}`)]);
  }
  return fail(path, `expected a mapping or a list of [key, value] pairs, got ${describe(input)}`);
}

function scalarFromPlain(input: unknown, path: string): LabelScalar {
  const value = fromPlain(input, path);
  if (!isScalar(value)) fail(path, `units can only wrap a scalar, got ${value.kind}`);
  return value;
}

function unitsFromPlain(input: unknown, path: string): LabelValue {
  if (Array.isArray(input) && input.length === 2 && typeof input[1] === 'string') {
    return units(scalarFromPlain(input[0], `${path}[0]`), input[1]);
  }
  if (isPlainRecord(input) && 'value' in input) {
    const { value, unit } = input;
    if (typeof unit === 'string') {
      return units(scalarFromPlain(value, `${path}.value`), unit);
    }
  }
  return fail(path, 'expected [value, unit] or { value, unit }');
}

function taggedFromPlain(tag: string, input: unknown, path: string): LabelValue {
  const at = `${path}.${tag}`;
  switch (tag) {
    case '$group':
      return group(entriesFromPlain(input, at));
    case '$object':
      return object(entriesFromPlain(input, at));
    case '$set':
      if (!Array.isArray(input)) return fail(at, `expected an array, got ${describe(input)}`);
      return set(input.map((item: unknown, i) => fromPlain(item, `${at}[${i}]`)));
    case '$units':
      return unitsFromPlain(input, at);
    case '$real':
      if (typeof input !== 'number' || !Number.isFinite(input)) return fail(at, 'expected a finite number');
      return real(input);
    case '$text':
      if (typeof input !== 'string') return fail(at, `expected a string, got ${describe(input)}`);
      return text(input);
    default:
      return fail(path, `unknown tag "${tag}"`);
  }
}

/**
 * Convert plain data into a label value.
 *
 * @throws {LabelInputError} for data with no label counterpart (functions,
 * symbols, undefined, class instances, unknown `$` tags)
 */
export function fromPlain(input: unknown, path = '$'): LabelValue {
  if (input === null) return nullValue();

  switch (typeof input) {
    case 'boolean':
      return bool(input);
    case 'string':
      return text(input);
    case 'number':
      return numberFromPlain(input, path);
    case 'bigint':
      return int(input);
  }

  if (Array.isArray(input)) {
    return sequence(input.map((item: unknown, i) => fromPlain(item, `${path}[${i}]`)));
  }

  if (isPlainRecord(input)) {
    const keys = Object.keys(input);
    if (keys.length === 1 && keys[0].startsWith('$')) {
      return taggedFromPlain(keys[0], input[keys[0]], path);
    }
    return object(entriesFromPlain(input, path));
  }

  return fail(path, `${describe(input)} has no label representation`);
}

/**
 * Convert a whole document. The root must be a mapping (record, pair list, or
 * a `$group`/`$object` tag).
 */
export function labelFromPlain(input: unknown): LabelMapping {
  if (Array.isArray(input)) {
    return object(entriesFromPlain(input, '$'));
  }
  const value = fromPlain(input);
  if (!isMapping(value)) {
    return fail('$', `a label document must be a mapping, got ${value.kind}`);
  }
  return value;
}
