import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { assignmentColumn } from '../align.js';
import { PDS3_DIALECT } from '../dialects.js';
import { LabelEncoder } from '../encoder.js';
import { group, int, mapping, object } from '../label.js';
import type { LabelEntry, LabelMapping } from '../types.js';

describe('assignmentColumn', () => {
  it('is 0 for an empty tree', () => {
    expect(assignmentColumn(mapping([]), 2)).toBe(0);
  });

  it('is the longest key of a flat tree', () => {
    const tree = mapping([
      ['A', int(1)],
      ['LONGKEY', int(2)],
      ['MID', int(3)],
    ]);
    expect(assignmentColumn(tree, 2)).toBe(7);
  });

  it('counts indentation for nested keys', () => {
    const tree = mapping([
      ['ABCDEF', int(1)],
      ['G', group([['H', object([['IJKL', int(2)]])]])],
    ]);
    // IJKL sits two levels down: 2 * 2 + 4 = 8
    expect(assignmentColumn(tree, 2)).toBe(8);
    expect(assignmentColumn(tree, 4)).toBe(12);
  });

  it('counts block names as keys', () => {
    const tree = mapping([['A_LONG_BLOCK_NAME', group([['B', int(1)]])]]);
    expect(assignmentColumn(tree, 2)).toBe(17);
  });

  it('ignores structural tokens, so short keys leave them past the column', () => {
    const tree = mapping([
      ['A', int(1)],
      ['X', group([['B', int(2)]])],
    ]);
    expect(assignmentColumn(tree, 2)).toBe(3);
    expect(new LabelEncoder(PDS3_DIALECT).encodeToString(tree)).toBe('A   = 1\nGROUP = X\n  B = 2\nEND = X\nEND');
  });
});

// ────────────────────────────────────────────────────────────────────────────
// Property: every assignment of an aligned label starts at the same column
// ────────────────────────────────────────────────────────────────────────────

// Keys of six or more characters are never shorter than OBJECT/GROUP/END,
// so structural lines cannot push past the column either.
const key = fc.stringMatching(/^[A-Z][A-Z0-9_]{5,15}$/);

const tree: fc.Arbitrary<LabelMapping> = fc
  .letrec<{ block: LabelEntry[] }>((tie) => ({
    block: fc.array(
      fc.oneof(
        { depthSize: 'small', maxDepth: 3, withCrossShrink: true },
        fc.tuple(key, fc.integer({ min: 0, max: 999 })).map(([k, n]): LabelEntry => [k, int(n)]),
        fc.tuple(key, tie('block')).map(([k, entries]): LabelEntry => [k, group(entries)]),
        fc.tuple(key, tie('block')).map(([k, entries]): LabelEntry => [k, object(entries)]),
      ),
      { maxLength: 5 },
    ),
  }))
  .block.map((entries) => mapping(entries));

describe('Property: PDS3 alignment', () => {
  const encoder = new LabelEncoder(PDS3_DIALECT);

  it('puts every " = " at the computed column', () => {
    fc.assert(
      fc.property(tree, (label) => {
        const column = assignmentColumn(label, PDS3_DIALECT.indent.length);
        const lines = encoder.encodeToString(label).split('\n');

        expect(lines[lines.length - 1]).toBe('END');
        for (const line of lines.slice(0, -1)) {
          expect(line.indexOf(' = ')).toBe(column);
        }
      }),
      { numRuns: 200 },
    );
  });
});
