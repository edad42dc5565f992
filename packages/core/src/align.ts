// ============================================================================
// @odlkit/core - Assignment Column
// ============================================================================

import { isMapping } from './label.js';
import type { LabelMapping } from './types.js';

/**
 * The column every ` = ` of an aligned label starts at: the widest
 * `indent + key` anywhere in the tree. A long key deep inside a block widens
 * the column for top-level keys as well.
 *
 * Only keys and block names count. The structural tokens that stand in the
 * key slot (`GROUP`, `OBJECT`, `END`) do not, so in a label whose keys are
 * all shorter than those tokens the begin and end lines reach past the
 * column: `A   = 1` above `GROUP = X`.
 *
 * @param indentWidth - length of one indent unit
 * @returns 0 for an empty tree
 */
export function assignmentColumn(block: LabelMapping, indentWidth: number, depth = 0): number {
  let column = 0;
  for (const [key, value] of block.entries) {
    column = Math.max(column, depth * indentWidth + key.length);
    if (isMapping(value)) {
      column = Math.max(column, assignmentColumn(value, indentWidth, depth + 1));
    }
  }
  return column;
}
