import { describe, expect, it } from 'vitest';
import {
  CUBE_DIALECT,
  DEFAULT_DIALECT,
  DIALECTS,
  PDS3_DIALECT,
  defineDialect,
  getDialect,
} from '../dialects.js';
import { LabelConfigError } from '../errors.js';

describe('built-in dialects', () => {
  it('defines the default token table', () => {
    expect(DEFAULT_DIALECT.tokens).toEqual({
      group: 'BEGIN_GROUP',
      endGroup: 'END_GROUP',
      object: 'BEGIN_OBJECT',
      endObject: 'END_OBJECT',
      terminal: 'END',
    });
    expect(DEFAULT_DIALECT.endLineStyle).toBe('repeat-name');
    expect(DEFAULT_DIALECT.alignAssignments).toBe(false);
  });

  it('defines the cube token table with bare end lines', () => {
    expect(CUBE_DIALECT.tokens).toEqual({
      group: 'Group',
      endGroup: 'End_Group',
      object: 'Object',
      endObject: 'End_Object',
      terminal: 'End',
    });
    expect(CUBE_DIALECT.endLineStyle).toBe('bare');
  });

  it('closes both block kinds with END in PDS3 and aligns assignments', () => {
    expect(PDS3_DIALECT.tokens.endGroup).toBe('END');
    expect(PDS3_DIALECT.tokens.endObject).toBe('END');
    expect(PDS3_DIALECT.alignAssignments).toBe(true);
  });

  it('indents with two spaces', () => {
    for (const dialect of Object.values(DIALECTS)) {
      expect(dialect.indent).toBe('  ');
    }
  });

  it('cannot be modified', () => {
    expect(Object.isFrozen(DEFAULT_DIALECT)).toBe(true);
    expect(Object.isFrozen(PDS3_DIALECT.tokens)).toBe(true);
  });
});

describe('getDialect', () => {
  it('resolves names and aliases case-insensitively', () => {
    expect(getDialect('default')).toBe(DEFAULT_DIALECT);
    expect(getDialect('PVL')).toBe(DEFAULT_DIALECT);
    expect(getDialect('ISIS')).toBe(CUBE_DIALECT);
    expect(getDialect('Pds3')).toBe(PDS3_DIALECT);
  });

  it('rejects unknown names', () => {
    expect(() => getDialect('odl3')).toThrow(LabelConfigError);
    expect(() => getDialect('constructor')).toThrow(/Unknown dialect "constructor"/);
  });
});

describe('defineDialect', () => {
  it('fills unspecified settings from the default dialect', () => {
    const dialect = defineDialect({ name: 'lower', tokens: { terminal: 'end' } });
    expect(dialect.tokens).toEqual({ ...DEFAULT_DIALECT.tokens, terminal: 'end' });
    expect(dialect.endLineStyle).toBe('repeat-name');
    expect(dialect.indent).toBe('  ');
    expect(Object.isFrozen(dialect)).toBe(true);
  });

  it('treats undefined tokens as not given', () => {
    const dialect = defineDialect({ name: 'partial', tokens: { group: undefined, terminal: 'FIN' } });
    expect(dialect.tokens.group).toBe('BEGIN_GROUP');
    expect(dialect.tokens.terminal).toBe('FIN');
  });

  it('rejects empty or spaced tokens', () => {
    expect(() => defineDialect({ name: 'bad', tokens: { group: '' } })).toThrow(LabelConfigError);
    expect(() => defineDialect({ name: 'bad', tokens: { endObject: 'END OBJECT' } })).toThrow(
      /Token "endObject"/,
    );
  });

  it('rejects indents that are not whitespace', () => {
    expect(() => defineDialect({ name: 'bad', indent: '->' })).toThrow(LabelConfigError);
  });
});
