/**
 * parsePatchText: document shapes, value typing, validation.
 */

import { describe, it, expect } from 'vitest';
import { parsePatchText, PatchDocumentError, type FieldAssignments } from '../src/index';

describe('document shapes', () => {
  it('reads a table-name mapping', () => {
    const ops = parsePatchText(
      [
        'Spell.dbc:',
        '  - { type: update, key: 1, fields: { Name: "Fire" } }',
        'SpellIcon.dbc:',
        '  - { type: insert, values: { 0: 900 } }',
      ].join('\n'),
      'p.yaml',
    );

    expect(ops).toEqual([
      {
        file: 'p.yaml', ordinal: 1, table: 'Spell.dbc',
        change: { type: 'update', key: 1, fields: [[{ kind: 'name', name: 'Name' }, { kind: 'string', value: 'Fire' }]] },
      },
      {
        file: 'p.yaml', ordinal: 2, table: 'SpellIcon.dbc',
        change: { type: 'insert', values: [[{ kind: 'index', index: 0 }, { kind: 'int', value: 900 }]] },
      },
    ]);
  });

  it('keeps every occurrence of a repeated table name, in order', () => {
    const ops = parsePatchText(
      [
        'Spell.dbc:',
        '  - { type: update, key: 1, fields: { 1: 5 } }',
        'SpellIcon.dbc:',
        '  - { type: update, key: 2, fields: { 1: 6 } }',
        'Spell.dbc:',
        '  - { type: update, key: 3, fields: { 1: 7 } }',
      ].join('\n'),
      'p.yaml',
    );
    expect(ops.map(o => [o.ordinal, o.table])).toEqual([
      [1, 'Spell.dbc'],
      [2, 'SpellIcon.dbc'],
      [3, 'Spell.dbc'],
    ]);
  });

  it('reads a list of { dbc, changes } objects', () => {
    const ops = parsePatchText(
      [
        '- dbc: Spell.dbc',
        '  changes:',
        '    - type: copy',
        '      key: 1',
        '      updates: { 0: 100 }',
        '- dbc: SpellRadius.dbc',
        '  changes:',
        '    - { type: update, key: 8, fields: { Radius: 2 } }',
      ].join('\n'),
      'p.yaml',
    );
    expect(ops.map(o => [o.table, o.change.type])).toEqual([
      ['Spell.dbc', 'copy'],
      ['SpellRadius.dbc', 'update'],
    ]);
  });

  it('reads a single object, with `table` in place of `dbc`', () => {
    const ops = parsePatchText(
      'table: Spell.dbc\nchanges:\n  - { type: update, key: 1, fields: { 2: 3 } }\n',
      'p.yaml',
    );
    expect(ops).toHaveLength(1);
    expect(ops[0]?.table).toBe('Spell.dbc');
  });

  it('numbers ordinals across documents', () => {
    const ops = parsePatchText(
      [
        'A.dbc:',
        '  - { type: insert, key: 1 }',
        '---',
        'B.dbc:',
        '  - { type: insert, key: 2 }',
      ].join('\n'),
      'p.yaml',
    );
    expect(ops.map(o => [o.ordinal, o.table])).toEqual([[1, 'A.dbc'], [2, 'B.dbc']]);
  });

  it('accepts JSON', () => {
    const ops = parsePatchText(
      '{"dbc": "Spell.dbc", "changes": [{"type": "update", "key": 1, "fields": {"2": {"$float": 1}}}]}',
      'p.json',
    );
    expect(ops[0]?.change).toEqual({
      type: 'update', key: 1, fields: [[{ kind: 'index', index: 2 }, { kind: 'float', value: 1 }]],
    });
  });

  it('yields nothing for an empty file or a table without changes', () => {
    expect(parsePatchText('', 'p.yaml')).toEqual([]);
    expect(parsePatchText('Spell.dbc:\n', 'p.yaml')).toEqual([]);
  });
});

describe('values', () => {
  it('types numbers by their notation', () => {
    const [op] = parsePatchText(
      'Spell.dbc:\n  - { type: update, key: 1, fields: { 1: 1.0, 2: 3, 3: 2.5e3, 4: -7 } }\n',
      'p.yaml',
    );
    expect(op?.change).toEqual({
      type: 'update',
      key:  1,
      fields: [
        [{ kind: 'index', index: 1 }, { kind: 'float', value: 1 }],
        [{ kind: 'index', index: 2 }, { kind: 'int',   value: 3 }],
        [{ kind: 'index', index: 3 }, { kind: 'float', value: 2500 }],
        [{ kind: 'index', index: 4 }, { kind: 'int',   value: -7 }],
      ],
    });
  });

  it('stores booleans as 0 / 1', () => {
    const [op] = parsePatchText('A.dbc:\n  - { type: insert, key: 1, values: { 1: true, 2: false } }\n', 'p.yaml');
    expect(op?.change).toEqual({
      type: 'insert',
      key:  1,
      values: [
        [{ kind: 'index', index: 1 }, { kind: 'int', value: 1 }],
        [{ kind: 'index', index: 2 }, { kind: 'int', value: 0 }],
      ],
    });
  });

  it('keeps fields in written order, numeric keys included', () => {
    const [op] = parsePatchText('A.dbc:\n  - { type: update, key: 1, fields: { Name: x, 3: 1, Flags: 2 } }\n', 'p.yaml');
    const change = op?.change;
    const fields: FieldAssignments = change?.type === 'update' ? change.fields : [];
    expect(fields.map(([ref]) => (ref.kind === 'index' ? ref.index : ref.name))).toEqual(['Name', 3, 'Flags']);
  });

  it('reads key_column and the field-map aliases', () => {
    const ops = parsePatchText(
      [
        'A.dbc:',
        '  - { type: update, key_column: SpellID, key: 4, updates: { 1: 2 } }',
        '  - { type: copy, key: 4, fields: { 0: 5 } }',
      ].join('\n'),
      'p.yaml',
    );
    expect(ops.map(o => o.change)).toEqual([
      {
        type: 'update', keyColumn: { kind: 'name', name: 'SpellID' }, key: 4,
        fields: [[{ kind: 'index', index: 1 }, { kind: 'int', value: 2 }]],
      },
      {
        type: 'copy', key: 4,
        updates: [[{ kind: 'index', index: 0 }, { kind: 'int', value: 5 }]],
      },
    ]);
  });
});

describe('invalid documents', () => {
  function errorOf(text: string): PatchDocumentError {
    try {
      parsePatchText(text, 'bad.yaml');
    } catch (err) {
      if (err instanceof PatchDocumentError) return err;
      throw err;
    }
    throw new Error('expected parsePatchText to throw');
  }

  it('rejects YAML syntax errors', () => {
    expect(errorOf('Spell.dbc: [\n').file).toBe('bad.yaml');
  });

  it('rejects an unknown change type with the change pointer', () => {
    expect(errorOf('Spell.dbc:\n  - { type: delete, key: 1 }\n').pointer).toBe('/Spell.dbc/0');
  });

  it('rejects an update without a key', () => {
    expect(errorOf('Spell.dbc:\n  - { type: update, fields: { 1: 2 } }\n').pointer).toBe('/Spell.dbc/0');
  });

  it('rejects a key outside the 32-bit range', () => {
    expect(errorOf('Spell.dbc:\n  - { type: update, key: 4294967296 }\n').pointer).toBe('/Spell.dbc/0');
  });

  it('rejects unknown change properties', () => {
    expect(errorOf('Spell.dbc:\n  - { type: insert, key: 1, colour: red }\n').pointer).toBe('/Spell.dbc/0');
  });

  it('rejects changes that are not a list', () => {
    expect(errorOf('Spell.dbc: 5\n').message).toBe('bad.yaml at /Spell.dbc: expected a list of changes.');
  });

  it('rejects a scalar document', () => {
    expect(errorOf('42\n').message).toBe('bad.yaml: expected a mapping or a sequence at the top level.');
  });

  it('rejects list items without dbc and changes', () => {
    expect(errorOf('- { type: update, key: 1 }\n').pointer).toBe('/0');
  });
});
