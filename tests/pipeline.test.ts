/**
 * runPatchPipeline: ordering, lazy loading, error isolation, archive layout.
 */

import { describe, it, expect } from 'vitest';
import {
  DbcTable,
  MemorySchemaSource,
  MemoryTableSource,
  SchemaRegistry,
  buildArchiveManifest,
  compareCodePoints,
  memoryPatchSource,
  runPatchPipeline,
  sortPatchSources,
  type Logger,
} from '../src/index';
import { cells, wdbc } from './helpers';

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: m => lines.push(`debug ${m}`),
    info:  m => lines.push(`info ${m}`),
    warn:  m => lines.push(`warn ${m}`),
    error: m => lines.push(`error ${m}`),
  };
}

function rowsOf(bytes: Uint8Array | undefined): number[][] {
  if (bytes === undefined) throw new Error('table missing from output');
  return cells(DbcTable.parse('out.dbc', bytes));
}

describe('ordering', () => {
  it('compares by code point, not UTF-16 unit', () => {
    expect(compareCodePoints('\u{1F600}', '\uFFFF')).toBeGreaterThan(0);
    expect(compareCodePoints('a', 'ab')).toBeLessThan(0);
    expect(compareCodePoints('ab', 'ab')).toBe(0);
  });

  it('sorts by base name, then full path', () => {
    const sorted = sortPatchSources([
      { path: 'b/1-b.yaml' },
      { path: 'z/0-a.yaml' },
      { path: 'a/0-a.yaml' },
      { path: 'B.yaml' },
    ]);
    expect(sorted.map(s => s.path)).toEqual(['a/0-a.yaml', 'z/0-a.yaml', 'b/1-b.yaml', 'B.yaml']);
  });
});

describe('runPatchPipeline', () => {
  const base = { 'Spell.dbc': wdbc([[1, 10], [2, 20]]), 'SpellIcon.dbc': wdbc([[1, 0]]) };

  it('applies patches and emits only touched tables', async () => {
    const result = await runPatchPipeline({
      patches: [memoryPatchSource('p/0.yaml', 'Spell.dbc:\n  - { type: update, key: 1, fields: { 1: 11 } }\n')],
      tables:  new MemoryTableSource(base),
    });
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect([...result.tables.keys()]).toEqual(['Spell.dbc']);
    expect(rowsOf(result.tables.get('Spell.dbc'))).toEqual([[1, 11], [2, 20]]);
  });

  it('applies "0-a" before "1-b" whatever order they are given in', async () => {
    const a = memoryPatchSource('p/0-a.yaml', 'Spell.dbc:\n  - { type: insert, key: 3, values: { 1: 30 } }\n');
    const b = memoryPatchSource('p/1-b.yaml', 'Spell.dbc:\n  - { type: update, key: 3, fields: { 1: 31 } }\n');
    const concatenated = memoryPatchSource(
      'p/all.yaml',
      'Spell.dbc:\n  - { type: insert, key: 3, values: { 1: 30 } }\n  - { type: update, key: 3, fields: { 1: 31 } }\n',
    );

    const forward  = await runPatchPipeline({ patches: [a, b], tables: new MemoryTableSource(base) });
    const backward = await runPatchPipeline({ patches: [b, a], tables: new MemoryTableSource(base) });
    const single   = await runPatchPipeline({ patches: [concatenated], tables: new MemoryTableSource(base) });

    expect(backward.warnings).toEqual([]);
    expect(rowsOf(backward.tables.get('Spell.dbc'))).toEqual([[1, 10], [2, 20], [3, 31]]);
    expect(backward.tables.get('Spell.dbc')).toEqual(forward.tables.get('Spell.dbc'));
    expect(single.tables.get('Spell.dbc')).toEqual(forward.tables.get('Spell.dbc'));
  });

  it('is idempotent over its own output', async () => {
    const patch = memoryPatchSource('p/0.yaml', [
      'Spell.dbc:',
      '  - { type: insert, key: 3, values: { 1: "Three" } }',
      '  - { type: copy, key: 1, updates: { 0: 4 } }',
      '  - { type: update, key: 2, fields: { 1: 22 } }',
    ].join('\n'));

    const once  = await runPatchPipeline({ patches: [patch], tables: new MemoryTableSource(base) });
    const first = once.tables.get('Spell.dbc') ?? new Uint8Array(0);
    const twice = await runPatchPipeline({ patches: [patch], tables: new MemoryTableSource({ 'Spell.dbc': first }) });

    expect(twice.tables.get('Spell.dbc')).toEqual(first);
    expect(twice.warnings.map(w => w.kind)).toEqual(['DuplicateKey', 'DuplicateKey']);
  });

  it('resolves field names through the schema registry', async () => {
    const result = await runPatchPipeline({
      patches: [memoryPatchSource('p/0.yaml', 'Spell.dbc:\n  - { type: update, key: 2, fields: { Power: 5 } }\n')],
      tables:  new MemoryTableSource(base),
      schemas: new SchemaRegistry([new MemorySchemaSource({ 'Spell.dbc': ['ID', 'Power'] })]),
    });
    expect(rowsOf(result.tables.get('Spell.dbc'))).toEqual([[1, 10], [2, 5]]);
  });

  it('warns UnknownTable for tables outside the run', async () => {
    const logger = recordingLogger();
    const result = await runPatchPipeline({
      patches: [memoryPatchSource('p/0.yaml', 'Missing.dbc:\n  - { type: insert, key: 1 }\n')],
      tables:  new MemoryTableSource(base),
      logger,
    });
    expect(result.warnings).toEqual([{
      file:    'p/0.yaml',
      ordinal: 1,
      table:   'Missing.dbc',
      kind:    'UnknownTable',
      detail:  'table is not among the tables being patched; change ignored',
    }]);
    expect(result.tables.size).toBe(0);
    expect(logger.lines).toContain(
      'warn p/0.yaml#1 Missing.dbc: UnknownTable: table is not among the tables being patched; change ignored',
    );
  });

  it('skips a file that does not parse and runs the rest', async () => {
    const result = await runPatchPipeline({
      patches: [
        memoryPatchSource('p/0-bad.yaml', 'Spell.dbc: [\n'),
        memoryPatchSource('p/1-good.yaml', 'Spell.dbc:\n  - { type: update, key: 2, fields: { 1: 21 } }\n'),
      ],
      tables: new MemoryTableSource(base),
    });
    expect(result.errors.map(e => e.path)).toEqual(['p/0-bad.yaml']);
    expect(rowsOf(result.tables.get('Spell.dbc'))).toEqual([[1, 10], [2, 21]]);
  });

  it('parses a whole file before applying any of it', async () => {
    const result = await runPatchPipeline({
      patches: [memoryPatchSource('p/0.yaml', [
        'Spell.dbc:',
        '  - { type: update, key: 1, fields: { 1: 99 } }',
        '  - { type: nonsense }',
      ].join('\n'))],
      tables: new MemoryTableSource(base),
    });
    expect(result.errors).toHaveLength(1);
    expect(result.tables.size).toBe(0);
  });

  it('skips a table that does not parse and keeps the others', async () => {
    const result = await runPatchPipeline({
      patches: [memoryPatchSource('p/0.yaml', [
        'Bad.dbc:',
        '  - { type: update, key: 1, fields: { 1: 1 } }',
        'Spell.dbc:',
        '  - { type: update, key: 1, fields: { 1: 12 } }',
        'Bad.dbc:',
        '  - { type: update, key: 1, fields: { 1: 2 } }',
      ].join('\n'))],
      tables: new MemoryTableSource({ ...base, 'Bad.dbc': new Uint8Array(4) }),
    });
    expect(result.errors.map(e => [e.path, e.error.name])).toEqual([['memory:Bad.dbc', 'TableParseError']]);
    expect([...result.tables.keys()]).toEqual(['Spell.dbc']);
    expect(rowsOf(result.tables.get('Spell.dbc'))).toEqual([[1, 12], [2, 20]]);
  });

  it('reports a patch source that cannot be read', async () => {
    const result = await runPatchPipeline({
      patches: [{ path: 'p/0.yaml', read: async () => { throw new Error('disk on fire'); } }],
      tables:  new MemoryTableSource(base),
    });
    expect(result.errors.map(e => [e.path, e.error.message])).toEqual([['p/0.yaml', 'disk on fire']]);
  });
});

describe('buildArchiveManifest', () => {
  it('places tables under DBFilesClient/ over extra files at the same path', () => {
    const patched = new Uint8Array([1]);
    const manifest = buildArchiveManifest(
      new Map([['Spell.dbc', patched]]),
      new Map([
        ['Interface\\Icons\\a.blp', new Uint8Array([2])],
        ['DBFilesClient/Spell.dbc', new Uint8Array([3])],
      ]),
    );
    expect([...manifest.keys()]).toEqual(['Interface/Icons/a.blp', 'DBFilesClient/Spell.dbc']);
    expect(manifest.get('DBFilesClient/Spell.dbc')).toBe(patched);
  });
});
