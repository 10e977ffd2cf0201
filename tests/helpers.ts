/**
 * Shared fixtures: WDBC byte builders and a small apply harness.
 */

import {
  DbcTable,
  applyChange,
  type Change,
  type PatchWarning,
  type TableSchema,
} from '../src/index';

/** A string block: leading NUL, then each string NUL-terminated. */
export function stringBlock(...strings: string[]): Uint8Array {
  const parts = [new Uint8Array(1)];
  for (const s of strings) {
    const bytes = new TextEncoder().encode(s);
    const part  = new Uint8Array(bytes.length + 1);
    part.set(bytes);
    parts.push(part);
  }
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let at = 0;
  for (const p of parts) { out.set(p, at); at += p.length; }
  return out;
}

/** Raw WDBC bytes for `rows` (all of `fieldCount` cells) and `pool`. */
export function wdbc(
  rows:       readonly (readonly number[])[],
  pool:       Uint8Array = new Uint8Array(0),
  fieldCount: number     = rows[0]?.length ?? 1,
): Uint8Array {
  const out  = new Uint8Array(20 + rows.length * fieldCount * 4 + pool.length);
  const view = new DataView(out.buffer);
  view.setUint32(0,  0x43424457, true);
  view.setUint32(4,  rows.length, true);
  view.setUint32(8,  fieldCount, true);
  view.setUint32(12, fieldCount * 4, true);
  view.setUint32(16, pool.length, true);
  let at = 20;
  for (const row of rows) {
    for (let c = 0; c < fieldCount; c++) {
      view.setUint32(at, (row[c] ?? 0) >>> 0, true);
      at += 4;
    }
  }
  out.set(pool, at);
  return out;
}

export function table(
  rows: readonly (readonly number[])[],
  pool?: Uint8Array,
  name = 'Test.dbc',
): DbcTable {
  return DbcTable.parse(name, wdbc(rows, pool));
}

/** Plain arrays of every row, for toEqual. */
export function cells(t: DbcTable): number[][] {
  return t.rows.map(r => Array.from(r));
}

export function schemaOf(table: string, names: readonly string[]): TableSchema {
  return {
    table,
    columns: new Map(names.map((n, i) => [n.toLowerCase(), i])),
    source:  'test',
  };
}

/** Apply `changes` in order; returns the warnings they produced. */
export function applyAll(t: DbcTable, changes: readonly Change[], schema?: TableSchema): PatchWarning[] {
  const warnings: PatchWarning[] = [];
  changes.forEach((change, i) => {
    applyChange(t, change, {
      ...(schema === undefined ? {} : { schema }),
      provenance: { file: 'test.yaml', ordinal: i + 1 },
      warnings,
    });
  });
  return warnings;
}
