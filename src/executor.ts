/**
 * dbcpatch — change executor
 *
 * applyChange() is one step of the fold: it applies a single change to a
 * single table in place and reports what it could not do through the
 * warning sink. A change either completes (possibly with some fields
 * skipped) or leaves the table untouched; no change is half applied.
 *
 *   update  find row by key → overwrite the named cells
 *   insert  zero row, seed key → fill → reject if key exists → append
 *   copy    find row by key → clone → apply updates → reject if key exists → append
 *
 * Duplicate checks read the table as it is now, so a row inserted earlier
 * in the same run blocks a later insert or copy of the same key.
 */

import { I32_MIN, U32_MAX } from './constants';
import { describeFieldRef, resolveField } from './schema';
import type { DbcTable, Row } from './table';
import type {
  Change,
  CopyChange,
  FieldAssignments,
  FieldRef,
  InsertChange,
  PatchValue,
  Provenance,
  TableSchema,
  UpdateChange,
  WarningKind,
  WarningSink,
} from './types';

// ─── Public types ─────────────────────────────────────────────────────────────

export interface ApplyContext {
  readonly schema?:    TableSchema;
  readonly provenance: Provenance;
  readonly warnings:   WarningSink;
}

// ─── Value encoding ───────────────────────────────────────────────────────────

const scratch = new DataView(new ArrayBuffer(4));

/** IEEE-754 single-precision bit pattern of `value`. 0.5 → 0x3F000000. */
export function floatBits(value: number): number {
  scratch.setFloat32(0, value, true);
  return scratch.getUint32(0, true);
}

/** Inverse of floatBits(), for reading float cells back. */
export function bitsToFloat(bits: number): number {
  scratch.setUint32(0, bits >>> 0, true);
  return scratch.getFloat32(0, true);
}

/**
 * The 32-bit word for a non-string value, or undefined when it cannot be
 * stored (integers outside [-2^31, 2^32-1]).
 */
function encodeScalar(value: PatchValue): number | undefined {
  switch (value.kind) {
    case 'int':
      if (!Number.isInteger(value.value) || value.value < I32_MIN || value.value > U32_MAX) return undefined;
      return value.value >>> 0;
    case 'float':
      return floatBits(value.value);
    case 'string':
      return undefined;
  }
}

function describeValue(value: PatchValue): string {
  return value.kind === 'string' ? JSON.stringify(value.value) : `${value.kind} ${value.value}`;
}

// ─── Change context ───────────────────────────────────────────────────────────

/** Per-change helper: resolves columns, writes cells, files warnings. */
class ChangeScope {
  constructor(
    private readonly table: DbcTable,
    private readonly ctx:   ApplyContext,
  ) {}

  warn(kind: WarningKind, detail: string): void {
    this.ctx.warnings.push({
      file:    this.ctx.provenance.file,
      ordinal: this.ctx.provenance.ordinal,
      table:   this.table.name,
      kind,
      detail,
    });
  }

  /** Column for `ref`, or undefined after filing a warning. */
  column(ref: FieldRef): number | undefined {
    const index = resolveField(ref, this.ctx.schema);
    if (index === undefined) {
      this.warn(
        'UnknownField',
        this.ctx.schema === undefined
          ? `field ${describeFieldRef(ref)} cannot be resolved: no schema for this table`
          : `field ${describeFieldRef(ref)} is not in schema ${this.ctx.schema.source}`,
      );
      return undefined;
    }
    if (index >= this.table.columnCount) {
      this.warn(
        'FieldOutOfRange',
        `field ${describeFieldRef(ref)} resolves to column ${index}; table has ${this.table.columnCount} columns`,
      );
      return undefined;
    }
    return index;
  }

  /**
   * Key column of a change. Column 0 when the change names none, or names a
   * field the schema cannot resolve (after an UnknownField warning). An index
   * past the last column skips the change.
   */
  keyColumn(change: Change): number | undefined {
    const ref = change.keyColumn;
    if (ref === undefined) return 0;
    if (resolveField(ref, this.ctx.schema) === undefined) {
      this.warn('UnknownField', `key column ${describeFieldRef(ref)} cannot be resolved; using column 0`);
      return 0;
    }
    return this.column(ref);
  }

  /**
   * Write every assignment into `row`, in order. Strings are interned.
   * Fields that cannot be resolved or encoded are skipped one by one.
   */
  assign(row: Row, fields: FieldAssignments): void {
    for (const [ref, value] of fields) {
      const column = this.column(ref);
      if (column === undefined) continue;

      if (value.kind === 'string') {
        row[column] = this.table.pool.intern(value.value);
        continue;
      }

      const word = encodeScalar(value);
      if (word === undefined) {
        this.warn('InvalidValue', `${describeValue(value)} for field ${describeFieldRef(ref)} does not fit in 32 bits`);
        continue;
      }
      row[column] = word;
    }
  }
}

// ─── Change kinds ─────────────────────────────────────────────────────────────

function applyUpdate(table: DbcTable, change: UpdateChange, scope: ChangeScope): void {
  const keyColumn = scope.keyColumn(change);
  if (keyColumn === undefined) return;

  const row = table.findRow(keyColumn, change.key);
  if (row === undefined) {
    scope.warn('KeyNotFound', `no row with key ${change.key} in column ${keyColumn} to update`);
    return;
  }
  scope.assign(row, change.fields);
}

function applyInsert(table: DbcTable, change: InsertChange, scope: ChangeScope): void {
  const keyColumn = scope.keyColumn(change);
  if (keyColumn === undefined) return;

  const mark = table.pool.mark();
  const row  = table.createRow();
  row[keyColumn] = (change.key ?? 0) >>> 0;
  scope.assign(row, change.values);

  const key = row[keyColumn] ?? 0;
  if (table.findRow(keyColumn, key) !== undefined) {
    table.pool.rollback(mark);
    scope.warn('DuplicateKey', `row with key ${key} already exists in column ${keyColumn}; insert skipped`);
    return;
  }
  table.appendRow(row);
}

function applyCopy(table: DbcTable, change: CopyChange, scope: ChangeScope): void {
  const keyColumn = scope.keyColumn(change);
  if (keyColumn === undefined) return;

  const source = table.findRow(keyColumn, change.key);
  if (source === undefined) {
    scope.warn('KeyNotFound', `no row with key ${change.key} in column ${keyColumn} to copy`);
    return;
  }

  const mark  = table.pool.mark();
  const clone = table.cloneRow(source);
  scope.assign(clone, change.updates);

  const newKey = clone[keyColumn] ?? 0;
  if (table.findRow(keyColumn, newKey) !== undefined) {
    table.pool.rollback(mark);
    scope.warn('DuplicateKey', `row with key ${newKey} already exists in column ${keyColumn}; copy of ${change.key} skipped`);
    return;
  }
  table.appendRow(clone);
}

// ─── applyChange ──────────────────────────────────────────────────────────────

/** Apply one change to `table` in place; warnings go to `ctx.warnings`. */
export function applyChange(table: DbcTable, change: Change, ctx: ApplyContext): void {
  const scope = new ChangeScope(table, ctx);
  switch (change.type) {
    case 'update': applyUpdate(table, change, scope); break;
    case 'insert': applyInsert(table, change, scope); break;
    case 'copy':   applyCopy(table, change, scope);   break;
  }
}
