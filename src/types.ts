/**
 * dbcpatch — type definitions
 *
 * A patch run is a left fold of PatchOperations over a set of tables. These
 * types describe one operation (which table, which change, where it came
 * from) and the warnings a fold can emit.
 */

// ─── Field References ─────────────────────────────────────────────────────────

/**
 * How a change addresses a column.
 *
 * index: a column number, written in the document as an integer or a numeric
 *        string ("3"). Always resolves without a schema.
 * name:  a field name, resolved case-insensitively against the table's
 *        schema when the change is applied.
 */
export type FieldRef =
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'name';  readonly name:  string };

// ─── Values ───────────────────────────────────────────────────────────────────

/**
 * A value to store in a cell.
 *
 * int:    stored as a 32-bit word; negative values use two's complement.
 * float:  stored as the IEEE-754 single-precision bit pattern.
 * string: interned into the table's string block; the cell holds the offset.
 */
export type PatchValue =
  | { readonly kind: 'int';    readonly value: number }
  | { readonly kind: 'float';  readonly value: number }
  | { readonly kind: 'string'; readonly value: string };

/** Field assignments in declaration order. */
export type FieldAssignments = ReadonlyArray<readonly [FieldRef, PatchValue]>;

// ─── Changes ──────────────────────────────────────────────────────────────────

export interface UpdateChange {
  readonly type:       'update';
  readonly keyColumn?: FieldRef;
  readonly key:        number;
  readonly fields:     FieldAssignments;
}

export interface InsertChange {
  readonly type:       'insert';
  readonly keyColumn?: FieldRef;
  readonly key?:       number;
  readonly values:     FieldAssignments;
}

export interface CopyChange {
  readonly type:       'copy';
  readonly keyColumn?: FieldRef;
  readonly key:        number;
  readonly updates:    FieldAssignments;
}

export type Change = UpdateChange | InsertChange | CopyChange;

// ─── Operations ───────────────────────────────────────────────────────────────

/** Where a change came from: the patch file and its 1-based position in it. */
export interface Provenance {
  readonly file:    string;
  readonly ordinal: number;
}

/** One normalized entry of a patch file. */
export interface PatchOperation extends Provenance {
  /** Table file name as written in the document, e.g. "Spell.dbc". */
  readonly table:  string;
  readonly change: Change;
}

// ─── Warnings ─────────────────────────────────────────────────────────────────

export type WarningKind =
  | 'UnknownField'
  | 'FieldOutOfRange'
  | 'InvalidValue'
  | 'KeyNotFound'
  | 'DuplicateKey'
  | 'UnknownTable';

/** A non-fatal problem. Warnings never stop a run. */
export interface PatchWarning extends Provenance {
  readonly table:  string;
  readonly kind:   WarningKind;
  readonly detail: string;
}

/** Mutable sink threaded through every stage of a run. */
export type WarningSink = PatchWarning[];

// ─── Schemas ──────────────────────────────────────────────────────────────────

/**
 * Field-name → column-index listing for one table.
 * Keys are lower-cased so lookups are case-insensitive.
 */
export interface TableSchema {
  readonly table:   string;
  readonly columns: ReadonlyMap<string, number>;
  /** File the listing was read from, or '<description>:<table>' for in-memory listings. */
  readonly source:  string;
}
