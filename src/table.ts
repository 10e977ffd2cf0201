/**
 * dbcpatch — DbcTable
 *
 * In-memory form of one WDBC table: a header, a list of fixed-width rows and
 * the string block. parse() validates the header strictly and copies
 * everything out of the source buffer; serialize() recomputes record_count
 * and string_block_size and writes the table back in the same layout.
 *
 * Rows are Uint32Array views of their own. Cells hold raw 32-bit words: an
 * integer, a float bit pattern or a string offset. The table does not know
 * which; the schema only maps names to positions.
 */

import {
  WDBC_MAGIC,
  WDBC_MAGIC_TEXT,
  HEADER_SIZE,
  OFFSET_MAGIC,
  OFFSET_RECORD_COUNT,
  OFFSET_FIELD_COUNT,
  OFFSET_RECORD_SIZE,
  OFFSET_STRING_BLOCK_SIZE,
  CELL_WIDTH,
  computeTableBytes,
} from './constants';
import { StringPool } from './pool';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** The source bytes are not a table this library can patch. Fatal for that table. */
export class TableParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TableParseError';
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

export type Row = Uint32Array;

export interface DbcTableInit {
  readonly name:        string;
  readonly columnCount: number;
  readonly rows?:       readonly Row[];
  readonly pool?:       StringPool;
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

function magicText(magic: number): string {
  let text = '';
  for (let i = 0; i < 4; i++) {
    const code = (magic >>> (i * 8)) & 0xff;
    text += code >= 0x20 && code < 0x7f ? String.fromCharCode(code) : '.';
  }
  return text;
}

// ─── DbcTable ─────────────────────────────────────────────────────────────────

export class DbcTable {
  readonly name:        string;
  readonly columnCount: number;
  readonly pool:        StringPool;
  private readonly _rows: Row[];

  constructor(init: DbcTableInit) {
    if (!Number.isInteger(init.columnCount) || init.columnCount <= 0) {
      throw new RangeError(`DbcTable: columnCount must be a positive integer; got ${init.columnCount}.`);
    }
    this.name        = init.name;
    this.columnCount = init.columnCount;
    this.pool        = init.pool ?? new StringPool();
    this._rows       = [];
    for (const row of init.rows ?? []) {
      if (row.length !== this.columnCount) {
        throw new RangeError(
          `DbcTable: row has ${row.length} cells; table '${init.name}' has ${this.columnCount} columns.`,
        );
      }
      this._rows.push(row);
    }
  }

  // ── parse ─────────────────────────────────────────────────────────────────

  /**
   * Parse a WDBC table.
   *
   * Throws TableParseError on:
   *   - a buffer shorter than the header
   *   - a magic other than 'WDBC' (WDB2 and later hashed formats included)
   *   - record_size ≠ field_count × 4
   *   - a record block or string block extending past the buffer
   */
  static parse(name: string, bytes: Uint8Array): DbcTable {
    if (bytes.byteLength < HEADER_SIZE) {
      throw new TableParseError(
        `${name}: ${bytes.byteLength} bytes is shorter than the ${HEADER_SIZE}-byte header.`,
      );
    }

    const view  = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const magic = view.getUint32(OFFSET_MAGIC, true);
    if (magic !== WDBC_MAGIC) {
      throw new TableParseError(
        `${name}: unsupported table format '${magicText(magic)}'; only '${WDBC_MAGIC_TEXT}' is supported.`,
      );
    }

    const recordCount     = view.getUint32(OFFSET_RECORD_COUNT,      true);
    const fieldCount      = view.getUint32(OFFSET_FIELD_COUNT,       true);
    const recordSize      = view.getUint32(OFFSET_RECORD_SIZE,       true);
    const stringBlockSize = view.getUint32(OFFSET_STRING_BLOCK_SIZE, true);

    if (fieldCount === 0) {
      throw new TableParseError(`${name}: field_count is 0.`);
    }
    if (recordSize !== fieldCount * CELL_WIDTH) {
      throw new TableParseError(
        `${name}: record_size ${recordSize} does not match field_count ${fieldCount} × ${CELL_WIDTH}; ` +
        `tables with packed or wide columns are not supported.`,
      );
    }

    const expected = computeTableBytes(recordCount, fieldCount, stringBlockSize);
    if (bytes.byteLength < expected) {
      throw new TableParseError(
        `${name}: truncated; header describes ${expected} bytes ` +
        `(header:${HEADER_SIZE} + records:${recordCount * recordSize} + strings:${stringBlockSize}), ` +
        `got ${bytes.byteLength}.`,
      );
    }

    const rows: Row[] = [];
    for (let r = 0; r < recordCount; r++) {
      const base = HEADER_SIZE + r * recordSize;
      const row  = new Uint32Array(fieldCount);
      for (let c = 0; c < fieldCount; c++) {
        row[c] = view.getUint32(base + c * CELL_WIDTH, true);
      }
      rows.push(row);
    }

    const poolStart = HEADER_SIZE + recordCount * recordSize;
    const pool      = new StringPool(bytes.subarray(poolStart, poolStart + stringBlockSize));

    return new DbcTable({ name, columnCount: fieldCount, rows, pool });
  }

  // ── Rows ──────────────────────────────────────────────────────────────────

  get rows(): readonly Row[] {
    return this._rows;
  }

  get rowCount(): number {
    return this._rows.length;
  }

  /**
   * First row whose `keyColumn` cell equals `key`. Linear scan.
   * `key` is compared as a u32, so -1 matches 0xFFFFFFFF.
   */
  findRow(keyColumn: number, key: number): Row | undefined {
    if (keyColumn < 0 || keyColumn >= this.columnCount) return undefined;
    const needle = key >>> 0;
    return this._rows.find(row => row[keyColumn] === needle);
  }

  /** A detached all-zero row sized for this table. */
  createRow(): Row {
    return new Uint32Array(this.columnCount);
  }

  /** A detached copy of `row`. String offsets are copied, not re-interned. */
  cloneRow(row: Row): Row {
    return Uint32Array.from(row);
  }

  /**
   * Append a row. Without an argument, appends and returns a new all-zero row.
   */
  appendRow(row: Row = this.createRow()): Row {
    if (row.length !== this.columnCount) {
      throw new RangeError(
        `appendRow: row has ${row.length} cells; table '${this.name}' has ${this.columnCount} columns.`,
      );
    }
    this._rows.push(row);
    return row;
  }

  /** Decode the string a cell points at. Null when the offset is outside the pool. */
  readString(offset: number): string | null {
    return this.pool.readString(offset);
  }

  // ── serialize ─────────────────────────────────────────────────────────────

  /** Header, row-major record block, then the pool's exact bytes. */
  serialize(): Uint8Array {
    const recordSize = this.columnCount * CELL_WIDTH;
    const poolBytes  = this.pool.bytes();
    const out        = new Uint8Array(computeTableBytes(this._rows.length, this.columnCount, poolBytes.length));
    const view       = new DataView(out.buffer);

    view.setUint32(OFFSET_MAGIC,             WDBC_MAGIC,        true);
    view.setUint32(OFFSET_RECORD_COUNT,      this._rows.length, true);
    view.setUint32(OFFSET_FIELD_COUNT,       this.columnCount,  true);
    view.setUint32(OFFSET_RECORD_SIZE,       recordSize,        true);
    view.setUint32(OFFSET_STRING_BLOCK_SIZE, poolBytes.length,  true);

    let offset = HEADER_SIZE;
    for (const row of this._rows) {
      for (let c = 0; c < this.columnCount; c++) {
        view.setUint32(offset, row[c] ?? 0, true);
        offset += CELL_WIDTH;
      }
    }

    out.set(poolBytes, offset);
    return out;
  }
}
