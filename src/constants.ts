/**
 * dbcpatch — layout constants
 *
 * Byte layout of a vanilla WDBC client table. All multi-byte values are
 * little-endian.
 *
 *   ── Header (20 bytes) ──────────────────────────────────────────────────
 *   [0..3]    magic              4 ASCII bytes = 'WDBC'
 *   [4..7]    record_count       u32
 *   [8..11]   field_count        u32
 *   [12..15]  record_size        u32  = field_count × CELL_WIDTH
 *   [16..19]  string_block_size  u32
 *
 *   ── Record block ───────────────────────────────────────────────────────
 *   record_count × record_size bytes, row-major, one u32 per cell
 *
 *   ── String block ───────────────────────────────────────────────────────
 *   string_block_size bytes of NUL-terminated UTF-8 strings. Cells that hold
 *   strings store a byte offset into this block; offset 0 is the empty string.
 */

// ─── Magic ────────────────────────────────────────────────────────────────────

/** 'WDBC' as a little-endian u32. */
export const WDBC_MAGIC: number = 0x43424457;

/** Printable form of WDBC_MAGIC, used in error messages. */
export const WDBC_MAGIC_TEXT = 'WDBC';

// ─── Header Layout ────────────────────────────────────────────────────────────

export const HEADER_SIZE = 20; // bytes

export const OFFSET_MAGIC             =  0; // 4 bytes
export const OFFSET_RECORD_COUNT      =  4; // u32
export const OFFSET_FIELD_COUNT       =  8; // u32
export const OFFSET_RECORD_SIZE       = 12; // u32
export const OFFSET_STRING_BLOCK_SIZE = 16; // u32

/** Every cell is one 32-bit word. Typed columns are out of scope. */
export const CELL_WIDTH = 4;

// ─── Cell Ranges ──────────────────────────────────────────────────────────────

export const I32_MIN = -0x80000000;
export const U32_MAX =  0xffffffff;

// ─── Archive Layout ───────────────────────────────────────────────────────────

/** Directory inside the client archive that holds patched tables. */
export const ARCHIVE_TABLE_DIR = 'DBFilesClient';

// ─── Geometry Helpers ─────────────────────────────────────────────────────────

/** Byte length of a serialized table. */
export function computeTableBytes(
  recordCount:     number,
  fieldCount:      number,
  stringBlockSize: number,
): number {
  return HEADER_SIZE + recordCount * fieldCount * CELL_WIDTH + stringBlockSize;
}
