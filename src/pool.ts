/**
 * dbcpatch — StringPool
 *
 * The string block of a table: NUL-terminated UTF-8 strings addressed by byte
 * offset. The pool only ever grows at its end, so an offset handed out once
 * stays valid for the rest of the run.
 *
 * intern() never looks for an existing copy of the string. Interning "Foo"
 * twice appends it twice and returns two different offsets. Output bytes
 * depend on this; do not add deduplication here.
 */

// ─── Module-level codecs ──────────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

const INITIAL_CAPACITY = 256;

// ─── StringPool ───────────────────────────────────────────────────────────────

export class StringPool {
  private buf:    Uint8Array;
  private length: number;

  /**
   * @param initial  The string block exactly as read from the table. Copied;
   *                 the caller's buffer is never written to.
   */
  constructor(initial: Uint8Array = new Uint8Array(0)) {
    this.buf    = new Uint8Array(Math.max(INITIAL_CAPACITY, initial.length));
    this.buf.set(initial);
    this.length = initial.length;
  }

  /** Current byte length of the block. */
  get byteLength(): number {
    return this.length;
  }

  // ── intern ────────────────────────────────────────────────────────────────

  /**
   * Append `text` and its terminator; return the offset it was written at.
   * The pool grows by exactly utf8ByteLength(text) + 1 bytes (plus one
   * leading NUL when the pool was empty).
   */
  intern(text: string): number {
    // Offset 0 must read as the empty string, so an empty block gets its NUL
    // first: the first intern() into an empty pool grows it by length + 2.
    if (this.length === 0) this.append(new Uint8Array(1));

    const offset = this.length;
    const bytes  = utf8Encoder.encode(text);
    this.reserve(bytes.length + 1);
    this.buf.set(bytes, this.length);
    this.buf[this.length + bytes.length] = 0;
    this.length += bytes.length + 1;
    return offset;
  }

  // ── readString ────────────────────────────────────────────────────────────

  /**
   * Decode the string starting at `offset`, up to its terminator.
   * Returns null when `offset` lies outside the pool.
   */
  readString(offset: number): string | null {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.length) return null;
    if (offset === this.length) return offset === 0 ? '' : null;

    let end = offset;
    while (end < this.length && this.buf[end] !== 0) end++;
    return utf8Decoder.decode(this.buf.subarray(offset, end));
  }

  // ── mark / rollback ───────────────────────────────────────────────────────

  /** Current end of the pool, for a later rollback(). */
  mark(): number {
    return this.length;
  }

  /**
   * Drop everything appended since `mark`. Only valid while no cell refers to
   * the dropped bytes: the executor uses it to discard strings interned for a
   * row that was itself discarded.
   */
  rollback(mark: number): void {
    if (mark < 0 || mark > this.length) {
      throw new RangeError(`StringPool.rollback: mark ${mark} is outside the pool (length ${this.length}).`);
    }
    this.length = mark;
  }

  /** A copy of the block's exact bytes. */
  bytes(): Uint8Array {
    return this.buf.slice(0, this.length);
  }

  // ── internals ─────────────────────────────────────────────────────────────

  private append(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buf.set(bytes, this.length);
    this.length += bytes.length;
  }

  private reserve(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buf.length) return;

    let capacity = this.buf.length * 2;
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.length));
    this.buf = next;
  }
}
