/**
 * dbcpatch — patch pipeline
 *
 * Drives a whole run:
 *
 *   1. order    — patch files sorted by base name, code point by code point
 *   2. parse    — one file at a time, fully, before any of its changes run
 *   3. apply    — each change in file order; a table is loaded and parsed the
 *                 first time a change targets it, then kept for the run
 *   4. emit     — every touched table serialized once, in first-touch order
 *
 * The run is a left fold over that single ordered stream. Given the same
 * inputs it produces the same bytes.
 *
 * Failures are contained. A patch file that cannot be read or parsed is
 * skipped whole. A table that cannot be read or parsed is skipped with all of
 * its changes. Both are reported in `errors`; everything else still runs.
 */

import { ARCHIVE_TABLE_DIR } from './constants';
import { parsePatchText } from './document';
import { applyChange } from './executor';
import { nullLogger, formatWarning, type Logger } from './logger';
import { SchemaRegistry } from './schema';
import { DbcTable } from './table';
import type { PatchOperation, PatchWarning, TableSchema } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** A path could not be read or written. Fatal for that file only. */
export class PatchIOError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = 'PatchIOError';
    this.path = path;
  }
}

// ─── Collaborators ────────────────────────────────────────────────────────────

/** One patch file. read() is called once, when the file's turn comes. */
export interface PatchSource {
  readonly path: string;
  read(): Promise<string>;
}

export interface LoadedTable {
  /** File name the output is written under, e.g. "Spell.dbc". */
  readonly fileName: string;
  readonly path:     string;
  readonly bytes:    Uint8Array;
}

/**
 * Where source tables come from.
 *
 * load() resolves to undefined when the table is not part of this run; it
 * rejects with PatchIOError when the table should exist but cannot be read.
 */
export interface TableSource {
  load(table: string): Promise<LoadedTable | undefined>;
}

/** Receives the finished archive layout. Returns nothing to the pipeline. */
export interface ArchivePacker {
  pack(files: ReadonlyMap<string, Uint8Array>): Promise<void>;
}

// ─── In-memory collaborators ──────────────────────────────────────────────────

export function memoryPatchSource(path: string, text: string): PatchSource {
  return { path, read: async () => text };
}

/** Tables held in memory, matched case-insensitively by file name. */
export class MemoryTableSource implements TableSource {
  private readonly files: ReadonlyMap<string, readonly [string, Uint8Array]>;

  constructor(files: Readonly<Record<string, Uint8Array>>) {
    this.files = new Map(Object.entries(files).map(([name, bytes]) => [name.toLowerCase(), [name, bytes] as const]));
  }

  async load(table: string): Promise<LoadedTable | undefined> {
    const hit = this.files.get(table.toLowerCase());
    if (hit === undefined) return undefined;
    const [fileName, bytes] = hit;
    return { fileName, path: `memory:${fileName}`, bytes };
  }
}

// ─── Ordering ─────────────────────────────────────────────────────────────────

export function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

/**
 * Compare by Unicode code point. String's default `<` compares UTF-16 code
 * units, which orders astral characters before U+E000–U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const ai = a[Symbol.iterator]();
  const bi = b[Symbol.iterator]();
  for (;;) {
    const an = ai.next();
    const bn = bi.next();
    if (an.done === true || bn.done === true) {
      return (an.done === true ? 0 : 1) - (bn.done === true ? 0 : 1);
    }
    const diff = (an.value.codePointAt(0) ?? 0) - (bn.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

/** Patch sources in apply order: base name ascending, full path as tiebreak. */
export function sortPatchSources<T extends { readonly path: string }>(sources: readonly T[]): T[] {
  return [...sources].sort(
    (a, b) => compareCodePoints(baseName(a.path), baseName(b.path)) || compareCodePoints(a.path, b.path),
  );
}

// ─── Run state ────────────────────────────────────────────────────────────────

type TableSlot =
  | { readonly status: 'loaded'; readonly table: DbcTable; readonly fileName: string; readonly schema?: TableSchema }
  | { readonly status: 'absent' }
  | { readonly status: 'failed' };

export interface PipelineFailure {
  readonly path:  string;
  readonly error: Error;
}

export interface PipelineResult {
  /** Serialized bytes of every touched table, keyed by output file name. */
  readonly tables:   Map<string, Uint8Array>;
  readonly warnings: PatchWarning[];
  readonly errors:   PipelineFailure[];
}

export interface PipelineOptions {
  readonly patches:  readonly PatchSource[];
  readonly tables:   TableSource;
  readonly schemas?: SchemaRegistry;
  readonly logger?:  Logger;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ─── runPatchPipeline ─────────────────────────────────────────────────────────

export async function runPatchPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const logger   = options.logger  ?? nullLogger;
  const schemas  = options.schemas ?? new SchemaRegistry();
  const slots    = new Map<string, TableSlot>(); // by requested name
  const byFile   = new Map<string, TableSlot>(); // by resolved file name
  const warnings: PatchWarning[]     = [];
  const errors:   PipelineFailure[]  = [];

  const fail = (path: string, err: unknown): void => {
    const error = asError(err);
    errors.push({ path, error });
    logger.error(error.message);
  };

  const slotFor = async (name: string): Promise<TableSlot> => {
    const key      = name.toLowerCase();
    const existing = slots.get(key);
    if (existing !== undefined) return existing;

    let slot: TableSlot;
    let path = name;
    try {
      const loaded = await options.tables.load(name);
      if (loaded !== undefined) path = loaded.path;
      const same = loaded === undefined ? undefined : byFile.get(loaded.fileName.toLowerCase());
      if (loaded === undefined) {
        slot = { status: 'absent' };
      } else if (same !== undefined) {
        slot = same;
      } else {
        const table  = DbcTable.parse(loaded.fileName, loaded.bytes);
        const schema = await schemas.lookup(loaded.fileName);
        logger.debug(
          `loaded ${loaded.path}: ${table.rowCount} rows × ${table.columnCount} columns, ` +
          `${table.pool.byteLength} string bytes, schema ${schema?.source ?? 'none'}`,
        );
        slot = schema === undefined
          ? { status: 'loaded', table, fileName: loaded.fileName }
          : { status: 'loaded', table, fileName: loaded.fileName, schema };
        byFile.set(loaded.fileName.toLowerCase(), slot);
      }
    } catch (err) {
      fail(err instanceof PatchIOError ? err.path : path, err);
      slot = { status: 'failed' };
    }
    slots.set(key, slot);
    return slot;
  };

  const apply = async (op: PatchOperation): Promise<void> => {
    const slot = await slotFor(op.table);
    if (slot.status === 'failed') return;
    if (slot.status === 'absent') {
      const warning: PatchWarning = {
        file:    op.file,
        ordinal: op.ordinal,
        table:   op.table,
        kind:    'UnknownTable',
        detail:  'table is not among the tables being patched; change ignored',
      };
      warnings.push(warning);
      logger.warn(formatWarning(warning));
      return;
    }

    const before = warnings.length;
    applyChange(slot.table, op.change, {
      ...(slot.schema === undefined ? {} : { schema: slot.schema }),
      provenance: { file: op.file, ordinal: op.ordinal },
      warnings,
    });
    for (const w of warnings.slice(before)) logger.warn(formatWarning(w));
  };

  for (const source of sortPatchSources(options.patches)) {
    let ops: PatchOperation[];
    try {
      ops = parsePatchText(await source.read(), source.path);
    } catch (err) {
      fail(source.path, err);
      continue;
    }
    logger.info(`applying ${source.path} (${ops.length} change${ops.length === 1 ? '' : 's'})`);
    for (const op of ops) await apply(op);
  }

  const tables = new Map<string, Uint8Array>();
  for (const slot of byFile.values()) {
    if (slot.status !== 'loaded') continue;
    tables.set(slot.fileName, slot.table.serialize());
  }

  return { tables, warnings, errors };
}

// ─── Archive layout ───────────────────────────────────────────────────────────

/**
 * Archive paths for the patched tables (`DBFilesClient/<name>`) plus any
 * extra files. A patched table wins over an extra file at the same path.
 */
export function buildArchiveManifest(
  tables: ReadonlyMap<string, Uint8Array>,
  extra:  ReadonlyMap<string, Uint8Array> = new Map(),
): Map<string, Uint8Array> {
  const files = new Map<string, Uint8Array>();
  for (const [path, bytes] of extra) files.set(path.replace(/\\/g, '/'), bytes);
  for (const [name, bytes] of tables) files.set(`${ARCHIVE_TABLE_DIR}/${name}`, bytes);
  return files;
}
