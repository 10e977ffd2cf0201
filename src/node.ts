/**
 * dbcpatch — Node.js file-system adapters
 *
 * File-backed implementations of the pipeline's collaborators: patch files,
 * table directories, schema directories, output writing and archive staging.
 * All file names are matched case-insensitively, since client tables are
 * referenced as `Spell.dbc`, `spell.dbc` or `SPELL.DBC` interchangeably.
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { Logger } from './logger';
import {
  PatchIOError,
  baseName,
  type ArchivePacker,
  type LoadedTable,
  type PatchSource,
  type TableSource,
} from './pipeline';
import {
  SchemaLoadError,
  SchemaRegistry,
  parseSchemaListing,
  type SchemaSource,
} from './schema';
import type { TableSchema } from './types';

// ─── Internal helpers ─────────────────────────────────────────────────────────

const PATCH_EXTENSIONS  = ['.yaml', '.yml', '.json'] as const;
const SCHEMA_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;
const TABLE_EXTENSION   = '.dbc';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/** File names in `dir`, or [] when the directory does not exist. */
async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter(e => e.isFile()).map(e => e.name);
  } catch (err) {
    if (isMissing(err)) return [];
    throw new PatchIOError(dir, `cannot list directory: ${errorMessage(err)}`, { cause: err });
  }
}

async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (err) {
    throw new PatchIOError(path, `cannot read: ${errorMessage(err)}`, { cause: err });
  }
}

/** Case-insensitive lookup of `wanted` among `names`. */
function matchName(names: readonly string[], wanted: string): string | undefined {
  const lower = wanted.toLowerCase();
  return names.find(n => n.toLowerCase() === lower);
}

// ─── Patch files ──────────────────────────────────────────────────────────────

/** `.yaml`, `.yml` and `.json` files directly inside `dir`; [] when it is missing. */
export async function discoverPatchFiles(dir: string): Promise<string[]> {
  const names = await listFiles(dir);
  return names
    .filter(n => PATCH_EXTENSIONS.some(ext => n.toLowerCase().endsWith(ext)))
    .map(n => join(dir, n));
}

export function filePatchSource(path: string): PatchSource {
  return {
    path,
    read: async () => {
      try {
        return await readFile(path, 'utf8');
      } catch (err) {
        throw new PatchIOError(path, `cannot read patch file: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}

// ─── Tables ───────────────────────────────────────────────────────────────────

/**
 * Every table in one directory is a candidate. A table a patch names that is
 * not in the directory is an error for that table.
 */
export class DirectoryTableSource implements TableSource {
  private names: Promise<string[]> | undefined;

  constructor(readonly dir: string) {}

  async load(table: string): Promise<LoadedTable> {
    this.names ??= listFiles(this.dir);
    const names = await this.names;
    const hit   = matchName(names, table)
      ?? (table.toLowerCase().endsWith(TABLE_EXTENSION) ? undefined : matchName(names, table + TABLE_EXTENSION));
    if (hit === undefined) {
      throw new PatchIOError(join(this.dir, table), 'table not found');
    }
    const path = join(this.dir, hit);
    return { fileName: hit, path, bytes: await readBytes(path) };
  }
}

/**
 * Only the listed table files take part in the run. Changes for any other
 * table are reported as UnknownTable and ignored.
 */
export class FileListTableSource implements TableSource {
  private readonly byName: ReadonlyMap<string, string>;

  constructor(paths: readonly string[]) {
    this.byName = new Map(paths.map(p => [baseName(p).toLowerCase(), p]));
  }

  async load(table: string): Promise<LoadedTable | undefined> {
    const lower = table.toLowerCase();
    const path  = this.byName.get(lower)
      ?? (lower.endsWith(TABLE_EXTENSION) ? undefined : this.byName.get(lower + TABLE_EXTENSION));
    if (path === undefined) return undefined;
    return { fileName: baseName(path), path, bytes: await readBytes(path) };
  }
}

// ─── Schemas ──────────────────────────────────────────────────────────────────

/** Directory of the listings shipped with the package. */
export function builtinSchemaDir(): string {
  return fileURLToPath(new URL('../schema/', import.meta.url));
}

/** Listings named `<Table>.dbc.yaml`, `.yml` or `.json` in one directory. */
export class DirectorySchemaSource implements SchemaSource {
  readonly description: string;
  private names: Promise<string[]> | undefined;

  constructor(readonly dir: string, description = dir) {
    this.description = description;
  }

  async load(table: string): Promise<TableSchema | undefined> {
    this.names ??= listFiles(this.dir).catch((err: unknown) => {
      throw new SchemaLoadError(this.dir, errorMessage(err), { cause: err });
    });
    const names = await this.names;

    for (const ext of SCHEMA_EXTENSIONS) {
      const hit = matchName(names, table + ext);
      if (hit === undefined) continue;

      const path = join(this.dir, hit);
      let listing: unknown;
      try {
        listing = parseYaml(await readFile(path, 'utf8'));
      } catch (err) {
        throw new SchemaLoadError(path, errorMessage(err), { cause: err });
      }
      return parseSchemaListing(table, listing, path);
    }
    return undefined;
  }
}

/**
 * Registry with `schemaDir` (when given) layered over the built-in listings.
 * Broken listings are logged and skipped.
 */
export function createSchemaRegistry(schemaDir: string | undefined, logger: Logger): SchemaRegistry {
  const builtin = new SchemaRegistry([new DirectorySchemaSource(builtinSchemaDir(), 'builtin')], {
    onLoadError: (err, source) => logger.warn(`schema ignored (${source.description}): ${err.message}`),
  });
  return schemaDir === undefined ? builtin : builtin.withOverride(new DirectorySchemaSource(schemaDir));
}

// ─── Output ───────────────────────────────────────────────────────────────────

/** Write each table under `outDir` with its own file name. Returns the paths written. */
export async function writeTables(outDir: string, tables: ReadonlyMap<string, Uint8Array>): Promise<string[]> {
  try {
    await mkdir(outDir, { recursive: true });
  } catch (err) {
    throw new PatchIOError(outDir, `cannot create output directory: ${errorMessage(err)}`, { cause: err });
  }

  const written: string[] = [];
  for (const [name, bytes] of tables) {
    const path = join(outDir, name);
    try {
      await writeFile(path, bytes);
    } catch (err) {
      throw new PatchIOError(path, `cannot write: ${errorMessage(err)}`, { cause: err });
    }
    written.push(path);
  }
  return written;
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) await walk(path, out);
    else if (entry.isFile()) out.push(path);
  }
}

/**
 * Every file below `dir`, keyed by its '/'-separated path relative to `dir`.
 * Empty when `dir` does not exist.
 */
export async function readIncludeFiles(dir: string): Promise<Map<string, Uint8Array>> {
  const files = new Map<string, Uint8Array>();
  const paths: string[] = [];
  try {
    await walk(dir, paths);
  } catch (err) {
    if (isMissing(err)) return files;
    throw new PatchIOError(dir, `cannot list includes: ${errorMessage(err)}`, { cause: err });
  }

  paths.sort();
  for (const path of paths) {
    files.set(relative(dir, path).split(sep).join('/'), await readBytes(path));
  }
  return files;
}

/**
 * Stages an archive layout on disk: each manifest path becomes a file under
 * `dir`. A real archive tool can then pack the directory as is.
 */
export class DirectoryArchivePacker implements ArchivePacker {
  constructor(readonly dir: string) {}

  async pack(files: ReadonlyMap<string, Uint8Array>): Promise<void> {
    for (const [archivePath, bytes] of files) {
      const path = join(this.dir, ...archivePath.split('/'));
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, bytes);
      } catch (err) {
        throw new PatchIOError(path, `cannot stage archive file: ${errorMessage(err)}`, { cause: err });
      }
    }
  }
}
