/**
 * dbcpatch — schema listings and field resolution
 *
 * A schema maps field names to column indices for one table. Nothing else:
 * column types are not modelled, every cell is a 32-bit word.
 *
 * Listings are YAML or JSON in one of three shapes:
 *
 *   - [ID, Name, Flags]                 sequence; index = position
 *   - { fields: [ID, Name, Flags] }     same, wrapped
 *   - { ID: 0, Name: 1, Flags: 5 }      explicit name → index
 *
 * Names are folded to lower case, so `SpellIconID`, `spelliconid` and
 * `SPELLICONID` all address the same column.
 *
 * A SchemaRegistry stacks SchemaSources. The first source that knows a table
 * wins for that table; a directory given on the command line therefore
 * overrides the built-in listings one table at a time, never wholesale.
 */

import type { FieldRef, TableSchema } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** A schema listing exists but cannot be used. Not fatal: the registry falls back. */
export class SchemaLoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name   = 'SchemaLoadError';
    this.source = source;
  }
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function fromSequence(items: readonly unknown[]): Map<string, number> {
  const columns = new Map<string, number>();
  items.forEach((item, index) => {
    // Non-string entries hold their slot so later names keep their positions.
    if (typeof item === 'string' && item.length > 0) columns.set(item.toLowerCase(), index);
  });
  return columns;
}

/**
 * Build a TableSchema from a decoded listing.
 * @throws SchemaLoadError when `value` has none of the three shapes.
 */
export function parseSchemaListing(table: string, value: unknown, source: string): TableSchema {
  if (Array.isArray(value)) {
    return { table, columns: fromSequence(value), source };
  }

  if (isPlainObject(value)) {
    const fields = value['fields'];
    if (Array.isArray(fields)) {
      return { table, columns: fromSequence(fields), source };
    }

    const columns = new Map<string, number>();
    for (const [name, index] of Object.entries(value)) {
      if (typeof index !== 'number' || !Number.isInteger(index) || index < 0) {
        throw new SchemaLoadError(source, `field '${name}' maps to ${String(index)}; expected a column index.`);
      }
      columns.set(name.toLowerCase(), index);
    }
    if (columns.size > 0) return { table, columns, source };
  }

  throw new SchemaLoadError(
    source,
    'expected a list of field names, a { fields: [...] } mapping, or a mapping of names to indices.',
  );
}

// ─── Field References ─────────────────────────────────────────────────────────

const NUMERIC_REF = /^\d+$/;

/**
 * Turn a document key into a FieldRef. Numeric strings address columns
 * directly and never consult a schema.
 */
export function toFieldRef(raw: string | number): FieldRef {
  if (typeof raw === 'number') return { kind: 'index', index: raw };
  const trimmed = raw.trim();
  if (NUMERIC_REF.test(trimmed)) return { kind: 'index', index: Number(trimmed) };
  return { kind: 'name', name: trimmed };
}

/** Human-readable form of a FieldRef for warnings. */
export function describeFieldRef(ref: FieldRef): string {
  return ref.kind === 'index' ? `#${ref.index}` : `'${ref.name}'`;
}

/**
 * Column index for `ref`, or undefined when a name cannot be resolved (no
 * schema, or the schema has no such field). Range checks are the caller's.
 */
export function resolveField(ref: FieldRef, schema?: TableSchema): number | undefined {
  if (ref.kind === 'index') return ref.index;
  return schema?.columns.get(ref.name.toLowerCase());
}

// ─── Sources ──────────────────────────────────────────────────────────────────

/** Something that can produce the listing for a table, or undefined if it has none. */
export interface SchemaSource {
  readonly description: string;
  load(table: string): Promise<TableSchema | undefined>;
}

/** Listings held in memory, keyed case-insensitively by table file name. */
export class MemorySchemaSource implements SchemaSource {
  readonly description: string;
  private readonly listings: ReadonlyMap<string, unknown>;

  constructor(listings: Readonly<Record<string, unknown>>, description = 'memory') {
    this.description = description;
    this.listings    = new Map(Object.entries(listings).map(([k, v]) => [k.toLowerCase(), v]));
  }

  async load(table: string): Promise<TableSchema | undefined> {
    const listing = this.listings.get(table.toLowerCase());
    if (listing === undefined) return undefined;
    return parseSchemaListing(table, listing, `${this.description}:${table}`);
  }
}

// ─── Registry ─────────────────────────────────────────────────────────────────

export interface SchemaRegistryOptions {
  /** Called when a source fails; the registry then tries the next source. */
  readonly onLoadError?: (error: SchemaLoadError, source: SchemaSource) => void;
}

export class SchemaRegistry {
  private readonly sources: readonly SchemaSource[];
  private readonly cache = new Map<string, TableSchema | undefined>();
  private readonly onLoadError: (error: SchemaLoadError, source: SchemaSource) => void;

  /** @param sources  Highest priority first. */
  constructor(sources: readonly SchemaSource[] = [], options: SchemaRegistryOptions = {}) {
    this.sources     = sources;
    this.onLoadError = options.onLoadError ?? (() => undefined);
  }

  /** A registry that consults `source` before every source of this one. */
  withOverride(source: SchemaSource): SchemaRegistry {
    return new SchemaRegistry([source, ...this.sources], { onLoadError: this.onLoadError });
  }

  /**
   * Listing for `table` from the highest-priority source that has one.
   * Undefined means the table is addressed by column number only.
   */
  async lookup(table: string): Promise<TableSchema | undefined> {
    const key = table.toLowerCase();
    if (this.cache.has(key)) return this.cache.get(key);

    let found: TableSchema | undefined;
    for (const source of this.sources) {
      try {
        found = await source.load(table);
      } catch (err) {
        if (!(err instanceof SchemaLoadError)) throw err;
        this.onLoadError(err, source);
        continue;
      }
      if (found !== undefined) break;
    }

    this.cache.set(key, found);
    return found;
  }
}
