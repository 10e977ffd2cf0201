/**
 * dbcpatch — patch document normalization
 *
 * Turns the text of one patch file into an ordered list of PatchOperations.
 * Nothing here touches a table: parsing is finished for the whole file before
 * the first change of that file is applied.
 *
 * A file holds one or more YAML documents (JSON is accepted as YAML). Each
 * document takes one of three shapes:
 *
 *   (a) Spell.dbc:                      table name → list of changes
 *         - { type: update, key: 1, fields: { Name: "Fire" } }
 *       SpellIcon.dbc:
 *         - { type: insert, values: { 0: 900, 1: "Interface\\Icons\\X" } }
 *
 *   (b) - dbc: Spell.dbc                list of { dbc | table, changes }
 *         changes: [ ... ]
 *
 *   (c) dbc: Spell.dbc                  a single { dbc | table, changes }
 *       changes: [ ... ]
 *
 * In shape (a) a table name may appear more than once; each occurrence adds
 * its changes after the previous ones. The parser runs with uniqueKeys off so
 * repeated keys survive to this module.
 *
 * Numbers written in float notation (`1.0`, `2.5e3`, `.inf`) become float
 * values even when integral. JSON documents, which lose that distinction,
 * can write `{ "$float": 1 }`.
 */

import Ajv from 'ajv';
import {
  parseAllDocuments,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  type Document,
} from 'yaml';
import { I32_MIN, U32_MAX } from './constants';
import { toFieldRef } from './schema';
import type {
  Change,
  FieldAssignments,
  FieldRef,
  PatchOperation,
  PatchValue,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** A patch file cannot be parsed. Fatal for that file; other files still run. */
export class PatchDocumentError extends Error {
  readonly file:    string;
  /** JSON pointer of the offending node, '' for the document itself. */
  readonly pointer: string;

  constructor(file: string, pointer: string, message: string) {
    super(`${file}${pointer === '' ? '' : ` at ${pointer}`}: ${message}`);
    this.name    = 'PatchDocumentError';
    this.file    = file;
    this.pointer = pointer;
  }
}

// ─── Raw document types ───────────────────────────────────────────────────────

interface FloatMarker {
  readonly $float: number;
}

type RawValue = string | number | boolean | FloatMarker;

type RawFieldMap = Readonly<Record<string, RawValue>>;

interface RawChange {
  readonly type:        'update' | 'insert' | 'copy';
  readonly key?:        number;
  readonly key_column?: string | number;
  readonly fields?:     RawFieldMap;
  readonly values?:     RawFieldMap;
  readonly updates?:    RawFieldMap;
}

// ─── Validation ───────────────────────────────────────────────────────────────

const keySchema = { type: 'integer', minimum: I32_MIN, maximum: U32_MAX };

const keyColumnSchema = {
  anyOf: [
    { type: 'string',  minLength: 1 },
    { type: 'integer', minimum: 0 },
  ],
};

const fieldMapSchema = {
  type: 'object',
  additionalProperties: {
    anyOf: [
      { type: 'string' },
      { type: 'number' },
      { type: 'boolean' },
      {
        type: 'object',
        required: ['$float'],
        properties: { $float: { type: 'number' } },
        additionalProperties: false,
      },
    ],
  },
};

const changeSchema = {
  type: 'object',
  discriminator: { propertyName: 'type' },
  required: ['type'],
  oneOf: [
    {
      type: 'object',
      properties: {
        type:       { const: 'update' },
        key:        keySchema,
        key_column: keyColumnSchema,
        fields:     fieldMapSchema,
        updates:    fieldMapSchema,
      },
      required: ['key'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        type:       { const: 'insert' },
        key:        keySchema,
        key_column: keyColumnSchema,
        values:     fieldMapSchema,
      },
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        type:       { const: 'copy' },
        key:        keySchema,
        key_column: keyColumnSchema,
        updates:    fieldMapSchema,
        fields:     fieldMapSchema,
      },
      required: ['key'],
      additionalProperties: false,
    },
  ],
};

const ajv            = new Ajv({ allErrors: false, discriminator: true });
const validateChange = ajv.compile<RawChange>(changeSchema);

// ─── YAML → plain values ──────────────────────────────────────────────────────

/**
 * Declared key order of every mapping produced by toPlain(). Object key
 * iteration puts integer-like keys first; field assignments must follow the
 * order they were written in.
 */
const declaredKeys = new WeakMap<object, string[]>();

const FLOAT_NOTATION = /[.eE]|inf|nan/i;

function isFloatScalar(value: number, source: string | undefined): boolean {
  if (source !== undefined) return FLOAT_NOTATION.test(source) && !/^0x/i.test(source);
  return !Number.isInteger(value);
}

/** Mapping keys are strings; `3:` and `"3":` address the same field. */
function keyString(node: unknown, doc: Document.Parsed): string {
  if (isScalar(node)) return String(node.value);
  return String(toPlain(node, doc));
}

function toPlain(node: unknown, doc: Document.Parsed): unknown {
  if (isAlias(node)) return toPlain(node.resolve(doc), doc);

  if (isMap(node)) {
    const out: Record<string, unknown> = {};
    const order: string[] = [];
    for (const pair of node.items) {
      const key = keyString(pair.key, doc);
      if (!Object.prototype.hasOwnProperty.call(out, key)) order.push(key);
      out[key] = toPlain(pair.value, doc);
    }
    declaredKeys.set(out, order);
    return out;
  }

  if (isSeq(node)) return node.items.map(item => toPlain(item, doc));

  if (isScalar(node)) {
    const value = node.value;
    if (typeof value === 'number' && isFloatScalar(value, node.source)) {
      const marker: FloatMarker = { $float: value };
      return marker;
    }
    return value;
  }

  return node ?? null;
}

function keysInOrder(obj: Readonly<Record<string, unknown>>): readonly string[] {
  return declaredKeys.get(obj) ?? Object.keys(obj);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

// ─── Conversion ───────────────────────────────────────────────────────────────

function toPatchValue(raw: RawValue): PatchValue {
  if (typeof raw === 'string')  return { kind: 'string', value: raw };
  if (typeof raw === 'boolean') return { kind: 'int',    value: raw ? 1 : 0 };
  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? { kind: 'int', value: raw } : { kind: 'float', value: raw };
  }
  return { kind: 'float', value: raw.$float };
}

function toAssignments(map: RawFieldMap | undefined): FieldAssignments {
  if (map === undefined) return [];
  const out: Array<readonly [FieldRef, PatchValue]> = [];
  for (const name of keysInOrder(map)) {
    const raw = map[name];
    if (raw === undefined) continue;
    out.push([toFieldRef(name), toPatchValue(raw)]);
  }
  return out;
}

function toChange(raw: RawChange): Change {
  const keyColumn = raw.key_column === undefined ? undefined : toFieldRef(raw.key_column);
  const withKeyColumn = keyColumn === undefined ? {} : { keyColumn };

  switch (raw.type) {
    case 'update':
      return {
        type:   'update',
        ...withKeyColumn,
        key:    raw.key ?? 0,
        fields: toAssignments(raw.fields ?? raw.updates),
      };
    case 'insert':
      return {
        type:   'insert',
        ...withKeyColumn,
        ...(raw.key === undefined ? {} : { key: raw.key }),
        values: toAssignments(raw.values),
      };
    case 'copy':
      return {
        type:    'copy',
        ...withKeyColumn,
        key:     raw.key ?? 0,
        updates: toAssignments(raw.updates ?? raw.fields),
      };
  }
}

// ─── Shapes ───────────────────────────────────────────────────────────────────

interface TableBlock {
  readonly table:   string;
  readonly changes: unknown;
  readonly pointer: string;
}

function tableNameOf(obj: Readonly<Record<string, unknown>>): unknown {
  return obj['dbc'] ?? obj['table'];
}

function isTableObject(obj: Readonly<Record<string, unknown>>): boolean {
  return tableNameOf(obj) !== undefined && 'changes' in obj;
}

function blockFromObject(
  file:    string,
  obj:     Readonly<Record<string, unknown>>,
  pointer: string,
): TableBlock {
  const table = tableNameOf(obj);
  if (typeof table !== 'string' || table.length === 0) {
    throw new PatchDocumentError(file, pointer, "'dbc' must be a non-empty table file name.");
  }
  return { table, changes: obj['changes'], pointer: `${pointer}/changes` };
}

function blocksOf(file: string, doc: Document.Parsed, docPointer: string): TableBlock[] {
  const contents = doc.contents;

  if (isMap(contents)) {
    const plain = toPlain(contents, doc);
    if (isPlainObject(plain) && isTableObject(plain)) {
      return [blockFromObject(file, plain, docPointer)];
    }
    // Walk the pairs rather than `plain`: a repeated table name must keep
    // every occurrence, not only the last.
    return contents.items.map(pair => {
      const table = keyString(pair.key, doc);
      return {
        table,
        changes: toPlain(pair.value, doc),
        pointer: `${docPointer}/${escapePointer(table)}`,
      };
    });
  }

  const value = toPlain(contents, doc);
  if (value === null) return [];

  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => {
      const pointer = `${docPointer}/${i}`;
      if (!isPlainObject(item) || !isTableObject(item)) {
        throw new PatchDocumentError(file, pointer, "expected an object with 'dbc' and 'changes'.");
      }
      return blockFromObject(file, item, pointer);
    });
  }

  throw new PatchDocumentError(file, docPointer, 'expected a mapping or a sequence at the top level.');
}

// ─── parsePatchText ───────────────────────────────────────────────────────────

/**
 * Parse and normalize one patch file.
 *
 * @param file  Path or name of the file; used for provenance and errors.
 * @throws PatchDocumentError on YAML syntax errors or invalid structure.
 */
export function parsePatchText(text: string, file: string): PatchOperation[] {
  const docs = parseAllDocuments(text, { uniqueKeys: false });
  const ops: PatchOperation[] = [];

  let docIndex = 0;
  for (const doc of docs) {
    const docPointer = docIndex === 0 ? '' : `/document${docIndex}`;
    docIndex++;

    const syntax = doc.errors[0];
    if (syntax !== undefined) {
      throw new PatchDocumentError(file, docPointer, syntax.message);
    }

    for (const block of blocksOf(file, doc, docPointer)) {
      if (block.changes === null || block.changes === undefined) continue;
      if (!Array.isArray(block.changes)) {
        throw new PatchDocumentError(file, block.pointer, 'expected a list of changes.');
      }

      block.changes.forEach((raw: unknown, i) => {
        const pointer = `${block.pointer}/${i}`;
        if (!validateChange(raw)) {
          const first  = validateChange.errors?.[0];
          const detail = first === undefined
            ? 'invalid change.'
            : `${first.instancePath === '' ? 'change' : first.instancePath} ${first.message ?? 'is invalid'}.`;
          throw new PatchDocumentError(file, pointer, detail);
        }
        ops.push({
          file,
          ordinal: ops.length + 1,
          table:   block.table,
          change:  toChange(raw),
        });
      });
    }
  }

  return ops;
}
