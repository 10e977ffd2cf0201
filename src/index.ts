// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  FieldRef,
  PatchValue,
  FieldAssignments,
  UpdateChange,
  InsertChange,
  CopyChange,
  Change,
  Provenance,
  PatchOperation,
  WarningKind,
  PatchWarning,
  WarningSink,
  TableSchema,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  WDBC_MAGIC,
  HEADER_SIZE,
  CELL_WIDTH,
  ARCHIVE_TABLE_DIR,
  computeTableBytes,
} from './constants';

// ─── String pool & table ──────────────────────────────────────────────────────
export { StringPool } from './pool';
export { DbcTable, TableParseError } from './table';
export type { Row, DbcTableInit } from './table';

// ─── Schema ───────────────────────────────────────────────────────────────────
export {
  SchemaRegistry,
  SchemaLoadError,
  MemorySchemaSource,
  parseSchemaListing,
  resolveField,
  toFieldRef,
  describeFieldRef,
} from './schema';
export type { SchemaSource, SchemaRegistryOptions } from './schema';

// ─── Documents ────────────────────────────────────────────────────────────────
export { parsePatchText, PatchDocumentError } from './document';

// ─── Executor ─────────────────────────────────────────────────────────────────
export { applyChange, floatBits, bitsToFloat } from './executor';
export type { ApplyContext } from './executor';

// ─── Pipeline ─────────────────────────────────────────────────────────────────
export {
  runPatchPipeline,
  buildArchiveManifest,
  sortPatchSources,
  compareCodePoints,
  memoryPatchSource,
  MemoryTableSource,
  PatchIOError,
} from './pipeline';
export type {
  PatchSource,
  TableSource,
  LoadedTable,
  ArchivePacker,
  PipelineOptions,
  PipelineResult,
  PipelineFailure,
} from './pipeline';

// ─── Node.js adapters ─────────────────────────────────────────────────────────
export {
  discoverPatchFiles,
  filePatchSource,
  DirectoryTableSource,
  FileListTableSource,
  DirectorySchemaSource,
  builtinSchemaDir,
  createSchemaRegistry,
  writeTables,
  readIncludeFiles,
  DirectoryArchivePacker,
} from './node';

// ─── Logging & configuration ──────────────────────────────────────────────────
export {
  createConsoleLogger,
  nullLogger,
  formatWarning,
  formatWarningSummary,
  summarizeWarnings,
} from './logger';
export type { Logger, LogLevel } from './logger';
export { resolveConfig, ConfigError, DEFAULTS } from './config';
export type { RunConfig, Command } from './config';
export { runCommand, exitCodeFor } from './commands';
export type { CommandResult } from './commands';
