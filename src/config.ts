/**
 * dbcpatch — run configuration
 *
 * Flags win over environment variables, which win over the defaults:
 *
 *   flag               env                      default
 *   --dbc-dir          DBCPATCH_DBC_DIR         dbc
 *   --patch-dir        DBCPATCH_PATCH_DIR       patches
 *   --out-dir, -o      DBCPATCH_OUT_DIR         build
 *   --schema-dir       DBCPATCH_SCHEMA_DIR      schema
 *   --archive-dir      DBCPATCH_ARCHIVE_DIR     build/archive
 *   --includes-dir     DBCPATCH_INCLUDES_DIR    includes
 *   --log-level        DBCPATCH_LOG_LEVEL       info
 *
 * --dbc / -d and --patch / -p may repeat. Listing tables explicitly limits the
 * run to those tables; listing patches explicitly skips patch discovery.
 */

import { parseArgs } from 'node:util';
import { isLogLevel, type LogLevel } from './logger';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Bad command line. The CLI exits with status 2. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ─── Types ────────────────────────────────────────────────────────────────────

export type Command = 'apply' | 'build';

export interface RunConfig {
  readonly command:     Command;
  readonly dbcFiles:    readonly string[];
  readonly dbcDir:      string;
  readonly patchFiles:  readonly string[];
  readonly patchDir:    string;
  readonly outDir:      string;
  readonly schemaDir:   string;
  /** build only */
  readonly archiveDir:  string;
  /** build only */
  readonly includesDir: string;
  readonly logLevel:    LogLevel;
}

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULTS = {
  dbcDir:      'dbc',
  patchDir:    'patches',
  outDir:      'build',
  schemaDir:   'schema',
  archiveDir:  'build/archive',
  includesDir: 'includes',
  logLevel:    'info',
} as const;

export const USAGE = `Usage: dbcpatch <apply|build> [options]

Commands:
  apply                 apply patches and write the patched tables
  build                 apply, then stage the archive layout

Options:
  -d, --dbc FILE        table file to patch (repeatable; default: look up by name)
      --dbc-dir DIR     directory of source tables (default: ${DEFAULTS.dbcDir})
  -p, --patch FILE      patch file (repeatable; default: all in --patch-dir)
      --patch-dir DIR   directory of patch files (default: ${DEFAULTS.patchDir})
  -o, --out-dir DIR     where patched tables are written (default: ${DEFAULTS.outDir})
      --schema-dir DIR  schema listings overriding the built-in ones (default: ${DEFAULTS.schemaDir})
      --archive-dir DIR staging directory for build (default: ${DEFAULTS.archiveDir})
      --includes-dir DIR extra files added to the archive (default: ${DEFAULTS.includesDir})
      --log-level LVL   debug | info | warn | error | silent (default: ${DEFAULTS.logLevel})
  -q, --quiet           same as --log-level warn
  -h, --help            show this help`;

// ─── resolveConfig ────────────────────────────────────────────────────────────

function pick(flag: string | undefined, env: string | undefined, fallback: string): string {
  if (flag !== undefined && flag !== '') return flag;
  if (env  !== undefined && env  !== '') return env;
  return fallback;
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        'dbc':          { type: 'string', short: 'd', multiple: true },
        'dbc-dir':      { type: 'string' },
        'patch':        { type: 'string', short: 'p', multiple: true },
        'patch-dir':    { type: 'string' },
        'out-dir':      { type: 'string', short: 'o' },
        'schema-dir':   { type: 'string' },
        'archive-dir':  { type: 'string' },
        'includes-dir': { type: 'string' },
        'log-level':    { type: 'string' },
        'quiet':        { type: 'boolean', short: 'q' },
        'help':         { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse `argv` (without the node and script entries).
 * Returns 'help' when help was requested.
 * @throws ConfigError on unknown flags, a missing or unknown command, or a bad log level.
 */
export function resolveConfig(argv: readonly string[], env: Env = {}): RunConfig | 'help' {
  const { values, positionals } = parseFlags(argv);
  if (values.help === true) return 'help';

  const [command, ...rest] = positionals;
  if (command === undefined) throw new ConfigError('missing command: expected apply or build.');
  if (command !== 'apply' && command !== 'build') {
    throw new ConfigError(`unknown command '${command}': expected apply or build.`);
  }
  if (rest.length > 0) throw new ConfigError(`unexpected argument '${rest[0] ?? ''}'.`);

  const level = values.quiet === true
    ? 'warn'
    : pick(values['log-level'], env['DBCPATCH_LOG_LEVEL'], DEFAULTS.logLevel);
  if (!isLogLevel(level)) {
    throw new ConfigError(`unknown log level '${level}': expected debug, info, warn, error or silent.`);
  }

  return Object.freeze({
    command,
    dbcFiles:    values.dbc   ?? [],
    dbcDir:      pick(values['dbc-dir'],      env['DBCPATCH_DBC_DIR'],      DEFAULTS.dbcDir),
    patchFiles:  values.patch ?? [],
    patchDir:    pick(values['patch-dir'],    env['DBCPATCH_PATCH_DIR'],    DEFAULTS.patchDir),
    outDir:      pick(values['out-dir'],      env['DBCPATCH_OUT_DIR'],      DEFAULTS.outDir),
    schemaDir:   pick(values['schema-dir'],   env['DBCPATCH_SCHEMA_DIR'],   DEFAULTS.schemaDir),
    archiveDir:  pick(values['archive-dir'],  env['DBCPATCH_ARCHIVE_DIR'],  DEFAULTS.archiveDir),
    includesDir: pick(values['includes-dir'], env['DBCPATCH_INCLUDES_DIR'], DEFAULTS.includesDir),
    logLevel:    level,
  });
}
