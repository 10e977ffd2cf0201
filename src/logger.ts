/**
 * dbcpatch — logging and warning reports
 *
 * The library never prints on its own; everything goes through a Logger the
 * caller passes in. createConsoleLogger() is what the CLI uses.
 */

import type { PatchWarning, WarningKind } from './types';

// ─── Logger ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug:  10,
  info:   20,
  warn:   30,
  error:  40,
  silent: 99,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/** Discards everything. Default for library calls that get no logger. */
export const nullLogger: Logger = {
  debug: () => undefined,
  info:  () => undefined,
  warn:  () => undefined,
  error: () => undefined,
};

/**
 * Logger writing `[tag] message` lines through console.error, so stdout
 * stays free for machine-readable output.
 */
export function createConsoleLogger(level: LogLevel = 'info', tag = 'dbcpatch'): Logger {
  const min  = LEVEL_RANK[level];
  const emit = (at: LogLevel, message: string): void => {
    if (LEVEL_RANK[at] < min) return;
    console.error(`[${tag}] ${at === 'info' ? '' : `${at}: `}${message}`);
  };
  return {
    debug: m => emit('debug', m),
    info:  m => emit('info',  m),
    warn:  m => emit('warn',  m),
    error: m => emit('error', m),
  };
}

// ─── Warning reports ──────────────────────────────────────────────────────────

/** `patches/10-spells.yaml#3 Spell.dbc: KeyNotFound: no row with key 7 …` */
export function formatWarning(w: PatchWarning): string {
  return `${w.file}#${w.ordinal} ${w.table}: ${w.kind}: ${w.detail}`;
}

/** Count per kind, in first-seen order. */
export function summarizeWarnings(warnings: readonly PatchWarning[]): Map<WarningKind, number> {
  const counts = new Map<WarningKind, number>();
  for (const w of warnings) counts.set(w.kind, (counts.get(w.kind) ?? 0) + 1);
  return counts;
}

/** `3 warnings (KeyNotFound: 2, DuplicateKey: 1)` or `no warnings`. */
export function formatWarningSummary(warnings: readonly PatchWarning[]): string {
  if (warnings.length === 0) return 'no warnings';
  const parts = [...summarizeWarnings(warnings)].map(([kind, n]) => `${kind}: ${n}`);
  return `${warnings.length} warning${warnings.length === 1 ? '' : 's'} (${parts.join(', ')})`;
}
