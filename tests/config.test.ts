/**
 * resolveConfig: flags over environment over defaults.
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, resolveConfig } from '../src/index';

describe('resolveConfig', () => {
  it('fills in the defaults', () => {
    expect(resolveConfig(['apply'])).toEqual({
      command:     'apply',
      dbcFiles:    [],
      dbcDir:      'dbc',
      patchFiles:  [],
      patchDir:    'patches',
      outDir:      'build',
      schemaDir:   'schema',
      archiveDir:  'build/archive',
      includesDir: 'includes',
      logLevel:    'info',
    });
  });

  it('prefers flags to environment variables to defaults', () => {
    const config = resolveConfig(
      ['build', '--out-dir', 'flag-out'],
      { DBCPATCH_OUT_DIR: 'env-out', DBCPATCH_PATCH_DIR: 'env-patches', DBCPATCH_DBC_DIR: 'env-dbc' },
    );
    if (config === 'help') throw new Error('unexpected help');
    expect(config.command).toBe('build');
    expect(config.outDir).toBe('flag-out');
    expect(config.patchDir).toBe('env-patches');
    expect(config.dbcDir).toBe('env-dbc');
  });

  it('collects repeated -d and -p', () => {
    const config = resolveConfig(['apply', '-d', 'a/Spell.dbc', '--dbc', 'b/Item.dbc', '-p', 'x.yaml']);
    if (config === 'help') throw new Error('unexpected help');
    expect(config.dbcFiles).toEqual(['a/Spell.dbc', 'b/Item.dbc']);
    expect(config.patchFiles).toEqual(['x.yaml']);
  });

  it('maps --quiet to warn and validates --log-level', () => {
    const quiet = resolveConfig(['apply', '-q', '--log-level', 'debug']);
    expect(quiet === 'help' ? undefined : quiet.logLevel).toBe('warn');
    const env = resolveConfig(['apply'], { DBCPATCH_LOG_LEVEL: 'error' });
    expect(env === 'help' ? undefined : env.logLevel).toBe('error');
    expect(() => resolveConfig(['apply', '--log-level', 'loud'])).toThrow(ConfigError);
  });

  it('returns help before checking the command', () => {
    expect(resolveConfig(['--help'])).toBe('help');
    expect(resolveConfig(['frob', '-h'])).toBe('help');
  });

  it('rejects bad command lines', () => {
    expect(() => resolveConfig([])).toThrow('missing command');
    expect(() => resolveConfig(['frob'])).toThrow("unknown command 'frob'");
    expect(() => resolveConfig(['apply', 'extra'])).toThrow("unexpected argument 'extra'");
    expect(() => resolveConfig(['apply', '--nope'])).toThrow(ConfigError);
  });
});
