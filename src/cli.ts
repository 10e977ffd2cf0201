#!/usr/bin/env node
/**
 * dbcpatch — command line entry point
 *
 *   dbcpatch apply --dbc-dir dbc --patch-dir patches --out-dir build
 *   dbcpatch build --archive-dir build/archive --includes-dir includes
 *
 * Exit status: 0 on success (warnings allowed), 1 when a patch file or table
 * failed, 2 on a bad command line.
 */

import { ConfigError, USAGE, resolveConfig } from './config';
import { exitCodeFor, runCommand } from './commands';
import { createConsoleLogger } from './logger';

async function main(argv: readonly string[]): Promise<number> {
  let config: ReturnType<typeof resolveConfig>;
  try {
    config = resolveConfig(argv, process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`dbcpatch: ${err.message}\n\n${USAGE}`);
    return 2;
  }

  if (config === 'help') {
    console.log(USAGE);
    return 0;
  }

  const logger = createConsoleLogger(config.logLevel);
  try {
    return exitCodeFor(await runCommand(config, logger));
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

main(process.argv.slice(2)).then(
  code => { process.exitCode = code; },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
