/**
 * dbcpatch — apply / build commands
 *
 * Wires the file-system adapters to the pipeline. Kept apart from cli.ts so
 * the commands can run in-process with any config and logger.
 */

import type { RunConfig } from './config';
import { formatWarningSummary, type Logger } from './logger';
import {
  DirectoryArchivePacker,
  DirectoryTableSource,
  FileListTableSource,
  createSchemaRegistry,
  discoverPatchFiles,
  filePatchSource,
  readIncludeFiles,
  writeTables,
} from './node';
import {
  buildArchiveManifest,
  runPatchPipeline,
  type PipelineResult,
  type TableSource,
} from './pipeline';

export interface CommandResult {
  readonly pipeline: PipelineResult;
  /** Paths of the patched tables written under outDir. */
  readonly written:  readonly string[];
  /** Archive paths staged by `build`; empty for `apply`. */
  readonly archived: readonly string[];
}

/** Exit status for a finished command: 1 when any file or table failed. */
export function exitCodeFor(result: CommandResult): number {
  return result.pipeline.errors.length > 0 ? 1 : 0;
}

async function patchPaths(config: RunConfig, logger: Logger): Promise<readonly string[]> {
  if (config.patchFiles.length > 0) return config.patchFiles;
  const found = await discoverPatchFiles(config.patchDir);
  if (found.length === 0) logger.warn(`no patch files found in ${config.patchDir}`);
  return found;
}

function tableSource(config: RunConfig): TableSource {
  return config.dbcFiles.length > 0
    ? new FileListTableSource(config.dbcFiles)
    : new DirectoryTableSource(config.dbcDir);
}

/**
 * Run `apply` or `build`.
 * @throws PatchIOError when outputs cannot be written.
 */
export async function runCommand(config: RunConfig, logger: Logger): Promise<CommandResult> {
  const patches  = (await patchPaths(config, logger)).map(filePatchSource);
  const pipeline = await runPatchPipeline({
    patches,
    tables:  tableSource(config),
    schemas: createSchemaRegistry(config.schemaDir, logger),
    logger,
  });

  const written = await writeTables(config.outDir, pipeline.tables);
  for (const path of written) logger.info(`wrote ${path}`);

  let archived: string[] = [];
  if (config.command === 'build') {
    const manifest = buildArchiveManifest(pipeline.tables, await readIncludeFiles(config.includesDir));
    await new DirectoryArchivePacker(config.archiveDir).pack(manifest);
    archived = [...manifest.keys()];
    logger.info(`staged ${archived.length} file${archived.length === 1 ? '' : 's'} in ${config.archiveDir}`);
  }

  logger.info(formatWarningSummary(pipeline.warnings));
  if (pipeline.errors.length > 0) {
    logger.error(`${pipeline.errors.length} file${pipeline.errors.length === 1 ? '' : 's'} failed`);
  }
  return { pipeline, written, archived };
}
