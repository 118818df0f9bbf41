/**
 * Asset Stager
 * Copies the web UI into the directory packed into the filesystem image
 */

import * as path from 'path';
import type { AssetCopyFailure, ProjectLayout, StagingReport } from '../types.js';
import { PROJECT_LAYOUT } from '../config/project.js';
import { PreconditionError } from '../utils/errors.js';
import { collectFiles, copyFile, ensureDirectory, isDirectoryEmpty, pathExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Assets');

/**
 * Stage web assets. Only creating the staging directory can fail;
 * missing sources and failed copies are recorded in the report.
 * @throws PreconditionError when the staging directory cannot be created
 */
export async function stageAssets(
  projectRoot: string,
  layout: ProjectLayout = PROJECT_LAYOUT,
): Promise<StagingReport> {
  const stagingDir = path.join(projectRoot, layout.stagingDir);
  try {
    await ensureDirectory(stagingDir);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    logger.error('Failed to create staging directory', { dir: stagingDir, error: reason });
    throw new PreconditionError(
      'staging-unavailable',
      `Cannot create staging directory: ${layout.stagingDir}`,
      [reason],
      stagingDir,
    );
  }

  const copied: string[] = [];
  const failures: AssetCopyFailure[] = [];
  const missingSources: string[] = [];

  for (const source of layout.assetSources) {
    const sourceDir = path.join(projectRoot, source.dir);
    if (!(await pathExists(sourceDir))) {
      missingSources.push(source.dir);
      logger.debug('Asset source missing', { dir: source.dir });
      continue;
    }

    const files = await collectFiles(sourceDir, new Set([source.extension]), 0);
    for (const file of files) {
      const relative = path.relative(projectRoot, file);
      try {
        await copyFile(file, path.join(stagingDir, path.basename(file)));
        copied.push(relative);
      } catch (e) {
        failures.push({ source: relative, reason: String(e) });
        logger.debug('Failed to stage asset', { file: relative, error: String(e) });
      }
    }
  }

  const hasAssets = !(await isDirectoryEmpty(stagingDir));
  logger.info('Assets staged', { copied: copied.length, failures: failures.length, hasAssets });

  return { stagingDir, copied, failures, missingSources, hasAssets };
}
