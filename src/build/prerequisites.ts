/**
 * Prerequisite gates
 * Toolchain, project root and required sources, checked in that order
 */

import * as path from 'path';
import type { ProjectLayout } from '../types.js';
import { PROJECT_LAYOUT } from '../config/project.js';
import { PreconditionError } from '../utils/errors.js';
import { pathExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import type { Toolchain } from '../utils/pio-runner.js';

const logger = createLogger('Prerequisites');

export async function checkToolchain(toolchain: Toolchain): Promise<void> {
  if (!(await toolchain.isAvailable())) {
    throw new PreconditionError(
      'toolchain-missing',
      'PlatformIO is not installed. Please install it with:',
      ['pip install platformio'],
    );
  }
}

export async function checkProjectRoot(
  projectRoot: string,
  layout: ProjectLayout = PROJECT_LAYOUT,
): Promise<void> {
  if (!(await pathExists(path.join(projectRoot, layout.markerFile)))) {
    throw new PreconditionError(
      'not-project-root',
      `${layout.markerFile} not found. Please run this command from the project root directory.`,
      [],
      layout.markerFile,
    );
  }
}

/**
 * Stops at the first missing file
 */
export async function checkRequiredFiles(
  projectRoot: string,
  layout: ProjectLayout = PROJECT_LAYOUT,
): Promise<void> {
  for (const file of layout.requiredFiles) {
    if (!(await pathExists(path.join(projectRoot, file)))) {
      throw new PreconditionError('missing-file', `Required file not found: ${file}`, [], file);
    }
  }
  logger.debug('Required files present', { count: layout.requiredFiles.length });
}

export async function checkPrerequisites(
  toolchain: Toolchain,
  projectRoot: string,
  layout: ProjectLayout = PROJECT_LAYOUT,
): Promise<void> {
  await checkToolchain(toolchain);
  await checkProjectRoot(projectRoot, layout);
  await checkRequiredFiles(projectRoot, layout);
}
