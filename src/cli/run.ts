/**
 * Build command
 * Options → target → prerequisites → assets → pipeline → summary
 */

import type { ProjectLayout } from '../types.js';
import { PROJECT_LAYOUT } from '../config/project.js';
import { validateTarget } from '../config/targets.js';
import { stageAssets } from '../build/assets.js';
import { PipelineRunner } from '../build/pipeline.js';
import { checkPrerequisites } from '../build/prerequisites.js';
import { printSummary } from '../build/summary.js';
import { BuildError, UsageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Toolchain } from '../utils/pio-runner.js';
import { formatUsage, resolveOptions } from './options.js';
import type { Reporter } from './reporter.js';

const logger = createLogger('Build');

export interface BuildDependencies {
  toolchain: Toolchain;
  reporter: Reporter;
  projectRoot: string;
  layout?: ProjectLayout;
}

function reportError(reporter: Reporter, error: BuildError): void {
  reporter.error(error.message);
  for (const line of error.guidance) {
    reporter.error(line);
  }
  if (error instanceof UsageError) {
    reporter.plain(formatUsage());
  }
}

/**
 * Run one build invocation and return the process exit code
 */
export async function runBuild(argv: readonly string[], deps: BuildDependencies): Promise<number> {
  const { toolchain, reporter, projectRoot } = deps;
  const layout = deps.layout ?? PROJECT_LAYOUT;

  try {
    const resolution = resolveOptions(argv);
    if (resolution.kind === 'help') {
      reporter.plain(formatUsage());
      return 0;
    }

    const config = validateTarget(resolution.options);
    logger.debug('Configuration resolved', config);

    reporter.info(`Starting build for board: ${config.target}`);
    await checkPrerequisites(toolchain, projectRoot, layout);
    reporter.success('All required files found');

    reporter.info('Preparing filesystem data...');
    const staging = await stageAssets(projectRoot, layout);
    if (staging.hasAssets) {
      reporter.success('Filesystem data prepared');
    } else {
      reporter.warning('No filesystem data found - web interfaces may not work');
    }

    const runner = new PipelineRunner(toolchain, reporter, { cwd: projectRoot });
    const result = await runner.run({ config, assetsStaged: staging.hasAssets });
    if (result.state === 'failed') {
      reportError(reporter, result.failure);
      return 1;
    }

    printSummary(reporter, config, staging.hasAssets);
    return 0;
  } catch (error) {
    if (error instanceof BuildError) {
      logger.debug('Build stopped', { kind: error.kind, message: error.message });
      reportError(reporter, error);
      return 1;
    }
    throw error;
  }
}
