#!/usr/bin/env node
import process from 'node:process';

import { Reporter } from './cli/reporter.js';
import { runBuild } from './cli/run.js';
import { logger } from './utils/logger.js';
import { PioRunner } from './utils/pio-runner.js';

export * from './types.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './build/index.js';
export * from './cli/index.js';

async function main() {
  const toolchain = new PioRunner();
  logger.debug('Using pio', { executable: toolchain.getExecutable() });

  process.exitCode = await runBuild(process.argv.slice(2), {
    toolchain,
    reporter: new Reporter(),
    projectRoot: process.cwd(),
  });
}

if (!process.env.ESPIXEL_BUILD_SKIP_MAIN) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
