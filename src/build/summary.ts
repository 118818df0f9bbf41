/**
 * Summary Reporter
 * Manual follow-up steps for whatever this run did not do
 */

import type { BuildConfiguration } from '../types.js';
import type { Reporter } from '../cli/reporter.js';
import { DEVICE_LINKS } from '../config/project.js';
import { formatCommand, getStage, monitorCommand } from './stages.js';

const LABEL_WIDTH = 20;

export function formatNextSteps(config: BuildConfiguration, assetsStaged: boolean): string[] {
  const steps: Array<[label: string, command: string]> = [];

  if (!config.uploadFirmware) {
    steps.push(['Upload firmware:', formatCommand(getStage('deploying-firmware').command(config.target))]);
  }
  if (!config.uploadFilesystem && assetsStaged) {
    steps.push(['Upload filesystem:', formatCommand(getStage('deploying-assets').command(config.target))]);
  }
  steps.push(['Start monitor:', formatCommand(monitorCommand())]);

  return [
    'Next steps:',
    ...steps.map(([label, command], index) => `${index + 1}. ${label.padEnd(LABEL_WIDTH)} ${command}`),
    '',
    'After uploading:',
    ...DEVICE_LINKS.map((link) => `- ${link}`),
  ];
}

export function printSummary(reporter: Reporter, config: BuildConfiguration, assetsStaged: boolean): void {
  reporter.info('Build completed successfully!');
  reporter.plain('');
  for (const line of formatNextSteps(config, assetsStaged)) {
    reporter.plain(line);
  }
  reporter.plain('');
  reporter.success('Build complete!');
}
