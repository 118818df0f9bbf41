/**
 * Pipeline stage table
 */

import type { PipelineContext, StageName } from '../types.js';
import type { TargetProfile } from '../config/targets.js';
import { MONITOR_BAUD } from '../config/project.js';

export interface StageDefinition {
  stage: StageName;
  enabled: (context: PipelineContext) => boolean;
  command: (target: TargetProfile) => string[];
  progressMessage: (target: TargetProfile) => string;
  successMessage?: string;
  failureMessage: string;
  /** Interactive hand-off: the exit code is not a pipeline result */
  handOff?: boolean;
}

function runTarget(target: TargetProfile, pioTarget?: string): string[] {
  const args = ['run', '-e', target];
  if (pioTarget) {
    args.push('--target', pioTarget);
  }
  return args;
}

export function monitorCommand(): string[] {
  return ['device', 'monitor', '-b', String(MONITOR_BAUD)];
}

export const PIPELINE_STAGES: readonly StageDefinition[] = [
  {
    stage: 'cleaning',
    enabled: ({ config }) => config.cleanBuild,
    command: (target) => runTarget(target, 'clean'),
    progressMessage: () => 'Cleaning previous build...',
    successMessage: 'Build cleaned',
    failureMessage: 'Clean failed',
  },
  {
    stage: 'compiling',
    enabled: () => true,
    command: (target) => runTarget(target),
    progressMessage: (target) => `Building firmware for ${target}...`,
    successMessage: 'Firmware built successfully',
    failureMessage: 'Build failed',
  },
  {
    stage: 'packaging-assets',
    enabled: ({ assetsStaged }) => assetsStaged,
    command: (target) => runTarget(target, 'buildfs'),
    progressMessage: () => 'Building filesystem...',
    successMessage: 'Filesystem built successfully',
    failureMessage: 'Filesystem build failed',
  },
  {
    stage: 'deploying-firmware',
    enabled: ({ config }) => config.uploadFirmware,
    command: (target) => runTarget(target, 'upload'),
    progressMessage: () => 'Uploading firmware...',
    successMessage: 'Firmware uploaded successfully',
    failureMessage: 'Firmware upload failed',
  },
  {
    stage: 'deploying-assets',
    enabled: ({ config, assetsStaged }) => config.uploadFilesystem && assetsStaged,
    command: (target) => runTarget(target, 'uploadfs'),
    progressMessage: () => 'Uploading filesystem...',
    successMessage: 'Filesystem uploaded successfully',
    failureMessage: 'Filesystem upload failed',
  },
  {
    stage: 'monitoring',
    enabled: ({ config }) => config.startMonitor,
    command: () => monitorCommand(),
    progressMessage: () => 'Starting serial monitor (Press Ctrl+C to exit)...',
    failureMessage: 'Serial monitor failed',
    handOff: true,
  },
];

export function getStage(stage: StageName): StageDefinition {
  const definition = PIPELINE_STAGES.find((entry) => entry.stage === stage);
  if (!definition) {
    throw new Error(`Unknown pipeline stage: ${stage}`);
  }
  return definition;
}

export function formatCommand(args: readonly string[]): string {
  return ['pio', ...args].join(' ');
}
