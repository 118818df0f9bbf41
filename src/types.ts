/**
 * Shared type definitions for the ESPixelStick build orchestrator
 */

import type { TargetProfile } from './config/targets.js';
import type { StageFailure } from './utils/errors.js';

// Resolved command-line options, before target validation
export interface BuildOptions {
  readonly target: string;
  readonly cleanBuild: boolean;
  readonly uploadFirmware: boolean;
  readonly uploadFilesystem: boolean;
  readonly startMonitor: boolean;
}

// Validated, frozen configuration threaded through every later component
export interface BuildConfiguration extends Omit<BuildOptions, 'target'> {
  readonly target: TargetProfile;
}

// Asset source directory and the extension copied from it
export interface AssetSource {
  dir: string;
  extension: string;
}

// Project paths, relative to the project root
export interface ProjectLayout {
  markerFile: string;
  requiredFiles: readonly string[];
  assetSources: readonly AssetSource[];
  stagingDir: string;
}

export interface AssetCopyFailure {
  source: string;
  reason: string;
}

// Asset staging result (never fatal)
export interface StagingReport {
  stagingDir: string;
  copied: string[];
  failures: AssetCopyFailure[];
  missingSources: string[];
  hasAssets: boolean;
}

// Pipeline stages double as the runner's active states
export type StageName =
  | 'cleaning'
  | 'compiling'
  | 'packaging-assets'
  | 'deploying-firmware'
  | 'deploying-assets'
  | 'monitoring';

export type PipelineState = 'idle' | StageName | 'done' | 'failed';

export type StageOutcome =
  | { stage: StageName; status: 'skipped' }
  | {
      stage: StageName;
      status: 'succeeded' | 'failed';
      command: string[];
      exitCode: number;
      durationMs: number;
    };

export interface PipelineContext {
  config: BuildConfiguration;
  assetsStaged: boolean;
}

interface PipelineResultBase {
  outcomes: StageOutcome[];
  history: PipelineState[];
}

export type PipelineResult =
  | (PipelineResultBase & { state: 'done' })
  | (PipelineResultBase & { state: 'failed'; failure: StageFailure });

// CLI run result
export interface CliRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}
