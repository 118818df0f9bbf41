/**
 * Pipeline Runner
 * Runs the stage table in order and stops at the first failed stage
 */

import type { PipelineContext, PipelineResult, PipelineState, StageOutcome } from '../types.js';
import type { Reporter } from '../cli/reporter.js';
import { StageFailure } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Toolchain } from '../utils/pio-runner.js';
import { PIPELINE_STAGES, formatCommand, type StageDefinition } from './stages.js';

const logger = createLogger('Pipeline');

export interface PipelineRunnerOptions {
  cwd?: string;
  stages?: readonly StageDefinition[];
}

export class PipelineRunner {
  private readonly stages: readonly StageDefinition[];
  private readonly cwd?: string;
  private state: PipelineState = 'idle';
  private history: PipelineState[] = [];

  constructor(
    private readonly toolchain: Toolchain,
    private readonly reporter: Reporter,
    options: PipelineRunnerOptions = {},
  ) {
    this.stages = options.stages ?? PIPELINE_STAGES;
    this.cwd = options.cwd;
  }

  getState(): PipelineState {
    return this.state;
  }

  async run(context: PipelineContext): Promise<PipelineResult> {
    this.history = [];
    this.enter('idle');
    const outcomes: StageOutcome[] = [];
    const { target } = context.config;

    for (const definition of this.stages) {
      if (!definition.enabled(context)) {
        outcomes.push({ stage: definition.stage, status: 'skipped' });
        logger.debug('Stage skipped', { stage: definition.stage });
        continue;
      }

      this.enter(definition.stage);
      this.reporter.info(definition.progressMessage(target));

      const command = definition.command(target);
      const started = Date.now();
      const result = await this.toolchain.run(command, { cwd: this.cwd, inherit: true });
      const durationMs = Date.now() - started;
      const ok = definition.handOff === true || result.exitCode === 0;

      logger.info('Stage finished', { stage: definition.stage, exitCode: result.exitCode, durationMs });
      outcomes.push({
        stage: definition.stage,
        status: ok ? 'succeeded' : 'failed',
        command,
        exitCode: result.exitCode,
        durationMs,
      });

      if (!ok) {
        this.enter('failed');
        const failure = new StageFailure(
          definition.stage,
          definition.failureMessage,
          formatCommand(command),
          result.exitCode,
        );
        return { state: 'failed', outcomes, history: [...this.history], failure };
      }

      if (definition.successMessage) {
        this.reporter.success(definition.successMessage);
      }
    }

    this.enter('done');
    return { state: 'done', outcomes, history: [...this.history] };
  }

  private enter(state: PipelineState): void {
    logger.debug('Pipeline transition', { from: this.state, to: state });
    this.state = state;
    this.history.push(state);
  }
}
