import { describe, it, expect } from 'vitest';
import { PipelineRunner } from '../src/build/pipeline.js';
import { getStage } from '../src/build/stages.js';
import { Reporter } from '../src/cli/reporter.js';
import { validateTarget } from '../src/config/targets.js';
import type { BuildOptions } from '../src/types.js';
import { FakeToolchain, failOn } from './helpers/fake-toolchain.js';
import { RecordingSink } from './helpers/project.js';

function makeConfig(overrides: Partial<BuildOptions> = {}) {
  return validateTarget({
    target: 'd1_mini',
    cleanBuild: false,
    uploadFirmware: false,
    uploadFilesystem: false,
    startMonitor: false,
    ...overrides,
  });
}

const ALL_FLAGS = { cleanBuild: true, uploadFirmware: true, uploadFilesystem: true, startMonitor: true };

function setup(toolchain = new FakeToolchain()) {
  const sink = new RecordingSink();
  const runner = new PipelineRunner(toolchain, new Reporter(sink), { cwd: '/work/project' });
  return { toolchain, sink, runner };
}

describe('Pipeline Runner', () => {
  it('should run every enabled stage in order', async () => {
    const { toolchain, runner } = setup();
    const result = await runner.run({ config: makeConfig(ALL_FLAGS), assetsStaged: true });

    expect(result.state).toBe('done');
    expect(toolchain.commands()).toEqual([
      'run -e d1_mini --target clean',
      'run -e d1_mini',
      'run -e d1_mini --target buildfs',
      'run -e d1_mini --target upload',
      'run -e d1_mini --target uploadfs',
      'device monitor -b 115200',
    ]);
    expect(result.history).toEqual([
      'idle',
      'cleaning',
      'compiling',
      'packaging-assets',
      'deploying-firmware',
      'deploying-assets',
      'monitoring',
      'done',
    ]);
    expect(runner.getState()).toBe('done');
  });

  it('should hand the terminal to every stage command', async () => {
    const { toolchain, runner } = setup();
    await runner.run({ config: makeConfig(), assetsStaged: false });

    expect(toolchain.runOptions).toEqual([{ cwd: '/work/project', inherit: true }]);
  });

  it('should never clean when cleanBuild is false', async () => {
    const { toolchain, runner } = setup();
    const result = await runner.run({
      config: makeConfig({ ...ALL_FLAGS, cleanBuild: false }),
      assetsStaged: true,
    });

    expect(toolchain.commands()).not.toContain('run -e d1_mini --target clean');
    expect(result.outcomes[0]).toEqual({ stage: 'cleaning', status: 'skipped' });
  });

  it('should skip both asset stages when nothing was staged', async () => {
    const { toolchain, runner } = setup();
    const result = await runner.run({
      config: makeConfig({ uploadFilesystem: true }),
      assetsStaged: false,
    });

    expect(result.state).toBe('done');
    expect(toolchain.commands()).toEqual(['run -e d1_mini']);
    expect(result.outcomes.map((outcome) => `${outcome.stage}:${outcome.status}`)).toEqual([
      'cleaning:skipped',
      'compiling:succeeded',
      'packaging-assets:skipped',
      'deploying-firmware:skipped',
      'deploying-assets:skipped',
      'monitoring:skipped',
    ]);
  });

  it('should deploy assets without deploying firmware', async () => {
    const { toolchain, runner } = setup();
    await runner.run({ config: makeConfig({ target: 'esp32_cam', uploadFilesystem: true }), assetsStaged: true });

    expect(toolchain.commands()).toEqual([
      'run -e esp32_cam',
      'run -e esp32_cam --target buildfs',
      'run -e esp32_cam --target uploadfs',
    ]);
  });

  it('should stop at a failed compile', async () => {
    const { toolchain, runner } = setup(new FakeToolchain({ exitCodeFor: failOn('build', 2) }));
    const result = await runner.run({ config: makeConfig(ALL_FLAGS), assetsStaged: true });

    expect(toolchain.commands()).toEqual(['run -e d1_mini --target clean', 'run -e d1_mini']);
    expect(result.state).toBe('failed');
    expect(result.history).toEqual(['idle', 'cleaning', 'compiling', 'failed']);
    expect(result.outcomes).toHaveLength(2);
    expect(runner.getState()).toBe('failed');
    if (result.state === 'failed') {
      expect(result.failure.stage).toBe('compiling');
      expect(result.failure.message).toBe('Build failed');
      expect(result.failure.command).toBe('pio run -e d1_mini');
      expect(result.failure.exitCode).toBe(2);
      expect(result.failure.guidance).toEqual(['Command "pio run -e d1_mini" exited with code 2']);
    }
  });

  it('should stop at a failed clean', async () => {
    const { toolchain, runner } = setup(new FakeToolchain({ exitCodeFor: failOn('clean') }));
    const result = await runner.run({ config: makeConfig({ cleanBuild: true }), assetsStaged: true });

    expect(toolchain.commands()).toEqual(['run -e d1_mini --target clean']);
    expect(result.state === 'failed' && result.failure.message).toBe('Clean failed');
  });

  it('should not deploy assets after a failed firmware upload', async () => {
    const { toolchain, runner } = setup(new FakeToolchain({ exitCodeFor: failOn('upload') }));
    const result = await runner.run({ config: makeConfig(ALL_FLAGS), assetsStaged: true });

    expect(toolchain.commands()).toEqual([
      'run -e d1_mini --target clean',
      'run -e d1_mini',
      'run -e d1_mini --target buildfs',
      'run -e d1_mini --target upload',
    ]);
    expect(result.state === 'failed' && result.failure.stage).toBe('deploying-firmware');
  });

  it('should fail on a failed filesystem image build', async () => {
    const { runner } = setup(new FakeToolchain({ exitCodeFor: failOn('buildfs') }));
    const result = await runner.run({ config: makeConfig(), assetsStaged: true });

    expect(result.state === 'failed' && result.failure.message).toBe('Filesystem build failed');
  });

  it('should ignore the serial monitor exit code', async () => {
    const toolchain = new FakeToolchain({ exitCodeFor: (args) => (args[0] === 'device' ? 130 : 0) });
    const { runner } = setup(toolchain);
    const result = await runner.run({ config: makeConfig({ startMonitor: true }), assetsStaged: false });

    expect(result.state).toBe('done');
    expect(result.outcomes[5]).toMatchObject({ stage: 'monitoring', status: 'succeeded', exitCode: 130 });
  });

  it('should report progress and success for each stage', async () => {
    const { sink, runner } = setup();
    await runner.run({ config: makeConfig({ target: 'espsv3', startMonitor: true }), assetsStaged: false });

    expect(sink.lines).toEqual([
      '[INFO] Building firmware for espsv3...',
      '[SUCCESS] Firmware built successfully',
      '[INFO] Starting serial monitor (Press Ctrl+C to exit)...',
    ]);
  });

  it('should run a custom stage table', async () => {
    const toolchain = new FakeToolchain();
    const runner = new PipelineRunner(toolchain, new Reporter(new RecordingSink()), {
      stages: [getStage('compiling'), getStage('deploying-firmware')],
    });
    const result = await runner.run({ config: makeConfig({ ...ALL_FLAGS, target: 'd32_pro' }), assetsStaged: true });

    expect(toolchain.commands()).toEqual(['run -e d32_pro', 'run -e d32_pro --target upload']);
    expect(result.history).toEqual(['idle', 'compiling', 'deploying-firmware', 'done']);
  });
});
