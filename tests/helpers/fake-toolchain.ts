import type { CliRunResult } from '../../src/types.js';
import type { Toolchain, ToolchainRunOptions } from '../../src/utils/pio-runner.js';

export interface FakeToolchainOptions {
  available?: boolean;
  /** Exit code for a command; 0 when omitted */
  exitCodeFor?: (args: readonly string[]) => number;
}

/**
 * In-process stand-in for pio that records every invocation
 */
export class FakeToolchain implements Toolchain {
  readonly calls: string[][] = [];
  readonly runOptions: ToolchainRunOptions[] = [];
  probes = 0;

  constructor(private readonly options: FakeToolchainOptions = {}) {}

  getExecutable(): string {
    return 'pio';
  }

  async isAvailable(): Promise<boolean> {
    this.probes += 1;
    return this.options.available ?? true;
  }

  async run(args: readonly string[], options: ToolchainRunOptions = {}): Promise<CliRunResult> {
    this.calls.push([...args]);
    this.runOptions.push(options);
    const exitCode = this.options.exitCodeFor?.(args) ?? 0;
    return { exitCode, stdout: '', stderr: '' };
  }

  commands(): string[] {
    return this.calls.map((args) => args.join(' '));
  }
}

export function failOn(pioTarget: string, exitCode = 1): (args: readonly string[]) => number {
  return (args) => {
    const targetIndex = args.indexOf('--target');
    const current = targetIndex === -1 ? 'build' : args[targetIndex + 1];
    return current === pioTarget ? exitCode : 0;
  };
}
