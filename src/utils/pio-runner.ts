/**
 * PlatformIO Runner
 * Wrapper for pio command execution
 */

import { execa } from 'execa';
import * as fsSync from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CliRunResult } from '../types.js';
import { loadSettings } from '../config/settings.js';
import { createLogger } from './logger.js';

const logger = createLogger('PioRunner');

// Where the PlatformIO installer puts its private virtualenv
const PLATFORMIO_PENV_BIN = path.join(
  os.homedir(),
  '.platformio',
  'penv',
  process.platform === 'win32' ? 'Scripts/pio.exe' : 'bin/pio'
);

/**
 * Resolve pio executable path
 */
export function resolvePioExecutable(explicitPath = loadSettings().pioExecutable): string {
  if (explicitPath && fsSync.existsSync(explicitPath)) {
    return explicitPath;
  }
  if (fsSync.existsSync(PLATFORMIO_PENV_BIN)) {
    return PLATFORMIO_PENV_BIN;
  }
  return 'pio';
}

export interface ToolchainRunOptions {
  cwd?: string;
  /** Hand the terminal to the child process instead of capturing its output */
  inherit?: boolean;
}

/**
 * The external build tool, as seen by the orchestrator
 */
export interface Toolchain {
  getExecutable(): string;
  isAvailable(): Promise<boolean>;
  run(args: readonly string[], options?: ToolchainRunOptions): Promise<CliRunResult>;
}

/**
 * PlatformIO CLI runner
 */
export class PioRunner implements Toolchain {
  private cliPath: string;

  constructor(cliPath: string = resolvePioExecutable()) {
    this.cliPath = cliPath;
  }

  getExecutable(): string {
    return this.cliPath;
  }

  /**
   * Run pio command
   */
  async run(args: readonly string[], options: ToolchainRunOptions = {}): Promise<CliRunResult> {
    logger.debug('Running pio', { args, cwd: options.cwd });

    try {
      const result = await execa(this.cliPath, args, {
        cwd: options.cwd,
        reject: false,
        stdio: options.inherit ? 'inherit' : 'pipe',
      });

      if (result.failed && result.exitCode === undefined) {
        logger.warn('pio could not be started', { executable: this.cliPath });
      }

      return {
        exitCode: result.exitCode ?? 1,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('pio execution failed', { error: message, args });

      return {
        exitCode: 1,
        stdout: '',
        stderr: message,
      };
    }
  }

  /**
   * Get pio version
   */
  async getVersion(): Promise<{ ok: boolean; version?: string; error?: string }> {
    const result = await this.run(['--version']);
    if (result.exitCode !== 0) {
      return { ok: false, error: result.stderr };
    }
    return { ok: true, version: result.stdout.trim() };
  }

  /**
   * Check if pio is available
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.getVersion();
    if (result.ok) {
      logger.debug('pio found', { executable: this.cliPath, version: result.version });
    }
    return result.ok;
  }
}
