/**
 * Build errors
 * Every kind is terminal for the invocation and maps to exit code 1.
 */

import type { StageName } from '../types.js';

export type BuildErrorKind = 'usage' | 'validation' | 'precondition' | 'stage';

export abstract class BuildError extends Error {
  abstract readonly kind: BuildErrorKind;
  readonly guidance: readonly string[];

  constructor(message: string, guidance: readonly string[] = []) {
    super(message);
    this.name = new.target.name;
    this.guidance = guidance;
  }
}

/**
 * Unknown flag, positional token or missing option value
 */
export class UsageError extends BuildError {
  readonly kind = 'usage';

  constructor(public readonly token: string, message: string) {
    super(message);
  }
}

/**
 * Unsupported target profile
 */
export class ValidationError extends BuildError {
  readonly kind = 'validation';

  constructor(public readonly value: string, public readonly allowed: readonly string[]) {
    super(`Unsupported board: ${value}`, [`Supported boards: ${allowed.join(' ')}`]);
  }
}

export type PreconditionReason =
  | 'toolchain-missing'
  | 'not-project-root'
  | 'missing-file'
  | 'staging-unavailable';

export class PreconditionError extends BuildError {
  readonly kind = 'precondition';

  constructor(
    public readonly reason: PreconditionReason,
    message: string,
    guidance: readonly string[] = [],
    public readonly path?: string,
  ) {
    super(message, guidance);
  }
}

/**
 * A delegated toolchain command exited non-zero
 */
export class StageFailure extends BuildError {
  readonly kind = 'stage';

  constructor(
    public readonly stage: StageName,
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
  ) {
    super(message, [`Command "${command}" exited with code ${exitCode}`]);
  }
}
