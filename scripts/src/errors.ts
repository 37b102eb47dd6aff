/**
 * gcc-forge - Error Taxonomy
 *
 * Every fatal condition in the pipeline is one of these. Nothing catches
 * them below the builder: the first one ends the run.
 */

import { Stage } from './types.js';

export type ToolchainErrorKind =
  | 'validation'
  | 'acquisition'
  | 'patch'
  | 'stage'
  | 'integrity'
  | 'packaging';

export abstract class ToolchainError extends Error {
  abstract readonly kind: ToolchainErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid, absent or incompatible architecture/flavor/version combination.
 * Raised by the resolver before any I/O.
 */
export class ValidationError extends ToolchainError {
  readonly kind = 'validation';

  constructor(
    message: string,
    public readonly hint: string,
    public readonly showUsage: boolean = false
  ) {
    super(message);
  }
}

export class AcquisitionError extends ToolchainError {
  readonly kind = 'acquisition';
}

export class PatchError extends ToolchainError {
  readonly kind = 'patch';

  constructor(message: string, public readonly patchFile: string) {
    super(message);
  }
}

export class StageError extends ToolchainError {
  readonly kind = 'stage';

  constructor(
    public readonly stage: Stage,
    message: string,
    public readonly command?: string,
    public readonly exitCode?: number
  ) {
    super(message);
  }
}

/**
 * Artifacts from a previous run survived clean-up.
 */
export class IntegrityError extends ToolchainError {
  readonly kind = 'integrity';

  constructor(message: string, public readonly leftovers: string[]) {
    super(message);
  }
}

export class PackagingError extends ToolchainError {
  readonly kind = 'packaging';
}

export function isToolchainError(error: unknown): error is ToolchainError {
  return error instanceof ToolchainError;
}

export function describeError(error: unknown): string {
  if (error instanceof StageError) {
    const failed = error.command ? ` (${error.command} exited with ${error.exitCode ?? 'an error'})` : '';
    return `[${error.stage}] ${error.message}${failed}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
