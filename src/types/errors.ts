/**
 * Error taxonomy for pipeline stages.
 *
 * Every fatal condition is a PipelineError carrying the stage that raised
 * it and a remediation hint printed by the CLI.
 */

import type { FailureCode } from '../constants/failure_codes.js';

/** Pipeline stages, as reported to the operator. */
export type PipelineStage =
  | 'prereq'
  | 'clean'
  | 'build'
  | 'merge'
  | 'icon'
  | 'assemble'
  | 'verify';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: FailureCode,
    public readonly stage: PipelineStage,
    public readonly remediation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** A required external tool or input is absent. Raised before any mutation. */
export class PrereqMissingError extends PipelineError {
  constructor(
    message: string,
    public readonly missing: string[],
    remediation: string
  ) {
    super(message, 'PREREQ_MISSING', 'prereq', remediation);
    this.name = 'PrereqMissingError';
  }
}

/** Tool download or post-download validation failed. */
export class FetchError extends PipelineError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly url: string,
    cause?: Error
  ) {
    super(
      message,
      'FETCH_FAILED',
      'assemble',
      `Check network access to ${url}, or place an executable ${tool} in the tool cache manually.`,
      cause
    );
    this.name = 'FetchError';
  }
}

/** Expected bundler output is missing. */
export class CompileError extends PipelineError {
  constructor(
    message: string,
    public readonly arch: string,
    public readonly stderrTail: string = ''
  ) {
    super(
      message,
      'COMPILE_FAILED',
      'build',
      `Run the bundler manually for ${arch} and inspect its output; make sure the toolchain can target ${arch}.`
    );
    this.name = 'CompileError';
  }
}

export class MergeError extends PipelineError {
  constructor(message: string, remediation = 'Rebuild every architecture from a clean state and retry the merge.') {
    super(message, 'MERGE_FAILED', 'merge', remediation);
    this.name = 'MergeError';
  }
}

/** A converter was available but produced an incomplete icon set. */
export class IconError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'ICON_FAILED',
      'icon',
      'Check that the master icon is a valid image of at least 1024x1024 pixels.',
      cause
    );
    this.name = 'IconError';
  }
}

export class AssemblyError extends PipelineError {
  constructor(message: string, remediation = 'Inspect the image tool output above and retry.', cause?: Error) {
    super(message, 'ASSEMBLY_FAILED', 'assemble', remediation, cause);
    this.name = 'AssemblyError';
  }
}

/** The attached volume never appeared under its mount point. */
export class MountTimeoutError extends PipelineError {
  constructor(
    message: string,
    public readonly mountPoint: string
  ) {
    super(
      message,
      'MOUNT_TIMEOUT',
      'assemble',
      'Raise image.mount_timeout_seconds, or detach stale volumes with `hdiutil info` / `hdiutil detach`.'
    );
    this.name = 'MountTimeoutError';
  }
}

/** The finished bundle or image failed inspection. */
export class VerificationError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(
      message,
      'VERIFY_FAILED',
      'verify',
      'Inspect the bundle with `bundlesmith verify <path>` and rebuild from a clean state.'
    );
    this.name = 'VerificationError';
  }
}

/**
 * Type guard for PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
