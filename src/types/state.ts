/**
 * State machine types for a pipeline run.
 *
 * INIT → PREREQ_CHECKED → CLEANED → BUILT(arch)… → MERGED →
 * ICON_READY | ICON_SKIPPED → ASSEMBLED → VERIFIED → DONE
 *
 * FAILED is reachable from every non-terminal phase.
 */

import type { FailureCode, WarningCode } from '../constants/failure_codes.js';
import type { Architecture } from './config.js';
import type { PipelineStage } from './errors.js';

export enum PipelinePhase {
  INIT = 'INIT',
  PREREQ_CHECKED = 'PREREQ_CHECKED',
  CLEANED = 'CLEANED',
  BUILT = 'BUILT',
  MERGED = 'MERGED',
  ICON_READY = 'ICON_READY',
  ICON_SKIPPED = 'ICON_SKIPPED',
  ASSEMBLED = 'ASSEMBLED',
  VERIFIED = 'VERIFIED',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

/** Non-fatal condition recorded during a run. */
export interface PipelineWarning {
  code: WarningCode;
  stage: PipelineStage;
  message: string;
}

/** Terminal failure of a run. */
export interface PipelineFailure {
  code: FailureCode;
  stage: PipelineStage;
  message: string;
  remediation: string;
}

export interface PhaseTransition {
  phase: PipelinePhase;
  /** Set for BUILT transitions */
  arch?: Architecture;
  at: string;
}

export interface PipelineState {
  phase: PipelinePhase;
  run_id: string;
  started_at: string;
  /** Architectures built so far, in completion order */
  built: Architecture[];
  warnings: PipelineWarning[];
  failure: PipelineFailure | null;
  history: PhaseTransition[];
}
