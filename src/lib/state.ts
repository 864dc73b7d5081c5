/**
 * State management for a pipeline run.
 *
 * State is immutable: every helper returns a new PipelineState. Phase
 * changes go through transitionPhase, which rejects moves outside the
 * pipeline graph.
 */

import { randomBytes } from 'node:crypto';
import type { WarningCode } from '../constants/failure_codes.js';
import type { Architecture } from '../types/config.js';
import { isPipelineError, type PipelineStage } from '../types/errors.js';
import { PipelinePhase } from '../types/state.js';
import type { PipelineFailure, PipelineState } from '../types/state.js';

/**
 * Error thrown on a phase change the pipeline graph does not allow.
 */
export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: PipelinePhase,
    public readonly to: PipelinePhase
  ) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

const ALLOWED_TRANSITIONS: Readonly<Record<PipelinePhase, readonly PipelinePhase[]>> = {
  [PipelinePhase.INIT]: [PipelinePhase.PREREQ_CHECKED],
  [PipelinePhase.PREREQ_CHECKED]: [PipelinePhase.CLEANED],
  [PipelinePhase.CLEANED]: [PipelinePhase.BUILT],
  // BUILT repeats once per architecture; a single architecture skips the merge.
  [PipelinePhase.BUILT]: [PipelinePhase.BUILT, PipelinePhase.MERGED],
  [PipelinePhase.MERGED]: [PipelinePhase.ICON_READY, PipelinePhase.ICON_SKIPPED],
  [PipelinePhase.ICON_READY]: [PipelinePhase.ASSEMBLED],
  [PipelinePhase.ICON_SKIPPED]: [PipelinePhase.ASSEMBLED],
  [PipelinePhase.ASSEMBLED]: [PipelinePhase.VERIFIED],
  [PipelinePhase.VERIFIED]: [PipelinePhase.DONE],
  [PipelinePhase.DONE]: [],
  [PipelinePhase.FAILED]: [],
};

/** True for DONE and FAILED. */
export function isTerminalPhase(phase: PipelinePhase): boolean {
  return phase === PipelinePhase.DONE || phase === PipelinePhase.FAILED;
}

export function canTransition(from: PipelinePhase, to: PipelinePhase): boolean {
  if (to === PipelinePhase.FAILED) {
    return !isTerminalPhase(from);
  }
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Generates a unique run ID.
 */
export function generateRunId(): string {
  return randomBytes(16).toString('hex');
}

export function createInitialState(now: Date = new Date()): PipelineState {
  const at = now.toISOString();
  return {
    phase: PipelinePhase.INIT,
    run_id: generateRunId(),
    started_at: at,
    built: [],
    warnings: [],
    failure: null,
    history: [{ phase: PipelinePhase.INIT, at }],
  };
}

/**
 * Moves the state to `next`.
 *
 * @param arch - Architecture just built, required for BUILT
 * @throws {IllegalTransitionError} If the pipeline graph has no such edge
 */
export function transitionPhase(
  state: PipelineState,
  next: PipelinePhase,
  arch?: Architecture,
  now: Date = new Date()
): PipelineState {
  if (!canTransition(state.phase, next)) {
    throw new IllegalTransitionError(state.phase, next);
  }
  if (next === PipelinePhase.BUILT && arch === undefined) {
    throw new Error('BUILT transition requires the architecture that was built');
  }

  return {
    ...state,
    phase: next,
    built: next === PipelinePhase.BUILT && arch !== undefined ? [...state.built, arch] : state.built,
    history: [...state.history, { phase: next, ...(arch !== undefined ? { arch } : {}), at: now.toISOString() }],
  };
}

export function addWarning(
  state: PipelineState,
  code: WarningCode,
  stage: PipelineStage,
  message: string
): PipelineState {
  return {
    ...state,
    warnings: [...state.warnings, { code, stage, message }],
  };
}

/**
 * Converts a thrown value into a PipelineFailure.
 *
 * Errors that are not PipelineErrors become INTERNAL_ERROR failures
 * attributed to `fallbackStage`.
 */
export function toFailure(error: unknown, fallbackStage: PipelineStage): PipelineFailure {
  if (isPipelineError(error)) {
    return {
      code: error.code,
      stage: error.stage,
      message: error.message,
      remediation: error.remediation,
    };
  }
  return {
    code: 'INTERNAL_ERROR',
    stage: fallbackStage,
    message: error instanceof Error ? error.message : String(error),
    remediation: 'Re-run with BUNDLESMITH_DEBUG=1 and report the output.',
  };
}

/**
 * Moves the state to FAILED with the given failure.
 *
 * @throws {IllegalTransitionError} If the state is already terminal
 */
export function failState(state: PipelineState, failure: PipelineFailure, now: Date = new Date()): PipelineState {
  return {
    ...transitionPhase(state, PipelinePhase.FAILED, undefined, now),
    failure,
  };
}
