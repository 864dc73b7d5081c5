/**
 * Report types for pipeline runs and bundle inspection.
 */

import type { Architecture } from './config.js';
import type { PackageImage } from './artifact.js';
import type { PipelineFailure, PipelinePhase, PipelineWarning } from './state.js';

export interface PipelineReport {
  run_id: string;
  ok: boolean;
  /** Phase the run ended in (DONE or FAILED) */
  phase: PipelinePhase;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  architectures: Architecture[];
  image: PackageImage | null;
  /** Converter used for the icon set, or 'default' when skipped */
  icon: string | null;
  warnings: PipelineWarning[];
  failure: PipelineFailure | null;
}

/** Metadata read from the bundle manifest. */
export interface BundleMetadata {
  name: string | null;
  version: string | null;
  identifier: string | null;
  minimum_os: string | null;
}

export interface CrashReport {
  path: string;
  modified_at: string;
}

/** Result of inspecting an installed or freshly built bundle. */
export interface VerifierReport {
  bundle_path: string;
  bundle_exists: boolean;
  executable_path: string;
  executable_present: boolean;
  executable_permission: boolean;
  /** Architectures in the executable, or null when they cannot be read */
  architectures: string[] | null;
  metadata: BundleMetadata | null;
  crash_reports: CrashReport[];
  issues: string[];
}
