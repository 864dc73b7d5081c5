/**
 * Pipeline reports.
 *
 * buildPipelineReport turns the final state into the PipelineReport the
 * CLI prints and, with --report, writes to disk as JSON.
 */

import type { Architecture } from '../types/config.js';
import type { PackageImage } from '../types/artifact.js';
import type { PipelineReport } from '../types/report.js';
import { PipelinePhase } from '../types/state.js';
import type { PipelineState } from '../types/state.js';
import { atomicWriteJson } from './fs.js';

export interface ReportInputs {
  state: PipelineState;
  architectures: readonly Architecture[];
  image: PackageImage | null;
  icon: string | null;
  finishedAt?: Date;
}

export function buildPipelineReport(inputs: ReportInputs): PipelineReport {
  const finished = inputs.finishedAt ?? new Date();
  const { state } = inputs;
  return {
    run_id: state.run_id,
    ok: state.phase === PipelinePhase.DONE,
    phase: state.phase,
    started_at: state.started_at,
    finished_at: finished.toISOString(),
    duration_ms: Math.max(0, finished.getTime() - Date.parse(state.started_at)),
    architectures: [...inputs.architectures],
    image: inputs.image,
    icon: inputs.icon,
    warnings: state.warnings,
    failure: state.failure,
  };
}

/** Summary lines printed at the end of a run. */
export function formatPipelineReport(report: PipelineReport): string[] {
  const lines: string[] = [];
  if (report.ok && report.image) {
    lines.push(`[OK]    ${report.image.path}`);
    lines.push(`        ${report.image.label}, ${(report.image.size_bytes / (1024 * 1024)).toFixed(1)} MB`);
  }
  if (report.failure) {
    lines.push(`[FAIL]  ${report.failure.stage}: ${report.failure.code}`);
    lines.push(`        ${report.failure.message}`);
    for (const hint of report.failure.remediation.split('\n')) {
      lines.push(`        -> ${hint}`);
    }
  }
  for (const warning of report.warnings) {
    lines.push(`[WARN]  ${warning.code} (${warning.stage}): ${warning.message}`);
  }
  lines.push(`        run ${report.run_id} took ${(report.duration_ms / 1000).toFixed(1)}s`);
  return lines;
}

/**
 * Writes the report as JSON.
 *
 * @throws {AtomicFsError} If the file cannot be written
 */
export async function writePipelineReport(path: string, report: PipelineReport): Promise<void> {
  await atomicWriteJson(path, report);
}
