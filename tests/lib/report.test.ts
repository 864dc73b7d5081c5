import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildPipelineReport, formatPipelineReport, writePipelineReport } from '@/lib/report.js';
import { addWarning, createInitialState, failState, transitionPhase } from '@/lib/state.js';
import { atomicReadJson } from '@/lib/fs.js';
import { PipelinePhase, type PipelineState } from '@/types/state.js';
import type { PipelineReport } from '@/types/report.js';
import { join } from 'node:path';
import { makeTempDir, removeTempDir } from '../helpers/project.js';

const START = new Date('2026-03-01T10:00:00.000Z');
const END = new Date('2026-03-01T10:01:30.000Z');

function finishedState(): PipelineState {
  let state = createInitialState(START);
  state = transitionPhase(state, PipelinePhase.PREREQ_CHECKED, undefined, START);
  state = transitionPhase(state, PipelinePhase.CLEANED, undefined, START);
  state = transitionPhase(state, PipelinePhase.BUILT, 'arm64', START);
  state = transitionPhase(state, PipelinePhase.MERGED, undefined, START);
  state = addWarning(state, 'ICON_UNAVAILABLE', 'icon', 'No icon converter available for icon.svg');
  state = transitionPhase(state, PipelinePhase.ICON_SKIPPED, undefined, START);
  state = transitionPhase(state, PipelinePhase.ASSEMBLED, undefined, START);
  state = transitionPhase(state, PipelinePhase.VERIFIED, undefined, START);
  return transitionPhase(state, PipelinePhase.DONE, undefined, END);
}

describe('pipeline report', () => {
  it('should summarize a successful run', () => {
    const report = buildPipelineReport({
      state: finishedState(),
      architectures: ['arm64'],
      image: { path: '/dist/Sample-1.0.0-arm64.dmg', format: 'dmg', label: 'arm64', size_bytes: 3 * 1024 * 1024 },
      icon: 'default',
      finishedAt: END,
    });

    expect(report.ok).toBe(true);
    expect(report.phase).toBe(PipelinePhase.DONE);
    expect(report.duration_ms).toBe(90_000);
    expect(formatPipelineReport(report)).toEqual([
      '[OK]    /dist/Sample-1.0.0-arm64.dmg',
      '        arm64, 3.0 MB',
      '[WARN]  ICON_UNAVAILABLE (icon): No icon converter available for icon.svg',
      `        run ${report.run_id} took 90.0s`,
    ]);
  });

  it('should list the failure and each remediation line', () => {
    const state = failState(
      createInitialState(START),
      {
        code: 'PREREQ_MISSING',
        stage: 'prereq',
        message: 'Missing prerequisites: lipo, hdiutil',
        remediation: 'lipo: install Xcode\nhdiutil: run on macOS',
      },
      END
    );

    const report = buildPipelineReport({ state, architectures: ['x86_64', 'arm64'], image: null, icon: null, finishedAt: END });

    expect(report.ok).toBe(false);
    expect(formatPipelineReport(report).slice(0, 4)).toEqual([
      '[FAIL]  prereq: PREREQ_MISSING',
      '        Missing prerequisites: lipo, hdiutil',
      '        -> lipo: install Xcode',
      '        -> hdiutil: run on macOS',
    ]);
  });

  it('should write the report as JSON', async () => {
    const dir = await makeTempDir('bundlesmith-report');
    try {
      const report = buildPipelineReport({ state: finishedState(), architectures: ['arm64'], image: null, icon: 'default', finishedAt: END });
      await writePipelineReport(join(dir, 'out', 'report.json'), report);

      expect(await atomicReadJson<PipelineReport>(join(dir, 'out', 'report.json'))).toEqual(report);
    } finally {
      await removeTempDir(dir);
    }
  });
});
