/**
 * Pipeline driver.
 *
 * Runs every stage in order against one frozen BuildConfig:
 *
 *   prerequisites → clean → build (per architecture) → merge → icon →
 *   assemble → verify
 *
 * The first fatal error ends the run in FAILED; afterwards only the
 * staging area and the temporary image are removed. A successful run
 * removes work_dir and leaves exactly one image in dist_dir.
 */

import type { Artifact, IconChoice, MergedArtifact, PackageImage } from '../types/artifact.js';
import type { BuildConfig } from '../types/config.js';
import { VerificationError, type PipelineStage } from '../types/errors.js';
import type { PipelineReport } from '../types/report.js';
import { PipelinePhase, type PipelineState } from '../types/state.js';
import type { CommandRunner } from '../lib/exec.js';
import { removePath } from '../lib/fs.js';
import { logError, logInfo, logStage, logWarn } from '../lib/log.js';
import { cleanWorkspace, imagePath, removeWorkDir, stagingDir } from '../lib/paths.js';
import { runBounded } from '../lib/pool.js';
import { preflightError, runPreflight } from '../lib/preflight.js';
import { OsascriptPresentation, type PresentationScript } from '../lib/presentation.js';
import { buildPipelineReport } from '../lib/report.js';
import { addWarning, createInitialState, failState, toFailure, transitionPhase } from '../lib/state.js';
import { ToolCache } from '../lib/tool_cache.js';
import { assemble, temporaryImagePath } from './assembler/index.js';
import { buildArchitecture } from './builder.js';
import { buildIconContainer } from './icons.js';
import { describeMismatch, mergeArtifacts, promoteArtifact } from './merger.js';
import { inspectBundle, verifyImage } from './verifier.js';

export interface PipelineDeps {
  runner: CommandRunner;
  presentation?: PresentationScript;
  toolCache?: ToolCache;
  /** Delay between mount polls */
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const TOTAL_STEPS = 7;

/**
 * Removes what a failed run leaves behind, including an image that failed
 * verification. The per-architecture builds are kept for inspection.
 */
export async function releaseResources(config: BuildConfig): Promise<void> {
  for (const path of [stagingDir(config), temporaryImagePath(config), imagePath(config)]) {
    try {
      await removePath(path);
    } catch (error) {
      logWarn(`Could not remove ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Runs the whole pipeline.
 *
 * Stage failures do not throw: they are reported through the returned
 * PipelineReport (`ok: false`, `failure` set).
 */
export async function runPipeline(config: BuildConfig, deps: PipelineDeps): Promise<PipelineReport> {
  const now = deps.now ?? (() => new Date());
  const { runner } = deps;
  let state: PipelineState = createInitialState(now());
  let stage: PipelineStage = 'prereq';
  let image: PackageImage | null = null;
  let iconLabel: string | null = null;

  try {
    logStage(1, TOTAL_STEPS, 'Prerequisites');
    const preflight = await runPreflight(config, runner);
    for (const warning of preflight.warnings) {
      logWarn(warning);
      state = addWarning(state, 'PREREQ_OPTIONAL_MISSING', 'prereq', warning);
    }
    if (!preflight.ok) {
      throw preflightError(preflight);
    }
    state = transitionPhase(state, PipelinePhase.PREREQ_CHECKED, undefined, now());

    stage = 'clean';
    logStage(2, TOTAL_STEPS, 'Clean');
    await cleanWorkspace(config);
    state = transitionPhase(state, PipelinePhase.CLEANED, undefined, now());

    stage = 'build';
    logStage(3, TOTAL_STEPS, `Build (${config.architectures.join(', ')})`);
    const artifacts: Artifact[] = await runBounded(config.architectures, config.parallel_builds, async (arch) => {
      const artifact = await buildArchitecture(config, arch, { runner });
      state = transitionPhase(state, PipelinePhase.BUILT, arch, now());
      return artifact;
    });

    stage = 'merge';
    logStage(4, TOTAL_STEPS, 'Merge');
    let merged: MergedArtifact;
    if (artifacts.length > 1) {
      const outcome = await mergeArtifacts(artifacts, config, { runner });
      for (const mismatch of outcome.mismatches) {
        state = addWarning(state, 'RESOURCE_MISMATCH', 'merge', describeMismatch(mismatch, outcome.artifact.template_arch));
      }
      merged = outcome.artifact;
    } else {
      logInfo(`Single architecture (${artifacts[0].arch}); nothing to merge`);
      merged = promoteArtifact(artifacts[0]);
    }
    state = transitionPhase(state, PipelinePhase.MERGED, undefined, now());

    stage = 'icon';
    logStage(5, TOTAL_STEPS, 'Icon');
    const iconOutcome = await buildIconContainer(config.icon_path, config, { runner });
    let icon: IconChoice;
    if (iconOutcome.status === 'ready') {
      icon = { kind: 'custom', iconSet: iconOutcome.iconSet };
      iconLabel = iconOutcome.iconSet.converter;
      state = transitionPhase(state, PipelinePhase.ICON_READY, undefined, now());
    } else {
      icon = { kind: 'default', path: config.default_icon_path };
      iconLabel = 'default';
      state = addWarning(state, 'ICON_UNAVAILABLE', 'icon', iconOutcome.reason);
      state = transitionPhase(state, PipelinePhase.ICON_SKIPPED, undefined, now());
    }

    stage = 'assemble';
    logStage(6, TOTAL_STEPS, `Package (${config.format})`);
    const assembly = await assemble(merged, icon, config, {
      runner,
      presentation: deps.presentation ?? new OsascriptPresentation(runner),
      toolCache: deps.toolCache ?? new ToolCache(config.tool_cache_dir, { runner }),
      sleep: deps.sleep,
    });
    for (const warning of assembly.warnings) {
      state = addWarning(state, warning.code, 'assemble', warning.message);
    }
    image = assembly.image;
    state = transitionPhase(state, PipelinePhase.ASSEMBLED, undefined, now());

    stage = 'verify';
    logStage(7, TOTAL_STEPS, 'Verify');
    await verifyImage(image);
    const inspection = await inspectBundle(merged.root, {
      runner,
      platform: config.platform,
      appName: config.app_name,
      crashReportDir: null,
      expectedArchitectures: merged.architectures.length > 1 ? merged.architectures : undefined,
    });
    if (inspection.issues.length > 0) {
      throw new VerificationError(`Bundle failed inspection: ${inspection.issues.join('; ')}`, inspection.issues);
    }
    state = transitionPhase(state, PipelinePhase.VERIFIED, undefined, now());

    await removeWorkDir(config);
    state = transitionPhase(state, PipelinePhase.DONE, undefined, now());
  } catch (error) {
    const failure = toFailure(error, stage);
    logError(`${failure.stage}: ${failure.message}`);
    state = failState(state, failure, now());
    image = null;
    await releaseResources(config);
  }

  return buildPipelineReport({
    state,
    architectures: config.architectures,
    image,
    icon: iconLabel,
    finishedAt: now(),
  });
}
