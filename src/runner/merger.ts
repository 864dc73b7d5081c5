/**
 * UniversalMerger.
 *
 * Fuses per-architecture macOS bundles into one bundle whose primary
 * executable carries every input architecture. The first artifact's tree
 * is the template for everything except the executable.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Artifact, MergedArtifact } from '../types/artifact.js';
import type { Architecture, BuildConfig, ResourceCheckMode } from '../types/config.js';
import { MergeError } from '../types/errors.js';
import { describeFailure, succeeded, type CommandRunner } from '../lib/exec.js';
import { copyTree, hashFile, listTree, pathExists, removePath } from '../lib/fs.js';
import { logDebug, logInfo, logOk, logWarn, tail } from '../lib/log.js';
import { archRoot, executableRelPath, universalBundlePath } from '../lib/paths.js';
import { existingArtifact } from './builder.js';

export interface MergerDeps {
  runner: CommandRunner;
}

export interface ResourceMismatch {
  arch: Architecture;
  /** Paths relative to the bundle root */
  differing: string[];
}

export interface MergeOutcome {
  artifact: MergedArtifact;
  mismatches: ResourceMismatch[];
}

const NATIVE_LIBRARY = /\.(dylib|so)(\.\d+)*$/;

/**
 * Architectures in a binary as reported by `lipo -archs`.
 *
 * @returns Architecture names, or null if lipo is unavailable or fails
 */
export async function inspectArchitectures(runner: CommandRunner, executablePath: string): Promise<string[] | null> {
  const result = await runner.run('lipo', ['-archs', executablePath], { timeoutMs: 30_000 });
  if (!succeeded(result)) {
    logDebug(`lipo -archs ${executablePath}: ${describeFailure(result)}`);
    return null;
  }
  return result.stdout.split(/\s+/).filter((token) => token !== '');
}

/**
 * sha256 of every resource file in a bundle, keyed by relative path.
 *
 * Executables and native libraries are expected to differ between
 * architectures and are left out.
 */
export async function resourceDigests(root: string, executable: string): Promise<Map<string, string>> {
  const digests = new Map<string, string>();
  const executableKey = executable.split('\\').join('/');

  for (const entry of await listTree(root)) {
    if (entry.kind !== 'file' || entry.path === executableKey || NATIVE_LIBRARY.test(entry.path)) {
      continue;
    }
    const absolute = join(root, entry.path);
    const mode = (await stat(absolute)).mode;
    if ((mode & 0o111) !== 0) {
      continue;
    }
    digests.set(entry.path, await hashFile(absolute));
  }
  return digests;
}

/**
 * Compares the resources of every artifact against the template (the first).
 */
export async function compareResources(artifacts: readonly Artifact[]): Promise<ResourceMismatch[]> {
  const [template, ...others] = artifacts;
  const reference = await resourceDigests(template.root, template.executable);
  const mismatches: ResourceMismatch[] = [];

  for (const artifact of others) {
    const digests = await resourceDigests(artifact.root, artifact.executable);
    const differing = new Set<string>();
    for (const [path, digest] of reference) {
      if (digests.get(path) !== digest) differing.add(path);
    }
    for (const path of digests.keys()) {
      if (!reference.has(path)) differing.add(path);
    }
    if (differing.size > 0) {
      mismatches.push({ arch: artifact.arch, differing: [...differing].sort() });
    }
  }
  return mismatches;
}

export function describeMismatch(mismatch: ResourceMismatch, templateArch: Architecture): string {
  const shown = mismatch.differing.slice(0, 5).join(', ');
  const more = mismatch.differing.length > 5 ? `, and ${mismatch.differing.length - 5} more` : '';
  return `Resources of the ${mismatch.arch} build differ from ${templateArch} (${mismatch.differing.length} files: ${shown}${more})`;
}

function validateInputs(artifacts: readonly Artifact[]): void {
  if (artifacts.length < 2) {
    throw new MergeError(
      `Merging needs at least two architectures, got ${artifacts.length}`,
      'Use the single-architecture build directly, or configure both x86_64 and arm64.'
    );
  }
  const seen = new Set<Architecture>();
  for (const artifact of artifacts) {
    if (seen.has(artifact.arch)) {
      throw new MergeError(`Architecture ${artifact.arch} was given more than once`);
    }
    seen.add(artifact.arch);
    if (artifact.platform !== 'macos') {
      throw new MergeError(
        `Cannot merge ${artifact.arch} build: universal bundles need the macOS layout`,
        'Build a single architecture for this platform.'
      );
    }
  }
  const executable = artifacts[0].executable;
  if (artifacts.some((artifact) => artifact.executable !== executable)) {
    throw new MergeError('Artifacts disagree on the primary executable path');
  }
}

/**
 * Merges per-architecture bundles into the universal bundle.
 *
 * With `resource_check` set to `strict`, differing resources are fatal;
 * with `warn` they are returned as mismatches for the caller to record.
 *
 * @throws {MergeError} On invalid inputs, a failing lipo, or a result that
 *                      does not carry exactly the input architectures
 */
export async function mergeArtifacts(
  artifacts: readonly Artifact[],
  config: BuildConfig,
  deps: MergerDeps,
  mode: ResourceCheckMode = config.resource_check
): Promise<MergeOutcome> {
  validateInputs(artifacts);
  const template = artifacts[0];
  const expected = artifacts.map((artifact) => artifact.arch);

  let mismatches: ResourceMismatch[] = [];
  if (mode !== 'off') {
    mismatches = await compareResources(artifacts);
    for (const mismatch of mismatches) {
      if (mode === 'strict') {
        throw new MergeError(
          describeMismatch(mismatch, template.arch),
          'Make the builds produce identical resources, or set resource_check to "warn".'
        );
      }
      logWarn(describeMismatch(mismatch, template.arch));
    }
  }

  const root = universalBundlePath(config);
  const executablePath = join(root, template.executable);
  logInfo(`Merging ${expected.join(' + ')} using ${template.arch} as the template`);

  await removePath(root);
  await copyTree(template.root, root);

  const lipo = await deps.runner.run(
    'lipo',
    ['-create', ...artifacts.map((artifact) => join(artifact.root, artifact.executable)), '-output', executablePath],
    { timeoutMs: 120_000 }
  );
  if (!succeeded(lipo)) {
    throw new MergeError(`lipo -create failed (${describeFailure(lipo)}): ${tail(lipo.stderr, 3)}`);
  }

  const reported = await inspectArchitectures(deps.runner, executablePath);
  if (reported === null) {
    throw new MergeError(`Could not read the architectures of ${executablePath}`);
  }
  const missing = expected.filter((arch) => !reported.includes(arch));
  const extra = reported.filter((arch) => !expected.some((wanted) => wanted === arch));
  if (missing.length > 0 || extra.length > 0) {
    throw new MergeError(
      `Merged executable reports [${reported.join(', ')}], expected [${expected.join(', ')}]`
    );
  }

  for (const arch of expected) {
    await removePath(archRoot(config, arch));
  }

  logOk(`Universal executable carries ${reported.join(', ')}`);
  return {
    artifact: {
      architectures: expected,
      platform: template.platform,
      root,
      executable: template.executable,
      template_arch: template.arch,
    },
    mismatches,
  };
}

/**
 * Treats a single build as the final bundle. No files are moved.
 */
export function promoteArtifact(artifact: Artifact): MergedArtifact {
  return {
    architectures: [artifact.arch],
    platform: artifact.platform,
    root: artifact.root,
    executable: artifact.executable,
    template_arch: artifact.arch,
  };
}

/**
 * Final bundle left on disk by an earlier `merge` (several architectures)
 * or `build` (one architecture).
 *
 * @throws {MergeError} If the universal bundle is missing
 * @throws {CompileError} If the single-architecture build is missing
 */
export async function existingMergedArtifact(config: BuildConfig): Promise<MergedArtifact> {
  if (config.architectures.length === 1) {
    return promoteArtifact(await existingArtifact(config, config.architectures[0]));
  }
  const root = universalBundlePath(config);
  const executable = executableRelPath(config.app_name, config.platform);
  if (!(await pathExists(join(root, executable)))) {
    throw new MergeError(`No universal bundle found at ${root}`, 'Run the merge command first.');
  }
  return {
    architectures: [...config.architectures],
    platform: config.platform,
    root,
    executable,
    template_arch: config.architectures[0],
  };
}
