/**
 * ArchitectureBuilder.
 *
 * Runs the external bundler once for one architecture and checks that the
 * bundle it should have produced is really there. Each architecture gets
 * its own dist and scratch directories, so builds for different
 * architectures can run side by side.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Artifact } from '../types/artifact.js';
import type { Architecture, BuildConfig } from '../types/config.js';
import { CompileError } from '../types/errors.js';
import { describeFailure, renderCommand, succeeded, type CommandRunner } from '../lib/exec.js';
import { pathExists } from '../lib/fs.js';
import { logDebug, logInfo, logOk, tail } from '../lib/log.js';
import {
  archBundlePath,
  archDistDir,
  archWorkDir,
  executableRelPath,
} from '../lib/paths.js';
import { renderPlist, setPlistStrings } from '../lib/plist.js';

export interface BuilderDeps {
  runner: CommandRunner;
}

/** Values available to bundler argument placeholders. */
export function bundlerPlaceholders(config: BuildConfig, arch: Architecture): Record<string, string> {
  return {
    arch,
    entry: config.entry_point,
    source: config.source_dir,
    name: config.app_name,
    dist: archDistDir(config, arch),
    work: archWorkDir(config, arch),
    identifier: config.bundle_identifier,
    version: config.version,
    min_os: config.minimum_os_version,
  };
}

/**
 * Expands `{placeholder}` tokens in bundler arguments.
 *
 * Unknown placeholders are left as written.
 */
export function expandBundlerArgs(args: readonly string[], values: Readonly<Record<string, string>>): string[] {
  return args.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (match, name: string) => (Object.hasOwn(values, name) ? values[name] : match))
  );
}

/** Manifest string values stamped into every macOS bundle. */
export function manifestValues(config: BuildConfig): Record<string, string> {
  return {
    CFBundleName: config.app_name,
    CFBundleDisplayName: config.app_name,
    CFBundleExecutable: config.app_name,
    CFBundleIdentifier: config.bundle_identifier,
    CFBundleShortVersionString: config.version,
    CFBundleVersion: config.version,
    LSMinimumSystemVersion: config.minimum_os_version,
  };
}

/**
 * Writes name, identifier, version and minimum OS into Contents/Info.plist,
 * keeping every other entry the bundler wrote.
 */
export async function stampInfoPlist(bundleRoot: string, values: Readonly<Record<string, string>>): Promise<void> {
  const plistPath = join(bundleRoot, 'Contents', 'Info.plist');
  let content: string;
  if (await pathExists(plistPath)) {
    content = setPlistStrings(await readFile(plistPath, 'utf-8'), values);
  } else {
    content = renderPlist({ CFBundlePackageType: 'APPL', ...values });
  }
  await mkdir(dirname(plistPath), { recursive: true });
  await writeFile(plistPath, content, 'utf-8');
}

/**
 * Compiles the application for one architecture. Callers clean the
 * workspace first; earlier output in the architecture's directories is
 * left in place.
 *
 * @throws {CompileError} If the bundler fails, or exits 0 without leaving
 *                        the bundle and its executable behind
 */
export async function buildArchitecture(
  config: BuildConfig,
  arch: Architecture,
  deps: BuilderDeps
): Promise<Artifact> {
  const root = archBundlePath(config, arch);
  const executable = executableRelPath(config.app_name, config.platform);
  const args = expandBundlerArgs(config.bundler.args, bundlerPlaceholders(config, arch));

  await mkdir(archDistDir(config, arch), { recursive: true });
  await mkdir(archWorkDir(config, arch), { recursive: true });

  const env: Record<string, string> = { TARGET_ARCH: arch };
  if (config.platform === 'macos') {
    env.MACOSX_DEPLOYMENT_TARGET = config.minimum_os_version;
  }

  logInfo(`Building ${config.app_name} for ${arch}`);
  logDebug(renderCommand(config.bundler.command, args));

  const result = await deps.runner.run(config.bundler.command, args, {
    cwd: config.project_dir,
    env,
    timeoutMs: config.bundler.timeout_seconds * 1000,
  });

  if (!succeeded(result)) {
    throw new CompileError(
      `Bundler failed for ${arch} (${describeFailure(result)})`,
      arch,
      tail(result.stderr || result.stdout)
    );
  }

  // Some bundlers exit 0 after a partial failure; trust the output tree.
  if (!(await pathExists(root))) {
    throw new CompileError(`Bundler reported success for ${arch} but ${root} was not created`, arch, tail(result.stderr));
  }
  if (!(await pathExists(join(root, executable)))) {
    throw new CompileError(`Bundle for ${arch} has no executable at ${executable}`, arch, tail(result.stderr));
  }

  if (config.platform === 'macos') {
    await stampInfoPlist(root, manifestValues(config));
  }

  logOk(`Built ${arch} in ${(result.duration_ms / 1000).toFixed(1)}s`);
  return { arch, platform: config.platform, root, executable };
}

/**
 * Artifact record for a bundle already on disk, for stage commands that
 * run after `build`.
 *
 * @throws {CompileError} If the bundle or its executable is missing
 */
export async function existingArtifact(config: BuildConfig, arch: Architecture): Promise<Artifact> {
  const root = archBundlePath(config, arch);
  const executable = executableRelPath(config.app_name, config.platform);
  if (!(await pathExists(join(root, executable)))) {
    throw new CompileError(`No ${arch} build found at ${root}; run the build command first`, arch);
  }
  return { arch, platform: config.platform, root, executable };
}
