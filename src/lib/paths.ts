/**
 * Well-known locations inside work_dir and dist_dir.
 *
 * Every stage derives its paths from BuildConfig through these helpers so
 * the driver, the stage commands and the tests agree on the layout:
 *
 *   <work>/<arch>/dist/<bundle>    per-architecture bundler output
 *   <work>/<arch>/build            bundler scratch space
 *   <work>/universal/<bundle>      merged bundle
 *   <work>/icons/                  icon set and container
 *   <work>/staging/                assembler staging area
 *   <dist>/<image>                 the distributable
 */

import { join } from 'node:path';
import type { Architecture, BuildConfig, PackageFormat, TargetPlatform } from '../types/config.js';
import { removePath, resetDirectory } from './fs.js';
import { logDebug } from './log.js';

type PathConfig = Pick<BuildConfig, 'app_name' | 'platform' | 'work_dir' | 'dist_dir'>;

/** `<AppName>.app` on macOS, `<AppName>` elsewhere. */
export function bundleDirName(appName: string, platform: TargetPlatform): string {
  return platform === 'macos' ? `${appName}.app` : appName;
}

/** Primary executable relative to the bundle root. */
export function executableRelPath(appName: string, platform: TargetPlatform): string {
  return platform === 'macos' ? join('Contents', 'MacOS', appName) : appName;
}

/** Lower-case, dash separated form of the app name, for Linux desktop ids. */
export function appSlug(appName: string): string {
  return appName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function archRoot(config: PathConfig, arch: Architecture): string {
  return join(config.work_dir, arch);
}

export function archDistDir(config: PathConfig, arch: Architecture): string {
  return join(archRoot(config, arch), 'dist');
}

export function archWorkDir(config: PathConfig, arch: Architecture): string {
  return join(archRoot(config, arch), 'build');
}

/** Where the bundler is expected to leave the bundle for `arch`. */
export function archBundlePath(config: PathConfig, arch: Architecture): string {
  return join(archDistDir(config, arch), bundleDirName(config.app_name, config.platform));
}

export function universalBundlePath(config: PathConfig): string {
  return join(config.work_dir, 'universal', bundleDirName(config.app_name, config.platform));
}

export function iconWorkDir(config: PathConfig): string {
  return join(config.work_dir, 'icons');
}

export function stagingDir(config: PathConfig): string {
  return join(config.work_dir, 'staging');
}

export function imageExtension(format: PackageFormat): string {
  switch (format) {
    case 'dmg':
      return 'dmg';
    case 'appimage':
      return 'AppImage';
    case 'archive':
      return 'tar.gz';
  }
}

/** `Universal` for two or more architectures, the architecture itself otherwise. */
export function architectureLabel(architectures: readonly Architecture[]): string {
  return architectures.length >= 2 ? 'Universal' : architectures[0] ?? 'unknown';
}

/**
 * File name of the distributable: `<AppName>-<Version>-<Label>.<ext>`,
 * with spaces in the app name replaced by `-`.
 */
export function imageFileName(
  appName: string,
  version: string,
  architectures: readonly Architecture[],
  format: PackageFormat
): string {
  const name = appName.trim().replace(/\s+/g, '-');
  return `${name}-${version}-${architectureLabel(architectures)}.${imageExtension(format)}`;
}

export function imagePath(config: Pick<BuildConfig, 'app_name' | 'version' | 'architectures' | 'format' | 'dist_dir'>): string {
  return join(
    config.dist_dir,
    imageFileName(config.app_name, config.version, config.architectures, config.format)
  );
}

/**
 * Removes every prior output: work_dir and dist_dir are recreated empty.
 *
 * Runs once per pipeline invocation, before the first build.
 */
export async function cleanWorkspace(config: PathConfig): Promise<void> {
  logDebug(`Cleaning ${config.work_dir} and ${config.dist_dir}`);
  await resetDirectory(config.work_dir);
  await resetDirectory(config.dist_dir);
}

/** Removes the intermediate tree under work_dir after a successful run. */
export async function removeWorkDir(config: PathConfig): Promise<void> {
  await removePath(config.work_dir);
}
