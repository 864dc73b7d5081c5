/**
 * Staging area shared by every package format.
 *
 * The bundle is copied into `<work>/staging`, the chosen icon is applied
 * to the copy, and installable formats get a link to the install location.
 */

import { copyFile, mkdir, symlink } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { IconChoice, MergedArtifact } from '../../types/artifact.js';
import type { BuildConfig } from '../../types/config.js';
import { AssemblyError } from '../../types/errors.js';
import { copyTree, pathExists, resetDirectory } from '../../lib/fs.js';
import { logDebug } from '../../lib/log.js';
import { stagingDir } from '../../lib/paths.js';
import { stampInfoPlist } from '../builder.js';

export const MACOS_ICON_FILE = 'AppIcon.icns';
export const LINUX_ICON_FILE = 'icon.png';
/** Pixel size of the PNG used as the Linux application icon */
export const LINUX_ICON_PIXELS = 256;

export interface StagedBundle {
  /** The staging directory */
  dir: string;
  /** Bundle directory inside the staging directory */
  bundle_path: string;
  bundle_name: string;
  /** Name of the install-location link, when one was created */
  install_link: string | null;
}

export interface StageOptions {
  installLink: boolean;
}

/**
 * The icon file to place into the bundle, or null to keep what the
 * bundler produced.
 */
export function iconSourceFor(icon: IconChoice, config: BuildConfig): string | null {
  if (icon.kind === 'default') {
    return icon.path;
  }
  if (config.platform === 'macos') {
    return icon.iconSet.container;
  }
  const entry = icon.iconSet.entries.find((candidate) => candidate.pixels === LINUX_ICON_PIXELS && candidate.scale === 1);
  return entry ? entry.file : null;
}

/**
 * Copies `source` into the bundle as its icon.
 *
 * On macOS the icon must be an `.icns` container and is registered in
 * Info.plist; on Linux it is stored as icon.png beside the executable.
 */
export async function applyIcon(bundlePath: string, source: string, config: BuildConfig): Promise<void> {
  if (!(await pathExists(source))) {
    throw new AssemblyError(`Icon ${source} does not exist`, 'Check the icon and default_icon paths in bundlesmith.json.');
  }

  if (config.platform === 'macos') {
    if (extname(source).toLowerCase() !== '.icns') {
      throw new AssemblyError(
        `Icon ${basename(source)} is not an .icns container`,
        'Point default_icon at an .icns file, or provide a master icon the icon stage can convert.'
      );
    }
    const resources = join(bundlePath, 'Contents', 'Resources');
    await mkdir(resources, { recursive: true });
    await copyFile(source, join(resources, MACOS_ICON_FILE));
    await stampInfoPlist(bundlePath, { CFBundleIconFile: 'AppIcon' });
    return;
  }

  await copyFile(source, join(bundlePath, LINUX_ICON_FILE));
}

/**
 * Recreates the staging area from the bundle.
 */
export async function stageBundle(
  artifact: MergedArtifact,
  icon: IconChoice,
  config: BuildConfig,
  options: StageOptions
): Promise<StagedBundle> {
  const dir = stagingDir(config);
  const bundleName = basename(artifact.root);
  const bundlePath = join(dir, bundleName);

  await resetDirectory(dir);
  await copyTree(artifact.root, bundlePath);

  const iconSource = iconSourceFor(icon, config);
  if (iconSource !== null) {
    await applyIcon(bundlePath, iconSource, config);
  } else {
    logDebug('Keeping the bundler icon');
  }

  let installLink: string | null = null;
  if (options.installLink) {
    installLink = basename(config.install_dir);
    await symlink(config.install_dir, join(dir, installLink));
  }

  return { dir, bundle_path: bundlePath, bundle_name: bundleName, install_link: installLink };
}
