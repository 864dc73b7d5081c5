/**
 * Post-condition shared by every package format.
 */

import type { PackageImage } from '../../types/artifact.js';
import type { BuildConfig } from '../../types/config.js';
import { AssemblyError } from '../../types/errors.js';
import { fileSize } from '../../lib/fs.js';
import { logOk } from '../../lib/log.js';
import { architectureLabel } from '../../lib/paths.js';

/**
 * Describes the finished distributable.
 *
 * @throws {AssemblyError} If the file is absent or empty
 */
export async function finalizeImage(
  config: Pick<BuildConfig, 'format' | 'architectures'>,
  path: string
): Promise<PackageImage> {
  const size = await fileSize(path);
  if (size === 0) {
    throw new AssemblyError(`Package ${path} is missing or empty`);
  }
  logOk(`Package ready: ${path} (${(size / (1024 * 1024)).toFixed(1)} MB)`);
  return {
    path,
    format: config.format,
    label: architectureLabel(config.architectures),
    size_bytes: size,
  };
}
