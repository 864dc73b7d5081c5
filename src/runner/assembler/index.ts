/**
 * BundleAssembler: turns the final bundle into the configured distributable.
 */

import type { IconChoice, MergedArtifact } from '../../types/artifact.js';
import type { BuildConfig } from '../../types/config.js';
import { assembleAppImage } from './appimage.js';
import { assembleArchive } from './archive.js';
import { assembleDiskImage } from './dmg.js';
import type { AssemblerDeps, AssemblyOutcome } from './types.js';

export type { AssemblerDeps, AssemblyOutcome, AssemblyWarning } from './types.js';
export { temporaryImagePath } from './dmg.js';

/**
 * Packages `artifact` in `config.format`.
 *
 * @throws {AssemblyError} If the distributable cannot be produced
 */
export function assemble(
  artifact: MergedArtifact,
  icon: IconChoice,
  config: BuildConfig,
  deps: AssemblerDeps
): Promise<AssemblyOutcome> {
  switch (config.format) {
    case 'dmg':
      return assembleDiskImage(artifact, icon, config, deps);
    case 'appimage':
      return assembleAppImage(artifact, icon, config, deps);
    case 'archive':
      return assembleArchive(artifact, icon, config);
  }
}
