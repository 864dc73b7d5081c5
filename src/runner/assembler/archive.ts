/**
 * Portable `.tar.gz` assembly.
 *
 * Entries are written in sorted order with portable headers and a fixed
 * modification time, so identical staging trees give byte-identical
 * archives.
 */

import { mkdir } from 'node:fs/promises';
import * as tar from 'tar';
import type { IconChoice, MergedArtifact } from '../../types/artifact.js';
import type { BuildConfig } from '../../types/config.js';
import { AssemblyError } from '../../types/errors.js';
import { listTree, removePath } from '../../lib/fs.js';
import { logInfo } from '../../lib/log.js';
import { imagePath } from '../../lib/paths.js';
import { finalizeImage } from './finalize.js';
import { stageBundle } from './staging.js';
import type { AssemblyOutcome } from './types.js';

/**
 * Writes a reproducible gzip'd tarball of everything below `sourceDir`.
 *
 * @param epochSeconds - Modification time stamped on every entry
 */
export async function writeReproducibleArchive(
  sourceDir: string,
  outputPath: string,
  epochSeconds: number
): Promise<void> {
  const entries = (await listTree(sourceDir)).map((entry) => entry.path);
  if (entries.length === 0) {
    throw new AssemblyError(`Nothing to archive in ${sourceDir}`);
  }

  await tar.c(
    {
      gzip: true,
      file: outputPath,
      cwd: sourceDir,
      portable: true,
      noDirRecurse: true,
      mtime: new Date(epochSeconds * 1000),
    },
    entries
  );
}

export async function assembleArchive(
  artifact: MergedArtifact,
  icon: IconChoice,
  config: BuildConfig
): Promise<AssemblyOutcome> {
  const staged = await stageBundle(artifact, icon, config, { installLink: false });
  const finalPath = imagePath(config);
  await removePath(finalPath);
  await mkdir(config.dist_dir, { recursive: true });

  logInfo(`Archiving ${staged.bundle_name}`);
  try {
    await writeReproducibleArchive(staged.dir, finalPath, config.source_date_epoch);
  } catch (error) {
    if (error instanceof AssemblyError) throw error;
    throw new AssemblyError(
      `Could not write ${finalPath}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      error instanceof Error ? error : undefined
    );
  }

  return { image: await finalizeImage(config, finalPath), warnings: [] };
}
