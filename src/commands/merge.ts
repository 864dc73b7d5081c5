import type { Artifact } from '../types/artifact.js';
import { logInfo } from '../lib/log.js';
import { existingArtifact } from '../runner/builder.js';
import { mergeArtifacts } from '../runner/merger.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

/**
 * Merges the per-architecture builds left by `build`.
 *
 * @throws {MergeError}
 */
export async function mergeCommand(options: StageCommandOptions): Promise<void> {
  const config = await loadStageConfig(options);
  if (config.architectures.length === 1) {
    logInfo(`Single architecture (${config.architectures[0]}); nothing to merge`);
    return;
  }

  const artifacts: Artifact[] = [];
  for (const arch of config.architectures) {
    artifacts.push(await existingArtifact(config, arch));
  }
  await mergeArtifacts(artifacts, config, { runner: createRunner() });
}
