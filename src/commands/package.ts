import { logWarn } from '../lib/log.js';
import { OsascriptPresentation } from '../lib/presentation.js';
import { ToolCache } from '../lib/tool_cache.js';
import { assemble } from '../runner/assembler/index.js';
import { existingIconChoice } from '../runner/icons.js';
import { existingMergedArtifact } from '../runner/merger.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

/**
 * Assembles the distributable from the bundle and icon set that earlier
 * stage commands left in work_dir.
 *
 * @throws {PipelineError} If the bundle is missing or assembly fails
 */
export async function packageCommand(options: StageCommandOptions): Promise<void> {
  const config = await loadStageConfig(options);
  const runner = createRunner();

  const artifact = await existingMergedArtifact(config);
  const icon = await existingIconChoice(config);
  const outcome = await assemble(artifact, icon, config, {
    runner,
    presentation: new OsascriptPresentation(runner),
    toolCache: new ToolCache(config.tool_cache_dir, { runner }),
  });
  for (const warning of outcome.warnings) {
    logWarn(`${warning.code}: ${warning.message}`);
  }
}
