import { buildIconContainer } from '../runner/icons.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

/**
 * Renders the icon set into work_dir. A skipped icon is not an error.
 *
 * @throws {IconError}
 */
export async function iconCommand(options: StageCommandOptions): Promise<void> {
  const config = await loadStageConfig(options);
  await buildIconContainer(config.icon_path, config, { runner: createRunner() });
}
