import { logOk } from '../lib/log.js';
import { cleanWorkspace } from '../lib/paths.js';
import { runBounded } from '../lib/pool.js';
import { preflightError, runPreflight } from '../lib/preflight.js';
import { buildArchitecture } from '../runner/builder.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

/**
 * Cleans the workspace and builds every selected architecture.
 *
 * @throws {PrereqMissingError} If a required tool or input is absent
 * @throws {CompileError} If any architecture fails to build
 */
export async function buildCommand(options: StageCommandOptions): Promise<void> {
  const config = await loadStageConfig(options);
  const runner = createRunner();

  const preflight = await runPreflight(config, runner);
  if (!preflight.ok) {
    throw preflightError(preflight);
  }

  await cleanWorkspace(config);
  const artifacts = await runBounded(config.architectures, config.parallel_builds, (arch) =>
    buildArchitecture(config, arch, { runner })
  );
  for (const artifact of artifacts) {
    logOk(`${artifact.arch}: ${artifact.root}`);
  }
}
