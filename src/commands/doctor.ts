import { runPreflight } from '../lib/preflight.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

export interface DoctorCommandOptions extends StageCommandOptions {
  json?: boolean;
}

/**
 * Reports which tools and inputs are available, without changing anything.
 *
 * @returns 0 when every prerequisite is present, 1 otherwise
 */
export async function doctorCommand(options: DoctorCommandOptions): Promise<number> {
  const config = await loadStageConfig(options);
  const result = await runPreflight(config, createRunner());

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result.ok ? 0 : 1;
  }

  console.log(`bundlesmith doctor: ${config.platform}, ${config.format}, ${config.architectures.join(', ')}\n`);
  for (const check of result.checks) {
    if (check.path !== null) {
      console.log(`[OK]    ${check.command} (${check.path})`);
    } else if (check.required) {
      console.log(`[FAIL]  ${check.command} not found`);
    } else {
      console.log(`[WARN]  ${check.command} not found (${check.role})`);
    }
  }

  for (const warning of result.warnings) {
    console.log(`[WARN]  ${warning}`);
  }

  console.log('\n--- Summary ---');
  if (result.ok) {
    console.log('All prerequisites found.');
    return 0;
  }
  console.log(`Missing ${result.missing.length} prerequisite(s):\n`);
  for (const line of result.remediation) {
    console.log(`  - ${line}`);
  }
  return 1;
}
