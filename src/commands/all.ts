import { resolve } from 'node:path';
import { formatPipelineReport, writePipelineReport } from '../lib/report.js';
import { runPipeline } from '../runner/pipeline.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

export interface AllCommandOptions extends StageCommandOptions {
  /** Write the run report as JSON to this path */
  report?: string;
  json?: boolean;
}

/**
 * Runs the full pipeline.
 *
 * @returns Process exit code
 */
export async function allCommand(options: AllCommandOptions): Promise<number> {
  const config = await loadStageConfig(options);
  console.log(
    `bundlesmith: ${config.app_name} ${config.version} (${config.architectures.join(', ')} -> ${config.format})`
  );

  const report = await runPipeline(config, { runner: createRunner() });

  if (options.report) {
    const reportPath = resolve(options.report);
    await writePipelineReport(reportPath, report);
    console.log(`Report written to ${reportPath}`);
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log('\n--- Summary ---');
    for (const line of formatPipelineReport(report)) {
      console.log(line);
    }
  }
  return report.ok ? 0 : 1;
}
