import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { findConfigFile } from '../lib/config.js';
import { bundleDirName } from '../lib/paths.js';
import type { TargetPlatform } from '../types/config.js';
import type { VerifierReport } from '../types/report.js';
import { formatVerifierReport, inspectBundle } from '../runner/verifier.js';
import { createRunner, loadStageConfig, type StageCommandOptions } from './context.js';

export interface VerifyCommandOptions extends StageCommandOptions {
  json?: boolean;
}

export interface InspectionTarget {
  bundlePath: string;
  platform: TargetPlatform;
  appName?: string;
  crashReportDir: string | null;
  lookbackHours: number;
}

/**
 * Bundle to inspect: the explicit path, or the installed bundle named by
 * the configuration. Without a configuration file the host platform and
 * its usual crash report location are assumed.
 */
export async function resolveInspectionTarget(
  path: string | undefined,
  options: StageCommandOptions
): Promise<InspectionTarget> {
  const hasConfig = options.config !== undefined || (await findConfigFile()) !== null;

  if (!hasConfig && path !== undefined) {
    const platform: TargetPlatform = process.platform === 'darwin' ? 'macos' : 'linux';
    return {
      bundlePath: resolve(path),
      platform,
      crashReportDir: platform === 'macos' ? join(homedir(), 'Library', 'Logs', 'DiagnosticReports') : null,
      lookbackHours: 24,
    };
  }

  const config = await loadStageConfig(options);
  return {
    bundlePath: path !== undefined ? resolve(path) : join(config.install_dir, bundleDirName(config.app_name, config.platform)),
    platform: config.platform,
    appName: config.app_name,
    crashReportDir: config.crash_report_dir,
    lookbackHours: config.crash_lookback_hours,
  };
}

export async function inspectTarget(target: InspectionTarget): Promise<VerifierReport> {
  return inspectBundle(target.bundlePath, {
    runner: createRunner(),
    platform: target.platform,
    appName: target.appName,
    crashReportDir: target.crashReportDir,
    lookbackHours: target.lookbackHours,
  });
}

/**
 * Inspects an installed or built bundle.
 *
 * @returns 0 when the bundle has no issues, 1 otherwise
 */
export async function verifyCommand(path: string | undefined, options: VerifyCommandOptions): Promise<number> {
  const report = await inspectTarget(await resolveInspectionTarget(path, options));

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatVerifierReport(report)) {
      console.log(line);
    }
    console.log('\n--- Summary ---');
    if (report.issues.length === 0) {
      console.log('No issues found.');
    } else {
      console.log(`Found ${report.issues.length} issue(s):\n`);
      for (const issue of report.issues) {
        console.log(`  - ${issue}`);
      }
    }
  }
  return report.issues.length === 0 ? 0 : 1;
}
