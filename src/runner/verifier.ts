/**
 * Verifier.
 *
 * Inspects a built or installed bundle without changing it: presence and
 * permissions of the executable, the architectures it carries, manifest
 * metadata and recent crash diagnostics. The interactive mode relaunches
 * the application for live debugging.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import micromatch from 'micromatch';
import type { PackageImage } from '../types/artifact.js';
import type { TargetPlatform } from '../types/config.js';
import { VerificationError } from '../types/errors.js';
import type { BundleMetadata, CrashReport, VerifierReport } from '../types/report.js';
import { describeFailure, succeeded, type CommandRunner } from '../lib/exec.js';
import { fileSize, isExecutableFile, listTree, pathExists } from '../lib/fs.js';
import { executableRelPath } from '../lib/paths.js';
import { readPlistStrings } from '../lib/plist.js';
import { inspectArchitectures } from './merger.js';

export interface InspectOptions {
  runner: CommandRunner;
  platform: TargetPlatform;
  /** Defaults to the bundle directory name without `.app` */
  appName?: string;
  /** Where crash diagnostics are written; null skips the scan */
  crashReportDir: string | null;
  lookbackHours?: number;
  /** Architectures the executable must carry */
  expectedArchitectures?: readonly string[];
  now?: Date;
}

/** Crash reports listed at most. */
export const MAX_CRASH_REPORTS = 5;

/** Output lines kept by the filtered relaunch. */
export const ERROR_LINE_PATTERN = /error|exception|traceback|failed/i;

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]{}()!+@\\]/g, '\\$&');
}

function appNameFromBundle(bundlePath: string): string {
  return basename(bundlePath).replace(/\.app$/, '');
}

async function readMetadata(bundlePath: string, platform: TargetPlatform): Promise<BundleMetadata | null> {
  if (platform === 'macos') {
    const plistPath = join(bundlePath, 'Contents', 'Info.plist');
    if (!(await pathExists(plistPath))) return null;
    const values = readPlistStrings(await readFile(plistPath, 'utf-8'));
    return {
      name: values.CFBundleName ?? null,
      version: values.CFBundleShortVersionString ?? null,
      identifier: values.CFBundleIdentifier ?? null,
      minimum_os: values.LSMinimumSystemVersion ?? null,
    };
  }

  const desktop = (await readdir(bundlePath)).filter((name) => name.endsWith('.desktop')).sort()[0];
  if (desktop === undefined) return null;
  const fields = new Map<string, string>();
  for (const line of (await readFile(join(bundlePath, desktop), 'utf-8')).split('\n')) {
    const separator = line.indexOf('=');
    if (separator > 0) {
      fields.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
  }
  return {
    name: fields.get('Name') ?? null,
    version: fields.get('X-AppImage-Version') ?? null,
    identifier: null,
    minimum_os: null,
  };
}

/**
 * Crash diagnostics for `appName` modified within the look-back window,
 * newest first.
 */
export async function findCrashReports(
  directory: string,
  appName: string,
  lookbackHours: number,
  now: Date = new Date()
): Promise<CrashReport[]> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch {
    return [];
  }

  const prefix = escapeGlob(appName);
  const matching = micromatch(names, [`${prefix}*.crash`, `${prefix}*.ips`]);
  const cutoff = now.getTime() - lookbackHours * 3600 * 1000;
  const reports: Array<{ path: string; mtime: number }> = [];

  for (const name of matching) {
    const path = join(directory, name);
    const stats = await stat(path);
    if (stats.isFile() && stats.mtimeMs >= cutoff) {
      reports.push({ path, mtime: stats.mtimeMs });
    }
  }

  return reports
    .sort((a, b) => b.mtime - a.mtime || a.path.localeCompare(b.path))
    .slice(0, MAX_CRASH_REPORTS)
    .map((report) => ({ path: report.path, modified_at: new Date(report.mtime).toISOString() }));
}

/**
 * Inspects a bundle. Never modifies it.
 */
export async function inspectBundle(bundlePath: string, options: InspectOptions): Promise<VerifierReport> {
  const appName = options.appName ?? appNameFromBundle(bundlePath);
  const executablePath = join(bundlePath, executableRelPath(appName, options.platform));
  const issues: string[] = [];

  const bundleExists = (await pathExists(bundlePath)) && (await stat(bundlePath)).isDirectory();
  const executablePresent = bundleExists && (await fileSize(executablePath)) > 0;
  const executablePermission = executablePresent && (await isExecutableFile(executablePath));

  if (!bundleExists) {
    issues.push(`Bundle not found at ${bundlePath}`);
  } else if (!executablePresent) {
    issues.push(`Executable missing at ${executablePath}`);
  } else if (!executablePermission) {
    issues.push(`Executable lacks execute permission; fix with: chmod +x '${executablePath}'`);
  }

  let architectures: string[] | null = null;
  if (executablePresent && options.platform === 'macos') {
    architectures = await inspectArchitectures(options.runner, executablePath);
  }
  if (options.expectedArchitectures && options.expectedArchitectures.length > 0) {
    if (architectures === null) {
      issues.push('Could not read the executable architectures');
    } else {
      const missing = options.expectedArchitectures.filter((arch) => !architectures?.includes(arch));
      if (missing.length > 0) {
        issues.push(`Executable lacks architectures: ${missing.join(', ')}`);
      }
    }
  }

  const metadata = bundleExists ? await readMetadata(bundlePath, options.platform) : null;
  if (bundleExists && options.platform === 'macos' && metadata === null) {
    issues.push('Contents/Info.plist is missing');
  }

  const crashReports =
    options.crashReportDir === null
      ? []
      : await findCrashReports(options.crashReportDir, appName, options.lookbackHours ?? 24, options.now);
  if (crashReports.length > 0) {
    issues.push(`${crashReports.length} recent crash report(s), latest ${crashReports[0].path}`);
  }

  return {
    bundle_path: bundlePath,
    bundle_exists: bundleExists,
    executable_path: executablePath,
    executable_present: executablePresent,
    executable_permission: executablePermission,
    architectures,
    metadata,
    crash_reports: crashReports,
    issues,
  };
}

/**
 * Checks that the distributable exists and is not empty.
 *
 * @throws {VerificationError}
 */
export async function verifyImage(image: PackageImage): Promise<void> {
  if ((await fileSize(image.path)) === 0) {
    throw new VerificationError(`Package ${image.path} is missing or empty`, [`missing or empty: ${image.path}`]);
  }
}

/** Human-readable lines for a report. */
export function formatVerifierReport(report: VerifierReport): string[] {
  const mark = (ok: boolean): string => (ok ? '[OK]   ' : '[FAIL] ');
  const lines = [
    `${mark(report.bundle_exists)} Bundle: ${report.bundle_path}`,
    `${mark(report.executable_present)} Executable: ${report.executable_path}`,
    `${mark(report.executable_permission)} Execute permission`,
  ];
  if (report.architectures !== null) {
    lines.push(`[INFO]  Architectures: ${report.architectures.join(', ')}`);
  }
  if (report.metadata) {
    lines.push(`[INFO]  Name: ${report.metadata.name ?? 'N/A'}`);
    lines.push(`[INFO]  Version: ${report.metadata.version ?? 'N/A'}`);
    lines.push(`[INFO]  Identifier: ${report.metadata.identifier ?? 'N/A'}`);
    if (report.metadata.minimum_os !== null) {
      lines.push(`[INFO]  Minimum OS: ${report.metadata.minimum_os}`);
    }
  }
  if (report.crash_reports.length === 0) {
    lines.push('[OK]    No recent crash reports');
  } else {
    lines.push(`[WARN]  Recent crash reports:`);
    for (const crash of report.crash_reports) {
      lines.push(`          ${crash.path} (${crash.modified_at})`);
    }
  }
  return lines;
}

export interface DiagnosticsOptions {
  runner: CommandRunner;
  /** Platform of the inspected bundle; picks the system log viewer */
  platform: TargetPlatform;
  prompt: (question: string) => Promise<string>;
  print: (line: string) => void;
  /** GUI toolkit module imported by the embedded runtime check */
  toolkitModule?: string;
}

export const DIAGNOSTIC_MENU = [
  '1) Launch with full output',
  '2) Launch showing errors only',
  '3) Check the embedded runtime',
  '4) Open the system log viewer',
  '5) Show the latest crash report',
  '6) Quit',
] as const;

const DEFAULT_TOOLKIT_MODULE = 'PyQt6';
const RUNTIME_PATH_SCRIPT = "import sys; print('\\n'.join(sys.path))";

/** Lines of `output` that look like errors. */
export function filterErrorLines(output: string): string[] {
  return output.split('\n').filter((line) => ERROR_LINE_PATTERN.test(line));
}

/** Import check for `module`, printing its version when it has one. */
export function toolkitImportScript(module: string): string {
  return `import ${module}; print('${module}', getattr(${module}, '__version__', None) or ${module}.__file__)`;
}

/**
 * First executable `python*` file inside the bundle, searched below
 * Contents/ on macOS and the bundle root elsewhere.
 */
export async function findEmbeddedInterpreter(bundlePath: string, platform: TargetPlatform): Promise<string | null> {
  const root = platform === 'macos' ? join(bundlePath, 'Contents') : bundlePath;
  if (!(await pathExists(root))) return null;

  for (const entry of await listTree(root)) {
    const name = basename(entry.path);
    if (entry.kind !== 'file' || !name.startsWith('python') || name.endsWith('.pyc')) continue;
    const candidate = join(root, entry.path);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

function printOutput(print: (line: string) => void, output: string): void {
  for (const line of output.split('\n')) {
    if (line.trim() !== '') print(line);
  }
}

async function checkEmbeddedRuntime(report: VerifierReport, options: DiagnosticsOptions): Promise<void> {
  const { runner, print } = options;
  const interpreter = await findEmbeddedInterpreter(report.bundle_path, options.platform);
  if (interpreter === null) {
    print(`No embedded interpreter found in ${report.bundle_path}`);
    return;
  }
  print(`Interpreter: ${interpreter}`);

  print('Module search path:');
  const paths = await runner.run(interpreter, ['-c', RUNTIME_PATH_SCRIPT], { timeoutMs: 30_000 });
  if (succeeded(paths)) {
    printOutput(print, paths.stdout);
  } else {
    print(`Could not read the module search path (${describeFailure(paths)})`);
  }

  const module = options.toolkitModule ?? DEFAULT_TOOLKIT_MODULE;
  print(`Importing ${module}:`);
  const toolkit = await runner.run(interpreter, ['-c', toolkitImportScript(module)], { timeoutMs: 30_000 });
  printOutput(print, `${toolkit.stdout}\n${toolkit.stderr}`);
  if (!succeeded(toolkit)) {
    print(`Import of ${module} failed (${describeFailure(toolkit)})`);
  }
}

async function openSystemLog(report: VerifierReport, options: DiagnosticsOptions): Promise<void> {
  const { runner, print } = options;
  const appName = appNameFromBundle(report.bundle_path);

  if (options.platform === 'macos') {
    const result = await runner.run('open', ['-a', 'Console'], { timeoutMs: 30_000 });
    if (!succeeded(result)) {
      print(`Could not open Console (${describeFailure(result)})`);
      return;
    }
    print(`In Console, search for '${appName}' or open Crash Reports.`);
    return;
  }

  const result = await runner.run('journalctl', ['--user', '--no-pager', '-n', '50'], { timeoutMs: 30_000 });
  if (!succeeded(result)) {
    print(`Could not read the user journal (${describeFailure(result)})`);
    return;
  }
  printOutput(print, result.stdout);
}

/**
 * Interactive debugging menu. Returns when the operator quits or input ends.
 */
export async function runInteractiveDiagnostics(report: VerifierReport, options: DiagnosticsOptions): Promise<void> {
  const { runner, prompt, print } = options;

  while (true) {
    print('');
    for (const line of DIAGNOSTIC_MENU) print(line);
    const choice = (await prompt('Choice [1-6]: ')).trim();

    switch (choice) {
      case '1':
      case '2': {
        if (!report.executable_present) {
          print(`Executable not available at ${report.executable_path}`);
          break;
        }
        if (choice === '1') {
          const result = await runner.run(report.executable_path, [], { inheritOutput: true });
          print(`Application exited (${describeFailure(result)})`);
        } else {
          const result = await runner.run(report.executable_path, []);
          const lines = filterErrorLines(`${result.stdout}\n${result.stderr}`);
          if (lines.length === 0) {
            print('No error lines in the output');
          }
          for (const line of lines) print(line);
          print(`Application exited (${describeFailure(result)})`);
        }
        break;
      }
      case '3':
        await checkEmbeddedRuntime(report, options);
        break;
      case '4':
        await openSystemLog(report, options);
        break;
      case '5': {
        const latest = report.crash_reports[0];
        if (!latest) {
          print('No recent crash reports');
          break;
        }
        print(`--- ${latest.path} ---`);
        for (const line of (await readFile(latest.path, 'utf-8')).split('\n')) print(line);
        break;
      }
      case '':
      case '6':
      case 'q':
        return;
      default:
        print(`Unknown option: ${choice}`);
    }
  }
}
