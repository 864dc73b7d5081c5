/**
 * Preflight checks run before any mutation.
 *
 * Required tools and inputs that are absent block the run with one
 * remediation line each. Optional tools only degrade it: a missing icon
 * converter means the default icon is kept, a missing osascript means the
 * disk image keeps Finder's default layout.
 */

import type { BuildConfig } from '../types/config.js';
import { PrereqMissingError } from '../types/errors.js';
import type { PreflightResult, ToolCheck, ToolRequirement } from '../types/preflight.js';
import type { CommandRunner } from './exec.js';
import { pathExists } from './fs.js';

const XCODE_HINT = 'Install the Xcode command line tools: xcode-select --install';
const MACOS_HINT = 'Ships with macOS; check that /usr/bin is on PATH';

/** Icon converters, in the order the icon pipeline tries them. */
export const ICON_CONVERTER_COMMANDS = ['rsvg-convert', 'sips', 'magick', 'qlmanage'] as const;

/**
 * Lists the external tools a run with this configuration uses.
 */
export function toolRequirements(config: BuildConfig): ToolRequirement[] {
  const requirements: ToolRequirement[] = [
    {
      command: config.bundler.command,
      role: 'bundler',
      required: true,
      hint:
        config.bundler.command === 'python3'
          ? 'Install Python 3 and PyInstaller: pip3 install pyinstaller'
          : `Install ${config.bundler.command} or set bundler.command in bundlesmith.json`,
    },
  ];

  if (config.platform === 'macos') {
    requirements.push({
      command: 'lipo',
      role: 'merge',
      required: config.architectures.length > 1,
      hint: XCODE_HINT,
    });
  }

  if (config.format === 'dmg') {
    requirements.push({ command: 'hdiutil', role: 'disk-image', required: true, hint: MACOS_HINT });
    if (config.presentation.enabled) {
      requirements.push({ command: 'osascript', role: 'presentation', required: false, hint: MACOS_HINT });
    }
  }

  if (config.icon_path !== null) {
    requirements.push(
      { command: 'rsvg-convert', role: 'icon-converter', required: false, hint: 'brew install librsvg, or apt install librsvg2-bin' },
      { command: 'sips', role: 'icon-converter', required: false, hint: MACOS_HINT },
      { command: 'magick', role: 'icon-converter', required: false, hint: 'brew install imagemagick, or apt install imagemagick' },
      { command: 'qlmanage', role: 'icon-converter', required: false, hint: MACOS_HINT }
    );
    if (config.platform === 'macos') {
      requirements.push({ command: 'iconutil', role: 'icon-container', required: false, hint: XCODE_HINT });
    }
  }

  return requirements;
}

/**
 * Runs all preflight checks.
 *
 * @example
 * ```typescript
 * const result = await runPreflight(config, new SpawnRunner());
 * if (!result.ok) {
 *   throw preflightError(result);
 * }
 * ```
 */
export async function runPreflight(config: BuildConfig, runner: CommandRunner): Promise<PreflightResult> {
  const checks: ToolCheck[] = [];
  const missing: string[] = [];
  const remediation: string[] = [];
  const warnings: string[] = [];

  for (const requirement of toolRequirements(config)) {
    const path = await runner.which(requirement.command);
    checks.push({ ...requirement, path });
    if (path === null && requirement.required) {
      missing.push(requirement.command);
      remediation.push(`${requirement.command}: ${requirement.hint}`);
    }
  }

  if (!(await pathExists(config.entry_point))) {
    missing.push(config.entry_point);
    remediation.push(`${config.entry_point}: entry_point does not exist; fix the path in bundlesmith.json`);
  }
  if (!(await pathExists(config.source_dir))) {
    missing.push(config.source_dir);
    remediation.push(`${config.source_dir}: source_dir does not exist; fix the path in bundlesmith.json`);
  }

  const found = (command: string): boolean => checks.some((check) => check.command === command && check.path !== null);

  if (config.icon_path !== null) {
    if (!(await pathExists(config.icon_path))) {
      warnings.push(`Master icon ${config.icon_path} not found; the default icon will be used`);
    } else if (!ICON_CONVERTER_COMMANDS.some(found)) {
      warnings.push(`No icon converter found (${ICON_CONVERTER_COMMANDS.join(', ')}); the default icon will be used`);
    } else if (config.platform === 'macos' && !found('iconutil')) {
      warnings.push('iconutil not found; the default icon will be used');
    }
  }

  if (config.format === 'dmg' && config.presentation.enabled && !found('osascript')) {
    warnings.push('osascript not found; the disk image will keep the default Finder layout');
  }

  if (config.platform === 'macos' && config.architectures.length === 1 && !found('lipo')) {
    warnings.push('lipo not found; the executable architecture will not be checked');
  }

  return {
    ok: missing.length === 0,
    checks,
    missing,
    remediation,
    warnings,
  };
}

/** PrereqMissingError describing a failed preflight. */
export function preflightError(result: PreflightResult): PrereqMissingError {
  return new PrereqMissingError(
    `Missing prerequisites: ${result.missing.join(', ')}`,
    result.missing,
    result.remediation.join('\n')
  );
}
