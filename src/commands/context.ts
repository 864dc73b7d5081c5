/**
 * Shared plumbing for the CLI commands.
 */

import { ConfigError, loadConfig } from '../lib/config.js';
import { SpawnRunner } from '../lib/exec.js';
import type { BuildConfig, PackageFormat } from '../types/config.js';
import type { PipelineError } from '../types/errors.js';

export interface StageCommandOptions {
  /** Path to bundlesmith.json; searched upward from cwd when absent */
  config?: string;
  /** native, universal, or a comma-separated list */
  arch?: string;
  format?: string;
}

const FORMATS: readonly PackageFormat[] = ['dmg', 'appimage', 'archive'];

export function parseFormat(value?: string): PackageFormat | undefined {
  if (value === undefined) return undefined;
  const format = FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new ConfigError(`Invalid format: ${value}. Must be one of ${FORMATS.join(', ')}.`);
  }
  return format;
}

export function loadStageConfig(options: StageCommandOptions): Promise<BuildConfig> {
  return loadConfig(options.config, { arch: options.arch, format: parseFormat(options.format) });
}

export function createRunner(): SpawnRunner {
  return new SpawnRunner();
}

/** Prints a stage failure with its remediation. */
export function printPipelineError(error: PipelineError): void {
  console.error(`[FAIL]  ${error.stage}: ${error.code}`);
  console.error(`        ${error.message}`);
  for (const hint of error.remediation.split('\n')) {
    console.error(`        -> ${hint}`);
  }
}
