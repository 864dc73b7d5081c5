/**
 * Configuration loading and validation.
 *
 * Resolution order is defaults ← bundlesmith.json ← environment ← CLI
 * overrides. The result is deeply frozen and passed to every stage.
 */

import { access } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { loadSchema, validateWithSchema } from './schema.js';
import type {
  Architecture,
  BuildConfig,
  BundleDescriptor,
  BundlerSettings,
  ImageSettings,
  PackageFormat,
  PresentationSettings,
  TargetPlatform,
  ToolSpec,
} from '../types/config.js';

/** Default configuration file name */
export const CONFIG_FILE_NAME = 'bundlesmith.json';

const SCHEMA_URL = new URL('../../schemas/bundle.schema.json', import.meta.url);

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_BUNDLER: BundlerSettings = {
  command: 'python3',
  args: [
    '-m',
    'PyInstaller',
    '--clean',
    '--noconfirm',
    '--windowed',
    '--name',
    '{name}',
    '--distpath',
    '{dist}',
    '--workpath',
    '{work}',
    '--target-architecture',
    '{arch}',
    '--osx-bundle-identifier',
    '{identifier}',
    '{entry}',
  ],
  timeout_seconds: 1800,
};

export const DEFAULT_APPIMAGETOOL: ToolSpec = {
  version: 'continuous',
  url: 'https://github.com/AppImage/appimagetool/releases/download/continuous/appimagetool-x86_64.AppImage',
  smoke_args: ['--appimage-extract-and-run', '--version'],
};

export const DEFAULT_PRESENTATION: PresentationSettings = {
  enabled: true,
  script_file: null,
  background_image: null,
  window_bounds: [400, 100, 900, 430],
  icon_size: 100,
  app_position: [125, 150],
  install_link_position: [375, 150],
  timeout_seconds: 60,
};

export const DEFAULT_IMAGE: ImageSettings = {
  size_margin_mb: 50,
  mount_timeout_seconds: 30,
  mount_poll_interval_ms: 250,
  volume_root: '/Volumes',
};

const ARCH_ALIASES: Readonly<Record<string, Architecture>> = {
  x86_64: 'x86_64',
  x64: 'x86_64',
  amd64: 'x86_64',
  arm64: 'arm64',
  aarch64: 'arm64',
};

/** Options for loadConfig. */
export interface LoadConfigOptions {
  /** Environment to read BUNDLESMITH_ARCH and SOURCE_DATE_EPOCH from */
  env?: NodeJS.ProcessEnv;
  /** Architecture selector taking precedence over the environment */
  arch?: string;
  format?: PackageFormat;
  /** Host values, for tests */
  hostArch?: string;
  hostPlatform?: NodeJS.Platform;
  homeDir?: string;
}

/**
 * Searches for bundlesmith.json by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; try the parent.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/** Maps an architecture name or alias to an Architecture, or null. */
export function normalizeArchitecture(value: string): Architecture | null {
  return ARCH_ALIASES[value.trim().toLowerCase()] ?? null;
}

/**
 * Architecture of the machine running the pipeline.
 *
 * @throws {ConfigError} On hosts that are neither x86_64 nor arm64
 */
export function detectHostArchitecture(hostArch: string = process.arch): Architecture {
  const arch = normalizeArchitecture(hostArch);
  if (!arch) {
    throw new ConfigError(`Unsupported host architecture: ${hostArch}`);
  }
  return arch;
}

/**
 * Resolves the architecture list.
 *
 * `selector` is `native`, `universal`, or a comma separated list. Without a
 * selector the descriptor's list is used, else the host architecture.
 * Duplicates are dropped and configuration order is kept.
 *
 * @throws {ConfigError} On unknown names or an empty list
 */
export function resolveArchitectures(
  selector: string | undefined,
  descriptorArchitectures: readonly string[] | undefined,
  host: Architecture
): Architecture[] {
  let names: readonly string[];
  const trimmed = selector?.trim() ?? '';

  if (trimmed === 'native') {
    names = [host];
  } else if (trimmed === 'universal') {
    names = ['x86_64', 'arm64'];
  } else if (trimmed !== '') {
    names = trimmed.split(',').filter((part) => part.trim() !== '');
  } else if (descriptorArchitectures && descriptorArchitectures.length > 0) {
    names = descriptorArchitectures;
  } else {
    names = [host];
  }

  const result: Architecture[] = [];
  for (const name of names) {
    const arch = normalizeArchitecture(name);
    if (!arch) {
      throw new ConfigError(`Unknown architecture '${name}'. Expected x86_64 or arm64.`);
    }
    if (!result.includes(arch)) {
      result.push(arch);
    }
  }

  if (result.length === 0) {
    throw new ConfigError('No architectures selected');
  }
  return result;
}

function parseSourceDateEpoch(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return 0;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`SOURCE_DATE_EPOCH must be a non-negative integer, got '${value}'`);
  }
  return Number.parseInt(value.trim(), 10);
}

function defaultFormat(platform: TargetPlatform): PackageFormat {
  return platform === 'macos' ? 'dmg' : 'appimage';
}

function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Builds a BuildConfig from a validated descriptor.
 *
 * @param projectDir - Directory relative paths are resolved against
 * @throws {ConfigError} On inconsistent platform, format and architecture choices
 */
export function resolveBuildConfig(
  descriptor: BundleDescriptor,
  projectDir: string,
  options: LoadConfigOptions = {}
): BuildConfig {
  const env = options.env ?? process.env;
  const home = options.homeDir ?? homedir();
  const at = (path: string): string => {
    const expanded = expandHome(path, home);
    return isAbsolute(expanded) ? expanded : resolve(projectDir, expanded);
  };

  const host = detectHostArchitecture(options.hostArch);
  const platform: TargetPlatform =
    descriptor.platform ?? ((options.hostPlatform ?? process.platform) === 'darwin' ? 'macos' : 'linux');
  const format = options.format ?? descriptor.format ?? defaultFormat(platform);
  const architectures = resolveArchitectures(
    options.arch ?? env.BUNDLESMITH_ARCH,
    descriptor.architectures,
    host
  );

  if (format === 'dmg' && platform !== 'macos') {
    throw new ConfigError('Format dmg requires platform macos');
  }
  if (format === 'appimage' && platform !== 'linux') {
    throw new ConfigError('Format appimage requires platform linux');
  }
  if (architectures.length > 1 && platform !== 'macos') {
    throw new ConfigError(
      `Universal bundles are only supported on macos; select a single architecture (got ${architectures.join(', ')})`
    );
  }

  const presentation = { ...DEFAULT_PRESENTATION, ...descriptor.presentation };
  const config: BuildConfig = {
    app_name: descriptor.app_name,
    bundle_identifier: descriptor.bundle_identifier,
    version: descriptor.version,
    minimum_os_version: descriptor.minimum_os_version,
    architectures,
    platform,
    format,
    project_dir: projectDir,
    entry_point: at(descriptor.entry_point),
    source_dir: at(descriptor.source_dir),
    icon_path: descriptor.icon ? at(descriptor.icon) : null,
    default_icon_path: descriptor.default_icon ? at(descriptor.default_icon) : null,
    work_dir: at(descriptor.work_dir ?? 'build'),
    dist_dir: at(descriptor.dist_dir ?? 'dist'),
    install_dir: at(descriptor.install_dir ?? '/Applications'),
    parallel_builds: descriptor.parallel_builds ?? 1,
    resource_check: descriptor.resource_check ?? 'warn',
    bundler: {
      ...DEFAULT_BUNDLER,
      ...descriptor.bundler,
      args: [...(descriptor.bundler?.args ?? DEFAULT_BUNDLER.args)],
    },
    tool_cache_dir: at(descriptor.tools?.cache_dir ?? '~/.cache/bundlesmith/tools'),
    tools: {
      appimagetool: {
        ...DEFAULT_APPIMAGETOOL,
        ...descriptor.tools?.appimagetool,
        smoke_args: [...(descriptor.tools?.appimagetool?.smoke_args ?? DEFAULT_APPIMAGETOOL.smoke_args)],
      },
    },
    presentation: {
      ...presentation,
      script_file: presentation.script_file ? at(presentation.script_file) : null,
      background_image: presentation.background_image ? at(presentation.background_image) : null,
      window_bounds: [...presentation.window_bounds],
      app_position: [...presentation.app_position],
      install_link_position: [...presentation.install_link_position],
    },
    image: { ...DEFAULT_IMAGE, ...descriptor.image },
    crash_report_dir: at(descriptor.crash_reports?.dir ?? '~/Library/Logs/DiagnosticReports'),
    crash_lookback_hours: descriptor.crash_reports?.lookback_hours ?? 24,
    source_date_epoch: parseSourceDateEpoch(env.SOURCE_DATE_EPOCH),
  };

  return deepFreeze(config);
}

/**
 * Loads, validates and resolves bundlesmith.json.
 *
 * @param configPath - Optional path to the config file. If not provided,
 *                     searches upward from the current directory.
 * @throws {ConfigError} If the config file cannot be found, read, or is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig(undefined, { arch: 'universal' });
 * ```
 */
export async function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Promise<BuildConfig> {
  let resolvedPath: string;

  if (configPath) {
    resolvedPath = resolve(configPath);
  } else {
    const found = await findConfigFile();
    if (!found) {
      throw new ConfigError(
        `Configuration file not found. Expected ${CONFIG_FILE_NAME} in current directory or parent directories.`
      );
    }
    resolvedPath = found;
  }

  let rawConfig: unknown;
  try {
    rawConfig = await atomicReadJson<unknown>(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath, error);
    }
    throw error;
  }

  const schema = await loadSchema(SCHEMA_URL);
  const result = validateWithSchema<BundleDescriptor>(rawConfig, schema);
  if (!result.valid || !result.data) {
    throw new ConfigError(`Invalid configuration file:\n  ${result.errors.join('\n  ')}`, resolvedPath);
  }

  try {
    return resolveBuildConfig(result.data, dirname(resolvedPath), options);
  } catch (error) {
    if (error instanceof ConfigError && error.configPath === undefined) {
      throw new ConfigError(error.message, resolvedPath, error);
    }
    throw error;
  }
}
