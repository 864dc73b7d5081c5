/**
 * Configuration types for bundlesmith.
 *
 * BundleDescriptor is the raw shape of bundlesmith.json (validated against
 * schemas/bundle.schema.json). BuildConfig is the resolved, frozen record
 * every stage receives; stages never read the environment themselves.
 */

/** CPU architectures a bundle can be compiled for. */
export type Architecture = 'x86_64' | 'arm64';

/** Operating system whose bundle layout the build produces. */
export type TargetPlatform = 'macos' | 'linux';

/** Distributable produced by the assembler. */
export type PackageFormat = 'dmg' | 'appimage' | 'archive';

/** How the merger treats resources that differ between architecture builds. */
export type ResourceCheckMode = 'off' | 'warn' | 'strict';

/**
 * External application bundler invocation.
 *
 * Arguments may contain placeholders: {arch}, {entry}, {source}, {name},
 * {dist}, {work}, {identifier}, {version}, {min_os}.
 */
export interface BundlerSettings {
  command: string;
  args: string[];
  timeout_seconds: number;
}

/** A downloadable tool kept in the tool cache. */
export interface ToolSpec {
  version: string;
  url: string;
  /** Arguments for the smoke test run after download */
  smoke_args: string[];
}

/** Finder layout applied to a mounted disk image. */
export interface PresentationSettings {
  enabled: boolean;
  /** User AppleScript replacing the built-in layout template */
  script_file: string | null;
  background_image: string | null;
  /** left, top, right, bottom */
  window_bounds: [number, number, number, number];
  icon_size: number;
  app_position: [number, number];
  install_link_position: [number, number];
  timeout_seconds: number;
}

/** Disk image sizing and mount handling. */
export interface ImageSettings {
  size_margin_mb: number;
  mount_timeout_seconds: number;
  mount_poll_interval_ms: number;
  /** Directory under which volumes appear when attached */
  volume_root: string;
}

/** Raw bundlesmith.json contents. */
export interface BundleDescriptor {
  app_name: string;
  bundle_identifier: string;
  version: string;
  minimum_os_version: string;
  entry_point: string;
  source_dir: string;
  icon?: string;
  default_icon?: string;
  architectures?: string[];
  platform?: TargetPlatform;
  format?: PackageFormat;
  work_dir?: string;
  dist_dir?: string;
  parallel_builds?: number;
  resource_check?: ResourceCheckMode;
  bundler?: Partial<BundlerSettings>;
  tools?: {
    cache_dir?: string;
    appimagetool?: Partial<ToolSpec>;
  };
  presentation?: Partial<PresentationSettings>;
  image?: Partial<ImageSettings>;
  crash_reports?: {
    dir?: string;
    lookback_hours?: number;
  };
  install_dir?: string;
}

/** Fully resolved configuration. All paths are absolute. */
export interface BuildConfig {
  readonly app_name: string;
  readonly bundle_identifier: string;
  readonly version: string;
  readonly minimum_os_version: string;
  readonly architectures: readonly Architecture[];
  readonly platform: TargetPlatform;
  readonly format: PackageFormat;
  readonly project_dir: string;
  readonly entry_point: string;
  readonly source_dir: string;
  readonly icon_path: string | null;
  readonly default_icon_path: string | null;
  readonly work_dir: string;
  readonly dist_dir: string;
  readonly install_dir: string;
  readonly parallel_builds: number;
  readonly resource_check: ResourceCheckMode;
  readonly bundler: Readonly<BundlerSettings>;
  readonly tool_cache_dir: string;
  readonly tools: {
    readonly appimagetool: Readonly<ToolSpec>;
  };
  readonly presentation: Readonly<PresentationSettings>;
  readonly image: Readonly<ImageSettings>;
  readonly crash_report_dir: string;
  readonly crash_lookback_hours: number;
  /** Seconds since the epoch used for archive entry times */
  readonly source_date_epoch: number;
}
