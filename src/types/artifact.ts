/**
 * Records passed between pipeline stages.
 */

import type { Architecture, PackageFormat, TargetPlatform } from './config.js';

/**
 * Output of one ArchitectureBuilder run.
 *
 * Owned by the stage that produced it until the merger consumes it.
 */
export interface Artifact {
  arch: Architecture;
  platform: TargetPlatform;
  /** Bundle directory (`<AppName>.app` or `<AppName>`) */
  root: string;
  /** Primary executable, relative to root */
  executable: string;
}

/** Bundle whose primary executable carries every input architecture. */
export interface MergedArtifact {
  architectures: Architecture[];
  platform: TargetPlatform;
  root: string;
  executable: string;
  /** Architecture whose tree was used for every non-executable file */
  template_arch: Architecture;
}

/** One raster image of an icon set. */
export interface IconSetEntry {
  /** Nominal size in points */
  size: number;
  scale: 1 | 2;
  pixels: number;
  file: string;
}

export interface IconSet {
  converter: string;
  directory: string;
  entries: IconSetEntry[];
  /** `.icns` container on macOS; null where the PNG set is used directly */
  container: string | null;
}

/**
 * Icon handed to the assembler.
 *
 * `default` carries the configured fallback icon, or null to keep the
 * bundler's own icon.
 */
export type IconChoice =
  | { kind: 'custom'; iconSet: IconSet }
  | { kind: 'default'; path: string | null };

/** The final distributable. Immutable once written. */
export interface PackageImage {
  path: string;
  format: PackageFormat;
  label: string;
  size_bytes: number;
}

/** A disk image attached read/write while it is being assembled. */
export interface TransientMount {
  device: string;
  mount_point: string;
  image_path: string;
}
