/**
 * macOS disk image assembly.
 *
 * A blank read/write image is created, attached, filled from the staging
 * area and optionally laid out, then detached and converted into the
 * compressed, read-only distributable. The transient mount never outlives
 * this module: it is detached exactly once per call, whatever happens
 * while it is attached.
 */

import { copyFile, mkdir, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { IconChoice, MergedArtifact, TransientMount } from '../../types/artifact.js';
import type { BuildConfig, ImageSettings } from '../../types/config.js';
import { AssemblyError, MountTimeoutError } from '../../types/errors.js';
import { describeFailure, succeeded, type CommandRunner } from '../../lib/exec.js';
import { copyTree, directorySize, pathExists, removePath } from '../../lib/fs.js';
import { logDebug, logInfo, logWarn, tail } from '../../lib/log.js';
import { imagePath } from '../../lib/paths.js';
import { finalizeImage } from './finalize.js';
import { stageBundle, type StagedBundle } from './staging.js';
import type { AssemblerDeps, AssemblyOutcome, AssemblyWarning } from './types.js';

const MIB = 1024 * 1024;
const HDIUTIL_TIMEOUT_MS = 10 * 60_000;

/** Read/write image the distributable is converted from. */
export function temporaryImagePath(config: Pick<BuildConfig, 'work_dir'>): string {
  return join(config.work_dir, 'image.rw.dmg');
}

/** Image size in MiB: staged content rounded up, plus the margin. */
export function imageSizeMb(stagedBytes: number, marginMb: number): number {
  return Math.ceil(stagedBytes / MIB) + marginMb;
}

/**
 * Device and mount point from `hdiutil attach` output.
 *
 * The device is the first `/dev/` entry (the whole disk, which is what
 * detach takes); the mount point is the last column of the line that has
 * one.
 */
export function parseAttachOutput(stdout: string, fallbackMountPoint: string): Omit<TransientMount, 'image_path'> | null {
  let device: string | null = null;
  let mountPoint: string | null = null;

  for (const line of stdout.split('\n')) {
    if (!line.startsWith('/dev/')) continue;
    const columns = line.split('\t').map((column) => column.trim());
    if (device === null) {
      device = columns[0].split(/\s+/)[0];
    }
    const last = columns[columns.length - 1];
    if (mountPoint === null && columns.length > 1 && last.startsWith('/')) {
      mountPoint = last;
    }
  }

  if (device === null) return null;
  return { device, mount_point: mountPoint ?? fallbackMountPoint };
}

/**
 * Polls until the mount point exists.
 *
 * @throws {MountTimeoutError} After `mount_timeout_seconds`
 */
export async function waitForMount(
  mountPoint: string,
  settings: Pick<ImageSettings, 'mount_timeout_seconds' | 'mount_poll_interval_ms'>,
  sleep: (ms: number) => Promise<void> = (ms) => delay(ms)
): Promise<void> {
  const attempts = Math.max(1, Math.ceil((settings.mount_timeout_seconds * 1000) / settings.mount_poll_interval_ms));
  for (let attempt = 0; attempt <= attempts; attempt++) {
    if (await pathExists(mountPoint)) {
      return;
    }
    if (attempt < attempts) {
      await sleep(settings.mount_poll_interval_ms);
    }
  }
  throw new MountTimeoutError(
    `Volume did not appear at ${mountPoint} within ${settings.mount_timeout_seconds}s`,
    mountPoint
  );
}

/**
 * Detaches the mount, retrying once with -force.
 *
 * @returns null on success, else the error to report
 */
export async function detachMount(runner: CommandRunner, mount: TransientMount): Promise<AssemblyError | null> {
  const first = await runner.run('hdiutil', ['detach', mount.device], { timeoutMs: 60_000 });
  if (succeeded(first)) {
    logDebug(`Detached ${mount.device}`);
    return null;
  }

  logWarn(`Detach of ${mount.device} failed (${describeFailure(first)}); retrying with -force`);
  const forced = await runner.run('hdiutil', ['detach', mount.device, '-force'], { timeoutMs: 60_000 });
  if (succeeded(forced)) {
    return null;
  }
  return new AssemblyError(
    `Could not detach ${mount.mount_point} (${describeFailure(forced)}): ${tail(forced.stderr, 3)}`,
    `Detach it manually with: hdiutil detach ${mount.device} -force`
  );
}

async function copyOntoVolume(staged: StagedBundle, mountPoint: string): Promise<void> {
  for (const name of (await readdir(staged.dir)).sort()) {
    await copyTree(join(staged.dir, name), join(mountPoint, name));
  }
}

async function applyPresentation(
  staged: StagedBundle,
  mount: TransientMount,
  config: BuildConfig,
  deps: AssemblerDeps
): Promise<void> {
  const presentation = deps.presentation;
  if (!config.presentation.enabled || !presentation) {
    return;
  }

  let background: string | null = null;
  if (config.presentation.background_image !== null) {
    const target = join('.background', basename(config.presentation.background_image));
    await mkdir(join(mount.mount_point, '.background'), { recursive: true });
    await copyFile(config.presentation.background_image, join(mount.mount_point, target));
    background = target;
  }

  await presentation.apply({
    volume_name: config.app_name,
    mount_point: mount.mount_point,
    app_bundle: staged.bundle_name,
    install_link: staged.install_link ?? basename(config.install_dir),
    background,
    settings: config.presentation,
  });
}

/**
 * Builds the compressed disk image.
 *
 * @throws {AssemblyError} If an hdiutil step fails, the mount cannot be
 *                         detached, or the final image is absent or empty
 * @throws {MountTimeoutError} If the attached volume never appears
 */
export async function assembleDiskImage(
  artifact: MergedArtifact,
  icon: IconChoice,
  config: BuildConfig,
  deps: AssemblerDeps
): Promise<AssemblyOutcome> {
  const warnings: AssemblyWarning[] = [];
  const { runner } = deps;
  const finalPath = imagePath(config);
  const tmpPath = temporaryImagePath(config);

  const staged = await stageBundle(artifact, icon, config, { installLink: true });
  await removePath(finalPath);
  await removePath(tmpPath);
  await mkdir(config.dist_dir, { recursive: true });

  const sizeMb = imageSizeMb(await directorySize(staged.dir), config.image.size_margin_mb);
  logInfo(`Creating ${sizeMb} MB disk image`);
  const create = await runner.run(
    'hdiutil',
    ['create', '-size', `${sizeMb}m`, '-fs', 'HFS+', '-volname', config.app_name, '-ov', tmpPath],
    { timeoutMs: HDIUTIL_TIMEOUT_MS }
  );
  if (!succeeded(create)) {
    throw new AssemblyError(`hdiutil create failed (${describeFailure(create)}): ${tail(create.stderr, 3)}`);
  }

  try {
    const attach = await runner.run('hdiutil', ['attach', '-readwrite', '-noverify', '-noautoopen', tmpPath], {
      timeoutMs: HDIUTIL_TIMEOUT_MS,
    });
    const expectedMount = join(config.image.volume_root, config.app_name);
    if (!succeeded(attach)) {
      throw new AssemblyError(`hdiutil attach failed (${describeFailure(attach)}): ${tail(attach.stderr, 3)}`);
    }
    const parsed = parseAttachOutput(attach.stdout, expectedMount);
    if (parsed === null) {
      // The volume may be mounted even though no device was reported.
      const detachError = await detachMount(runner, {
        device: expectedMount,
        mount_point: expectedMount,
        image_path: tmpPath,
      });
      if (detachError) {
        logWarn(detachError.message);
      }
      throw new AssemblyError(`hdiutil attach reported no device for ${tmpPath}: ${tail(attach.stdout, 3)}`);
    }
    const mount: TransientMount = { ...parsed, image_path: tmpPath };

    let failed = false;
    let primaryError: unknown;
    try {
      await waitForMount(mount.mount_point, config.image, deps.sleep);
      await copyOntoVolume(staged, mount.mount_point);
      try {
        await applyPresentation(staged, mount, config, deps);
      } catch (error) {
        const message = `Disk image layout not applied: ${error instanceof Error ? error.message : String(error)}`;
        logWarn(message);
        warnings.push({ code: 'PRESENTATION_WARNING', message });
      }
    } catch (error) {
      failed = true;
      primaryError = error;
    }

    const detachError = await detachMount(runner, mount);
    if (failed) {
      if (detachError) {
        logWarn(detachError.message);
      }
      throw primaryError;
    }
    if (detachError) {
      throw detachError;
    }

    logInfo('Compressing disk image');
    const convert = await runner.run(
      'hdiutil',
      ['convert', tmpPath, '-format', 'UDZO', '-imagekey', 'zlib-level=9', '-o', finalPath],
      { timeoutMs: HDIUTIL_TIMEOUT_MS }
    );
    if (!succeeded(convert)) {
      throw new AssemblyError(`hdiutil convert failed (${describeFailure(convert)}): ${tail(convert.stderr, 3)}`);
    }
  } finally {
    await removePath(tmpPath);
  }

  return { image: await finalizeImage(config, finalPath), warnings };
}
