/**
 * IconPipeline.
 *
 * Renders the master icon at every size the platform needs and, on macOS,
 * packs the set into an `.icns` container. Converters are tried in
 * priority order; the first one whose tools are installed and which
 * accepts the master file renders every size. Having no usable converter
 * is not an error: the bundle then keeps its default icon.
 */

import { mkdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { IconChoice, IconSet, IconSetEntry } from '../types/artifact.js';
import type { BuildConfig } from '../types/config.js';
import { IconError } from '../types/errors.js';
import { describeFailure, succeeded, type CommandResult, type CommandRunner } from '../lib/exec.js';
import { fileSize, pathExists, resetDirectory } from '../lib/fs.js';
import { logInfo, logOk, logWarn, tail } from '../lib/log.js';
import { iconWorkDir } from '../lib/paths.js';

export interface IconDeps {
  runner: CommandRunner;
}

export type IconOutcome =
  | { status: 'ready'; iconSet: IconSet }
  | { status: 'skipped'; reason: string };

/** Nominal sizes of an icon set; each is rendered at 1x and 2x. */
export const ICON_SIZES = [16, 32, 128, 256, 512] as const;

export const ICONSET_NAME = 'AppIcon.iconset';
export const ICNS_NAME = 'AppIcon.icns';

const RASTER_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.tif', '.tiff', '.gif', '.bmp']);

interface RenderContext {
  runner: CommandRunner;
  /** File to render from, after any preparation step */
  source: string;
  pixels: number;
  output: string;
}

export interface IconConverter {
  name: string;
  /** Every command the converter runs */
  tools: readonly string[];
  accepts(masterIcon: string): boolean;
  /** Produces the file every size is rendered from; defaults to the master. */
  prepare?(runner: CommandRunner, masterIcon: string, workDir: string): Promise<string>;
  render(context: RenderContext): Promise<CommandResult>;
}

function isVector(path: string): boolean {
  return extname(path).toLowerCase() === '.svg';
}

function isRaster(path: string): boolean {
  return RASTER_EXTENSIONS.has(extname(path).toLowerCase());
}

function sipsResize({ runner, source, pixels, output }: RenderContext): Promise<CommandResult> {
  return runner.run('sips', ['-z', String(pixels), String(pixels), source, '--out', output], { timeoutMs: 60_000 });
}

export const ICON_CONVERTERS: readonly IconConverter[] = [
  {
    name: 'rsvg-convert',
    tools: ['rsvg-convert'],
    accepts: isVector,
    render: ({ runner, source, pixels, output }) =>
      runner.run('rsvg-convert', ['-w', String(pixels), '-h', String(pixels), source, '-o', output], {
        timeoutMs: 60_000,
      }),
  },
  {
    name: 'sips',
    tools: ['sips'],
    accepts: isRaster,
    render: sipsResize,
  },
  {
    name: 'magick',
    tools: ['magick'],
    accepts: (path) => isVector(path) || isRaster(path),
    render: ({ runner, source, pixels, output }) =>
      runner.run(
        'magick',
        ['-background', 'none', '-density', '384', source, '-resize', `${pixels}x${pixels}`, output],
        { timeoutMs: 60_000 }
      ),
  },
  {
    name: 'qlmanage',
    tools: ['qlmanage', 'sips'],
    accepts: (path) => isVector(path) || isRaster(path),
    async prepare(runner, masterIcon, workDir) {
      const thumbDir = join(workDir, 'thumbnail');
      await mkdir(thumbDir, { recursive: true });
      const result = await runner.run('qlmanage', ['-t', '-s', '1024', '-o', thumbDir, masterIcon], {
        timeoutMs: 60_000,
      });
      const thumbnail = join(thumbDir, `${basename(masterIcon)}.png`);
      if (!succeeded(result) || (await fileSize(thumbnail)) === 0) {
        throw new IconError(`qlmanage could not render ${masterIcon} (${describeFailure(result)})`);
      }
      return thumbnail;
    },
    render: sipsResize,
  },
];

/** Entries of a complete icon set, in container order. */
export function iconSetEntries(directory: string): IconSetEntry[] {
  const entries: IconSetEntry[] = [];
  for (const size of ICON_SIZES) {
    for (const scale of [1, 2] as const) {
      const suffix = scale === 2 ? '@2x' : '';
      entries.push({
        size,
        scale,
        pixels: size * scale,
        file: join(directory, `icon_${size}x${size}${suffix}.png`),
      });
    }
  }
  return entries;
}

/**
 * First converter whose tools are all installed and which accepts the
 * master file, or null.
 */
export async function selectConverter(
  runner: CommandRunner,
  masterIcon: string,
  converters: readonly IconConverter[] = ICON_CONVERTERS
): Promise<IconConverter | null> {
  for (const converter of converters) {
    if (!converter.accepts(masterIcon)) continue;
    let available = true;
    for (const tool of converter.tools) {
      if ((await runner.which(tool)) === null) {
        available = false;
        break;
      }
    }
    if (available) return converter;
  }
  return null;
}

function skipped(reason: string): IconOutcome {
  logWarn(`${reason}; keeping the default icon`);
  return { status: 'skipped', reason };
}

/**
 * Renders the master icon into an icon set and container.
 *
 * @returns `skipped` when there is no master icon or no usable converter
 * @throws {IconError} If a converter or iconutil fails, or a size is
 *                     missing or empty afterwards
 */
export async function buildIconContainer(
  masterIcon: string | null,
  config: BuildConfig,
  deps: IconDeps,
  converters: readonly IconConverter[] = ICON_CONVERTERS
): Promise<IconOutcome> {
  if (masterIcon === null) {
    return skipped('No master icon configured');
  }
  if (!(await pathExists(masterIcon))) {
    return skipped(`Master icon ${masterIcon} not found`);
  }
  if (config.platform === 'macos' && (await deps.runner.which('iconutil')) === null) {
    return skipped('iconutil not found');
  }

  const converter = await selectConverter(deps.runner, masterIcon, converters);
  if (!converter) {
    return skipped(`No icon converter available for ${basename(masterIcon)}`);
  }

  const workDir = iconWorkDir(config);
  const directory = join(workDir, ICONSET_NAME);
  await resetDirectory(directory);

  logInfo(`Rendering icon set with ${converter.name}`);
  const source = converter.prepare ? await converter.prepare(deps.runner, masterIcon, workDir) : masterIcon;
  const entries = iconSetEntries(directory);

  for (const entry of entries) {
    const result = await converter.render({ runner: deps.runner, source, pixels: entry.pixels, output: entry.file });
    if (!succeeded(result)) {
      throw new IconError(
        `${converter.name} failed at ${entry.pixels}px (${describeFailure(result)}): ${tail(result.stderr, 3)}`
      );
    }
    if ((await fileSize(entry.file)) === 0) {
      throw new IconError(`${converter.name} produced no image for ${basename(entry.file)}`);
    }
  }

  let container: string | null = null;
  if (config.platform === 'macos') {
    container = join(workDir, ICNS_NAME);
    const result = await deps.runner.run('iconutil', ['-c', 'icns', directory, '-o', container], {
      timeoutMs: 60_000,
    });
    if (!succeeded(result)) {
      throw new IconError(`iconutil failed (${describeFailure(result)}): ${tail(result.stderr, 3)}`);
    }
    if ((await fileSize(container)) === 0) {
      throw new IconError(`iconutil produced no container at ${container}`);
    }
  }

  logOk(`Icon set ready (${entries.length} images${container ? ', icns' : ''})`);
  return {
    status: 'ready',
    iconSet: { converter: converter.name, directory, entries, container },
  };
}

/**
 * Icon choice from an icon set a previous `icon` run left in work_dir,
 * or the default icon when there is none.
 */
export async function existingIconChoice(config: BuildConfig): Promise<IconChoice> {
  const workDir = iconWorkDir(config);
  const directory = join(workDir, ICONSET_NAME);
  const entries = iconSetEntries(directory);
  const container = config.platform === 'macos' ? join(workDir, ICNS_NAME) : null;

  for (const file of [...entries.map((entry) => entry.file), ...(container ? [container] : [])]) {
    if ((await fileSize(file)) === 0) {
      return { kind: 'default', path: config.default_icon_path };
    }
  }
  return { kind: 'custom', iconSet: { converter: 'previous run', directory, entries, container } };
}
