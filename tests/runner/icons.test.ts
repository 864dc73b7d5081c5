import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildIconContainer, existingIconChoice, iconSetEntries, selectConverter } from '@/runner/icons.js';
import { IconError } from '@/types/errors.js';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { FakeToolchain, failed } from '../helpers/fake-toolchain.js';
import { createTestProject, makeTempDir, removeTempDir, type TestProject } from '../helpers/project.js';

describe('icon set layout', () => {
  it('should list every size at 1x and 2x', () => {
    const entries = iconSetEntries('/icons/AppIcon.iconset');

    expect(entries).toHaveLength(10);
    expect(entries.map((entry) => basename(entry.file)).slice(0, 4)).toEqual([
      'icon_16x16.png',
      'icon_16x16@2x.png',
      'icon_32x32.png',
      'icon_32x32@2x.png',
    ]);
    expect(entries[entries.length - 1]).toEqual({
      size: 512,
      scale: 2,
      pixels: 1024,
      file: '/icons/AppIcon.iconset/icon_512x512@2x.png',
    });
  });
});

describe('buildIconContainer', () => {
  let root: string;
  let project: TestProject;

  beforeEach(async () => {
    root = await makeTempDir('bundlesmith-icons');
    project = await createTestProject(root);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should render every size and pack the container on macOS', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot });

    const outcome = await buildIconContainer(project.config.icon_path, project.config, { runner });

    expect(outcome.status).toBe('ready');
    if (outcome.status !== 'ready') return;
    expect(outcome.iconSet.converter).toBe('rsvg-convert');
    expect(outcome.iconSet.container).toBe(join(root, 'build', 'icons', 'AppIcon.icns'));
    expect(runner.callsTo('rsvg-convert').map((call) => call.args[1])).toEqual(
      ['16', '32', '32', '64', '128', '256', '256', '512', '512', '1024']
    );
    expect(runner.callsTo('iconutil')[0].args).toEqual([
      '-c',
      'icns',
      join(root, 'build', 'icons', 'AppIcon.iconset'),
      '-o',
      join(root, 'build', 'icons', 'AppIcon.icns'),
    ]);
  });

  it('should pick sips for raster masters', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot });

    expect((await selectConverter(runner, '/art/icon.png'))?.name).toBe('sips');
    expect((await selectConverter(runner, '/art/icon.svg'))?.name).toBe('rsvg-convert');
  });

  it('should fall back to a Quick Look thumbnail resized by sips', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot, available: ['iconutil', 'qlmanage', 'sips'] });

    const outcome = await buildIconContainer(project.config.icon_path, project.config, { runner });

    expect(outcome.status === 'ready' && outcome.iconSet.converter).toBe('qlmanage');
    const thumbnail = join(root, 'build', 'icons', 'thumbnail', 'icon.svg.png');
    expect(runner.callsTo('qlmanage')[0].args).toEqual(['-t', '-s', '1024', '-o', join(root, 'build', 'icons', 'thumbnail'), join(root, 'icon.svg')]);
    expect(runner.callsTo('sips').every((call) => call.args[3] === thumbnail)).toBe(true);
  });

  it('should skip when no converter can read the master', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot, available: ['iconutil', 'sips'] });

    expect(await buildIconContainer(project.config.icon_path, project.config, { runner })).toEqual({
      status: 'skipped',
      reason: 'No icon converter available for icon.svg',
    });
    expect(runner.calls).toEqual([]);
  });

  it('should skip without a master icon or without iconutil', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot, available: ['rsvg-convert'] });

    expect(await buildIconContainer(null, project.config, { runner })).toEqual({
      status: 'skipped',
      reason: 'No master icon configured',
    });
    expect(await buildIconContainer(join(root, 'missing.svg'), project.config, { runner })).toEqual({
      status: 'skipped',
      reason: `Master icon ${join(root, 'missing.svg')} not found`,
    });
    expect(await buildIconContainer(project.config.icon_path, project.config, { runner })).toEqual({
      status: 'skipped',
      reason: 'iconutil not found',
    });
  });

  it('should fail when a converter errors part way', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot }).on('rsvg-convert', () =>
      failed(1, 'Error reading SVG: bad element')
    );

    await expect(buildIconContainer(project.config.icon_path, project.config, { runner })).rejects.toThrow(
      'rsvg-convert failed at 16px (exit code 1): Error reading SVG: bad element'
    );
  });

  it('should fail when a converter leaves an empty image', async () => {
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot }).on('rsvg-convert', async (args) => {
      const output = args[args.indexOf('-o') + 1];
      await writeFile(output, '');
      return { code: 0, stdout: '', stderr: '', duration_ms: 1, timed_out: false };
    });

    const error = await buildIconContainer(project.config.icon_path, project.config, { runner }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IconError);
    expect(error instanceof IconError && error.message).toBe('rsvg-convert produced no image for icon_16x16.png');
  });

  it('should keep the PNG set without a container on Linux', async () => {
    const linux = await createTestProject(root, { platform: 'linux', format: 'archive', architectures: ['x86_64'] });
    const runner = new FakeToolchain({ volumeRoot: linux.volumeRoot, available: ['magick'] });

    const outcome = await buildIconContainer(linux.config.icon_path, linux.config, { runner });

    expect(outcome.status === 'ready' && outcome.iconSet.container).toBeNull();
    expect(runner.callsTo('iconutil')).toEqual([]);
  });

  it('should reuse an icon set left by an earlier run', async () => {
    expect(await existingIconChoice(project.config)).toEqual({ kind: 'default', path: null });

    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot });
    await buildIconContainer(project.config.icon_path, project.config, { runner });

    const choice = await existingIconChoice(project.config);
    expect(choice.kind === 'custom' && choice.iconSet.container).toBe(join(root, 'build', 'icons', 'AppIcon.icns'));
  });

  it('should ignore an incomplete icon set', async () => {
    const directory = join(root, 'build', 'icons', 'AppIcon.iconset');
    await mkdir(directory, { recursive: true });
    await writeFile(join(directory, 'icon_16x16.png'), 'png');

    expect((await existingIconChoice(project.config)).kind).toBe('default');
  });
});
