import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { assembleArchive, writeReproducibleArchive } from '@/runner/assembler/archive.js';
import { buildArchitecture } from '@/runner/builder.js';
import { promoteArtifact } from '@/runner/merger.js';
import type { MergedArtifact } from '@/types/artifact.js';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as tar from 'tar';
import { FakeToolchain } from '../helpers/fake-toolchain.js';
import { createTestProject, makeTempDir, removeTempDir, type TestProject } from '../helpers/project.js';

interface ListedEntry {
  path: string;
  mtime: number | undefined;
}

async function listArchive(file: string): Promise<ListedEntry[]> {
  const entries: ListedEntry[] = [];
  await tar.t({
    file,
    onReadEntry: (entry) => {
      entries.push({ path: entry.path, mtime: entry.mtime?.getTime() });
    },
  });
  return entries;
}

describe('writeReproducibleArchive', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('bundlesmith-tar');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should write identical bytes for identical trees', async () => {
    const source = join(root, 'tree');
    await mkdir(join(source, 'b'), { recursive: true });
    await writeFile(join(source, 'b', 'two.txt'), 'two');
    await writeFile(join(source, 'a.txt'), 'one');

    await writeReproducibleArchive(source, join(root, 'first.tar.gz'), 1_700_000_000);
    await writeFile(join(source, 'a.txt'), 'one');
    await writeReproducibleArchive(source, join(root, 'second.tar.gz'), 1_700_000_000);

    const first = await readFile(join(root, 'first.tar.gz'));
    const second = await readFile(join(root, 'second.tar.gz'));
    expect(first.equals(second)).toBe(true);
  });

  it('should store entries sorted with the fixed time', async () => {
    const source = join(root, 'tree');
    await mkdir(join(source, 'b'), { recursive: true });
    await writeFile(join(source, 'b', 'two.txt'), 'two');
    await writeFile(join(source, 'a.txt'), 'one');

    await writeReproducibleArchive(source, join(root, 'out.tar.gz'), 1_700_000_000);

    const entries = await listArchive(join(root, 'out.tar.gz'));
    expect(entries.map((entry) => entry.path)).toEqual(['a.txt', 'b/', 'b/two.txt']);
    expect(entries.every((entry) => entry.mtime === 1_700_000_000_000)).toBe(true);
  });

  it('should refuse an empty tree', async () => {
    await mkdir(join(root, 'empty'));

    await expect(writeReproducibleArchive(join(root, 'empty'), join(root, 'out.tar.gz'), 0)).rejects.toThrow(
      `Nothing to archive in ${join(root, 'empty')}`
    );
  });
});

describe('assembleArchive', () => {
  let root: string;
  let project: TestProject;
  let artifact: MergedArtifact;

  beforeEach(async () => {
    root = await makeTempDir('bundlesmith-archive');
    project = await createTestProject(
      root,
      { platform: 'linux', format: 'archive', architectures: ['x86_64'] },
      { env: { SOURCE_DATE_EPOCH: '1700000000' } }
    );
    const runner = new FakeToolchain({ volumeRoot: project.volumeRoot, platform: 'linux' });
    artifact = promoteArtifact(await buildArchitecture(project.config, 'x86_64', { runner }));
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should archive the staged bundle without an install link', async () => {
    const outcome = await assembleArchive(artifact, { kind: 'default', path: null }, project.config);

    const path = join(root, 'dist', 'Sample-App-1.2.3-x86_64.tar.gz');
    expect(outcome.warnings).toEqual([]);
    expect(outcome.image).toMatchObject({ path, format: 'archive', label: 'x86_64' });
    expect((await listArchive(path)).map((entry) => entry.path)).toEqual([
      'Sample App/',
      'Sample App/Sample App',
      'Sample App/data.txt',
    ]);
  });

  it('should place the default icon beside the executable', async () => {
    await writeFile(join(root, 'fallback.png'), 'png');

    const outcome = await assembleArchive(artifact, { kind: 'default', path: join(root, 'fallback.png') }, project.config);

    expect((await listArchive(outcome.image.path)).map((entry) => entry.path)).toContain('Sample App/icon.png');
  });

  it('should give the same bytes when packaged twice', async () => {
    const first = await assembleArchive(artifact, { kind: 'default', path: null }, project.config);
    const firstBytes = await readFile(first.image.path);

    const second = await assembleArchive(artifact, { kind: 'default', path: null }, project.config);

    expect((await readFile(second.image.path)).equals(firstBytes)).toBe(true);
  });
});
