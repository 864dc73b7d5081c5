import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  atomicWriteJson,
  atomicReadJson,
  AtomicFsError,
  cleanupTmpFiles,
  copyTree,
  directorySize,
  fileSize,
  isExecutableFile,
  listTree,
  resetDirectory,
} from '@/lib/fs.js';
import { chmod, mkdir, readFile, readdir, readlink, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { makeTempDir, removeTempDir } from '../helpers/project.js';

describe('atomicWriteJson', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('bundlesmith-fs');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should write JSON with 2-space indent and a trailing newline', async () => {
    const filePath = join(testDir, 'report.json');

    await atomicWriteJson(filePath, { a: 1, b: { c: 2 } });

    const content = await readFile(filePath, 'utf-8');
    expect(content).toMatch(/^\{\n  "a": 1,/);
    expect(await atomicReadJson<{ b: { c: number } }>(filePath)).toEqual({ a: 1, b: { c: 2 } });
  });

  it('should not leave a .tmp file after a successful write', async () => {
    await atomicWriteJson(join(testDir, 'clean.json'), { ok: true });

    expect(await readdir(testDir)).toEqual(['clean.json']);
  });

  it('should create missing parent directories', async () => {
    await atomicWriteJson(join(testDir, 'nested', 'dir', 'x.json'), { n: 1 });

    expect(await atomicReadJson(join(testDir, 'nested', 'dir', 'x.json'))).toEqual({ n: 1 });
  });

  it('should throw AtomicFsError when a parent is a file', async () => {
    await writeFile(join(testDir, 'blocker'), '');

    await expect(atomicWriteJson(join(testDir, 'blocker', 'x.json'), {})).rejects.toThrow(AtomicFsError);
  });

  it('should throw AtomicFsError on invalid JSON', async () => {
    const filePath = join(testDir, 'bad.json');
    await writeFile(filePath, '{ not json');

    await expect(atomicReadJson(filePath)).rejects.toThrow(AtomicFsError);
  });
});

describe('cleanupTmpFiles', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('bundlesmith-fs');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should delete only files with the suffix, recursively', async () => {
    await mkdir(join(testDir, 'tool', '1.0'), { recursive: true });
    await writeFile(join(testDir, 'tool', '1.0', 'tool.part'), 'partial');
    await writeFile(join(testDir, 'tool', '1.0', 'tool'), 'complete');

    const deleted = await cleanupTmpFiles(testDir, '.part');

    expect(deleted).toEqual([join(testDir, 'tool', '1.0', 'tool.part')]);
    expect(await readdir(join(testDir, 'tool', '1.0'))).toEqual(['tool']);
  });

  it('should treat a missing directory as empty', async () => {
    expect(await cleanupTmpFiles(join(testDir, 'nowhere'))).toEqual([]);
  });
});

describe('tree helpers', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('bundlesmith-fs');
    await mkdir(join(testDir, 'src', 'b'), { recursive: true });
    await writeFile(join(testDir, 'src', 'z.txt'), '12345');
    await writeFile(join(testDir, 'src', 'b', 'a.txt'), '123');
    await symlink('z.txt', join(testDir, 'src', 'link'));
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should list entries sorted, directories before their contents', async () => {
    expect(await listTree(join(testDir, 'src'))).toEqual([
      { path: 'b', kind: 'directory' },
      { path: 'b/a.txt', kind: 'file' },
      { path: 'link', kind: 'symlink' },
      { path: 'z.txt', kind: 'file' },
    ]);
  });

  it('should copy a tree keeping symlinks as links', async () => {
    await copyTree(join(testDir, 'src'), join(testDir, 'out', 'copy'));

    expect(await readFile(join(testDir, 'out', 'copy', 'b', 'a.txt'), 'utf-8')).toBe('123');
    expect(await readlink(join(testDir, 'out', 'copy', 'link'))).toBe('z.txt');
  });

  it('should sum file sizes and the link itself', async () => {
    // 5 + 3 bytes of content, plus the 5-byte link target "z.txt"
    expect(await directorySize(join(testDir, 'src'))).toBe(13);
    expect(await directorySize(join(testDir, 'absent'))).toBe(0);
  });

  it('should recreate a directory empty', async () => {
    await resetDirectory(join(testDir, 'src'));

    expect(await readdir(join(testDir, 'src'))).toEqual([]);
  });

  it('should report file size and execute permission', async () => {
    const file = join(testDir, 'src', 'z.txt');
    expect(await fileSize(file)).toBe(5);
    expect(await fileSize(join(testDir, 'src', 'b'))).toBe(0);
    expect(await isExecutableFile(file)).toBe(false);

    await chmod(file, 0o755);
    expect(await isExecutableFile(file)).toBe(true);
  });
});
