import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ToolCache, type FetchLike } from '@/lib/tool_cache.js';
import { FetchError } from '@/types/errors.js';
import { chmod, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { FakeToolchain, failed } from '../helpers/fake-toolchain.js';
import { makeTempDir, removeTempDir } from '../helpers/project.js';

const URL_V13 = 'https://downloads.example.test/appimagetool-13';

describe('ToolCache', () => {
  let cacheDir: string;
  let runner: FakeToolchain;
  let fetchCount: number;

  const fetchOk: FetchLike = async () => {
    fetchCount++;
    await new Promise((r) => setTimeout(r, 5));
    return new Response('#!/bin/sh\necho appimagetool\n', { status: 200 });
  };

  beforeEach(async () => {
    cacheDir = await makeTempDir('bundlesmith-cache');
    runner = new FakeToolchain({ volumeRoot: join(cacheDir, 'volumes') });
    fetchCount = 0;
  });

  afterEach(async () => {
    await removeTempDir(cacheDir);
  });

  it('should download, smoke test and store the tool', async () => {
    const cache = new ToolCache(cacheDir, { runner, fetchImpl: fetchOk });

    const path = await cache.acquire('appimagetool', '13', URL_V13, ['--appimage-extract-and-run', '--version']);

    expect(path).toBe(join(cacheDir, 'appimagetool', '13', 'appimagetool'));
    expect(await readFile(path, 'utf-8')).toBe('#!/bin/sh\necho appimagetool\n');
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].command).toBe(`${path}.part`);
    expect(runner.calls[0].args).toEqual(['--appimage-extract-and-run', '--version']);
    expect(await readdir(dirname(path))).toEqual(['appimagetool']);
  });

  it('should share one download between concurrent callers', async () => {
    const cache = new ToolCache(cacheDir, { runner, fetchImpl: fetchOk });

    const paths = await Promise.all([
      cache.acquire('appimagetool', '13', URL_V13),
      cache.acquire('appimagetool', '13', URL_V13),
      cache.acquire('appimagetool', '13', URL_V13),
    ]);

    expect(fetchCount).toBe(1);
    expect(new Set(paths).size).toBe(1);
  });

  it('should return a cached entry without network access', async () => {
    const cache = new ToolCache(cacheDir, {
      runner,
      fetchImpl: async () => {
        throw new Error('network must not be used');
      },
    });
    const entry = cache.entryPath('appimagetool', '13');
    await mkdir(dirname(entry), { recursive: true });
    await writeFile(entry, 'cached');
    await chmod(entry, 0o755);

    expect(await cache.acquire('appimagetool', '13', URL_V13)).toBe(entry);
    expect(runner.calls).toEqual([]);
  });

  it('should fail on an HTTP error and leave nothing behind', async () => {
    const cache = new ToolCache(cacheDir, {
      runner,
      fetchImpl: async () => new Response('not found', { status: 404, statusText: 'Not Found' }),
    });

    const error = await cache.acquire('appimagetool', '13', URL_V13).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && error.message).toBe('Download of appimagetool failed: 404 Not Found');
    expect(error instanceof FetchError && error.code).toBe('FETCH_FAILED');
    expect(await readdir(join(cacheDir, 'appimagetool', '13'))).toEqual([]);
  });

  it('should reject an empty download', async () => {
    const cache = new ToolCache(cacheDir, { runner, fetchImpl: async () => new Response('', { status: 200 }) });

    await expect(cache.acquire('appimagetool', '13', URL_V13)).rejects.toThrow('Downloaded appimagetool is empty');
  });

  it('should discard a download that fails its smoke test', async () => {
    const cache = new ToolCache(cacheDir, { runner, fetchImpl: fetchOk });
    const part = `${cache.entryPath('appimagetool', '13')}.part`;
    runner.on(part, () => failed(126, 'cannot execute binary file'));

    await expect(cache.acquire('appimagetool', '13', URL_V13)).rejects.toThrow(
      'Downloaded appimagetool failed its smoke test (exit code 126)'
    );
    expect(await readdir(join(cacheDir, 'appimagetool', '13'))).toEqual([]);
  });

  it('should retry after a failed acquisition', async () => {
    let attempt = 0;
    const cache = new ToolCache(cacheDir, {
      runner,
      fetchImpl: async (url) => {
        attempt++;
        if (attempt === 1) throw new Error('connection reset');
        return fetchOk(url);
      },
    });

    await expect(cache.acquire('appimagetool', '13', URL_V13)).rejects.toThrow(
      'Download of appimagetool failed: connection reset'
    );
    expect(await cache.acquire('appimagetool', '13', URL_V13)).toBe(cache.entryPath('appimagetool', '13'));
  });

  it('should remove interrupted downloads of the version it fetches', async () => {
    const cache = new ToolCache(cacheDir, { runner, fetchImpl: fetchOk });
    const versionDir = dirname(cache.entryPath('appimagetool', '13'));
    const otherPart = `${cache.entryPath('appimagetool', '12')}.part`;
    await mkdir(versionDir, { recursive: true });
    await mkdir(dirname(otherPart), { recursive: true });
    await writeFile(join(versionDir, 'appimagetool-old.part'), 'half');
    await writeFile(otherPart, 'half');

    await cache.acquire('appimagetool', '13', URL_V13);

    expect(await readdir(versionDir)).toEqual(['appimagetool']);
    expect(await readFile(otherPart, 'utf-8')).toBe('half');
  });
});
