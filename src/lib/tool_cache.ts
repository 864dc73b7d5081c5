/**
 * Cache of downloaded build tools.
 *
 * Layout: `<cache>/<name>/<version>/<name>`. A present, executable entry is
 * valid and is returned without network access. Downloads land in a
 * `.part` file that is renamed into place only after a smoke test passes,
 * so an interrupted run never leaves a half-written entry behind.
 */

import { chmod, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { FetchError } from '../types/errors.js';
import { describeFailure, succeeded, type CommandRunner } from './exec.js';
import { cleanupTmpFiles, isExecutableFile } from './fs.js';
import { logDebug, logInfo, logOk } from './log.js';

export type FetchLike = (url: string) => Promise<Response>;

export interface ToolCacheOptions {
  runner: CommandRunner;
  fetchImpl?: FetchLike;
  /** Timeout for the post-download smoke test */
  smokeTimeoutMs?: number;
}

const PART_SUFFIX = '.part';

export class ToolCache {
  private readonly runner: CommandRunner;
  private readonly fetchImpl: FetchLike;
  private readonly smokeTimeoutMs: number;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(
    public readonly cacheDir: string,
    options: ToolCacheOptions
  ) {
    this.runner = options.runner;
    this.fetchImpl = options.fetchImpl ?? ((url: string) => fetch(url));
    this.smokeTimeoutMs = options.smokeTimeoutMs ?? 60_000;
  }

  /** Path of the cache entry for (name, version), present or not. */
  entryPath(name: string, version: string): string {
    return join(this.cacheDir, name, version, name);
  }

  /**
   * Returns the path of an executable tool, downloading it on a miss.
   *
   * Concurrent calls for the same (name, version) share one download.
   *
   * @throws {FetchError} If the download or the smoke test fails
   */
  acquire(name: string, version: string, url: string, smokeArgs: readonly string[] = ['--version']): Promise<string> {
    const key = `${name}@${version}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const acquisition = this.acquireUncached(name, version, url, smokeArgs).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, acquisition);
    return acquisition;
  }

  private async acquireUncached(
    name: string,
    version: string,
    url: string,
    smokeArgs: readonly string[]
  ): Promise<string> {
    const target = this.entryPath(name, version);
    if (await isExecutableFile(target)) {
      logDebug(`Tool cache hit: ${target}`);
      return target;
    }

    const partPath = `${target}${PART_SUFFIX}`;
    logInfo(`Downloading ${name} ${version} from ${url}`);

    try {
      await mkdir(dirname(target), { recursive: true });
      // Partial files from interrupted downloads of this version.
      for (const stale of await cleanupTmpFiles(dirname(target), PART_SUFFIX)) {
        logDebug(`Removed interrupted download ${stale}`);
      }

      let response: Response;
      try {
        response = await this.fetchImpl(url);
      } catch (error) {
        throw new FetchError(
          `Download of ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
          name,
          url,
          error instanceof Error ? error : undefined
        );
      }
      if (!response.ok) {
        throw new FetchError(`Download of ${name} failed: ${response.status} ${response.statusText}`, name, url);
      }

      const body = Buffer.from(await response.arrayBuffer());
      if (body.length === 0) {
        throw new FetchError(`Downloaded ${name} is empty`, name, url);
      }

      await writeFile(partPath, body);
      await chmod(partPath, 0o755);

      const smoke = await this.runner.run(partPath, smokeArgs, { timeoutMs: this.smokeTimeoutMs });
      if (!succeeded(smoke)) {
        throw new FetchError(`Downloaded ${name} failed its smoke test (${describeFailure(smoke)})`, name, url);
      }

      await rename(partPath, target);
      logOk(`Cached ${name} ${version} (${body.length} bytes)`);
      return target;
    } catch (error) {
      await rm(partPath, { force: true });
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(
        `Could not store ${name} in the tool cache: ${error instanceof Error ? error.message : String(error)}`,
        name,
        url,
        error instanceof Error ? error : undefined
      );
    }
  }
}
