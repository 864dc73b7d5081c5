/**
 * File system utilities shared by the pipeline stages.
 *
 * JSON writes use the write-tmp-fsync-rename pattern so a report is never
 * left half written. Tree helpers never follow symlinks: bundles contain
 * links (framework versions, the install-location link) that must be
 * copied and measured as links.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { access, constants, cp, lstat, mkdir, open, readFile, readdir, rename, rm, stat, unlink } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Atomically writes JSON data to a file using the write-tmp-fsync-rename pattern.
 *
 * Parent directories are created when missing.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('dist/report.json', report);
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    const content = JSON.stringify(data, null, 2) + '\n';
    await mkdir(dirname(filePath), { recursive: true });

    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await rm(tmpPath, { force: true });

    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson<T>(filePath: string): Promise<T> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Deletes files in `dir` whose names end with `suffix`.
 *
 * A missing directory is treated as empty.
 *
 * @returns List of deleted file paths
 * @throws {AtomicFsError} If the directory cannot be read
 */
export async function cleanupTmpFiles(dir: string, suffix = '.tmp'): Promise<string[]> {
  const deleted: string[] = [];

  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true, recursive: true });
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return deleted;
    }
    throw new AtomicFsError(
      `Failed to cleanup tmp files in ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      dir,
      error instanceof Error ? error : undefined
    );
  }

  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith(suffix)) {
      const filePath = join(entry.parentPath ?? entry.path, entry.name);
      try {
        await unlink(filePath);
        deleted.push(filePath);
      } catch (error) {
        console.warn(`Failed to delete tmp file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  return deleted;
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && (error as NodeJS.ErrnoException).code === code;
}

/** True if something (file, directory or link) exists at the path. */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

/** True if the path is a regular file with an execute bit the process can use. */
export async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Size of a regular file in bytes, or 0 when it is absent. */
export async function fileSize(path: string): Promise<number> {
  try {
    const stats = await stat(path);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
}

export async function removePath(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/** Removes and recreates a directory. */
export async function resetDirectory(path: string): Promise<void> {
  await removePath(path);
  await mkdir(path, { recursive: true });
}

/**
 * Copies a directory tree, keeping symlinks as links.
 */
export async function copyTree(source: string, destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  await cp(source, destination, {
    recursive: true,
    verbatimSymlinks: true,
    preserveTimestamps: true,
  });
}

/**
 * Calculates the total size of a directory in bytes, like `du`.
 *
 * Symlinks count as the size of the link itself.
 *
 * @returns Total size in bytes, or 0 if the directory doesn't exist
 */
export async function directorySize(dirPath: string): Promise<number> {
  let totalSize = 0;

  let entries;
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch {
    return 0;
  }

  for (const entry of entries) {
    const entryPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      totalSize += await directorySize(entryPath);
    } else {
      const stats = await lstat(entryPath);
      totalSize += stats.size;
    }
  }

  return totalSize;
}

/** Kind of a tree entry, as listed by listTree. */
export type TreeEntryKind = 'file' | 'directory' | 'symlink';

export interface TreeEntry {
  /** Path relative to the tree root, always with `/` separators */
  path: string;
  kind: TreeEntryKind;
}

/**
 * Lists every entry below `root` in sorted order.
 *
 * Directories come before their contents. Symlinked directories are not
 * descended into.
 */
export async function listTree(root: string): Promise<TreeEntry[]> {
  const result: TreeEntry[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const absolute = join(dir, entry.name);
      const path = relative(root, absolute).split(sep).join('/');
      if (entry.isSymbolicLink()) {
        result.push({ path, kind: 'symlink' });
      } else if (entry.isDirectory()) {
        result.push({ path, kind: 'directory' });
        await walk(absolute);
      } else if (entry.isFile()) {
        result.push({ path, kind: 'file' });
      }
    }
  }

  await walk(root);
  return result;
}

/** sha256 of a file's content, hex encoded. */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
