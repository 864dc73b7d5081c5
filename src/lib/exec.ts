/**
 * External process execution.
 *
 * Every stage reaches external tools (bundler, lipo, hdiutil, converters)
 * through the CommandRunner interface so the pipeline can be exercised
 * against an in-process toolchain. Commands are spawned from argv arrays,
 * never through a shell.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { delimiter, isAbsolute, join } from 'node:path';
import { isExecutableFile } from './fs.js';

export interface CommandOptions {
  cwd?: string;
  /** Extra variables merged over the parent environment */
  env?: Record<string, string>;
  /** Kill the process after this many milliseconds (0 = no limit) */
  timeoutMs?: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  /** Stream output to this process's stdout/stderr instead of capturing it */
  inheritOutput?: boolean;
}

export interface CommandResult {
  /** Exit code, or null when the process was killed or failed to start */
  code: number | null;
  stdout: string;
  stderr: string;
  duration_ms: number;
  timed_out: boolean;
  /** Spawn error message (e.g. ENOENT), if the process never ran */
  error?: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
  /** Resolves a command on PATH, or returns null if it is not available. */
  which(command: string): Promise<string | null>;
}

/** Renders a command for log and error messages. */
export function renderCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

export function succeeded(result: CommandResult): boolean {
  return result.code === 0 && !result.timed_out && result.error === undefined;
}

/** One-line description of why a command failed. */
export function describeFailure(result: CommandResult): string {
  if (result.error) return result.error;
  if (result.timed_out) return `timed out after ${result.duration_ms}ms`;
  return `exit code ${result.code ?? 'null'}`;
}

/**
 * CommandRunner backed by node:child_process.spawn.
 */
export class SpawnRunner implements CommandRunner {
  constructor(private readonly pathValue: string = process.env.PATH ?? '') {}

  async which(command: string): Promise<string | null> {
    if (isAbsolute(command) || command.includes('/')) {
      return (await isExecutableFile(command)) ? command : null;
    }
    for (const dir of this.pathValue.split(delimiter)) {
      if (dir === '') continue;
      const candidate = join(dir, command);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise<CommandResult>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timeoutId: NodeJS.Timeout | null = null;
      let killTimerId: NodeJS.Timeout | null = null;
      let timedOut = false;
      let settled = false;
      let child: ChildProcess;

      const finish = (result: Omit<CommandResult, 'duration_ms' | 'stdout' | 'stderr' | 'timed_out'>) => {
        if (settled) return;
        settled = true;
        if (timeoutId) clearTimeout(timeoutId);
        if (killTimerId) clearTimeout(killTimerId);
        resolve({
          ...result,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          duration_ms: Date.now() - startTime,
          timed_out: timedOut,
        });
      };

      try {
        child = spawn(command, [...args], {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          shell: false,
          stdio: [
            options.input === undefined ? 'ignore' : 'pipe',
            options.inheritOutput ? 'inherit' : 'pipe',
            options.inheritOutput ? 'inherit' : 'pipe',
          ],
        });
      } catch (error) {
        finish({ code: null, error: error instanceof Error ? error.message : String(error) });
        return;
      }

      child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      if (options.input !== undefined && child.stdin) {
        child.stdin.on('error', () => {
          // The child may exit before reading its input; the exit code reports that.
        });
        child.stdin.end(options.input);
      }

      if (options.timeoutMs && options.timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          killTimerId = setTimeout(() => {
            if (child.exitCode === null) child.kill('SIGKILL');
          }, 1000);
        }, options.timeoutMs);
      }

      child.on('error', (error: Error) => {
        finish({ code: null, error: error.message });
      });

      child.on('close', (code: number | null) => {
        finish({ code });
      });
    });
  }
}
