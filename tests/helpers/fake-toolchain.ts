/**
 * In-process stand-in for the external tools the pipeline drives.
 *
 * Each tool is simulated against the real filesystem so stages can be
 * checked by what they leave on disk. Executables are text files whose
 * lines `binary:<arch>` name the architectures they carry.
 */

import { chmod, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join } from 'node:path';
import type { CommandOptions, CommandResult, CommandRunner } from '@/lib/exec.js';
import { renderPlist } from '@/lib/plist.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: CommandOptions;
}

export type ToolHandler = (args: string[], options: CommandOptions) => Promise<CommandResult> | CommandResult;

export interface FakeToolchainOptions {
  /** Commands `which` resolves; absolute paths always resolve */
  available?: Iterable<string>;
  /** Directory volumes are mounted under */
  volumeRoot: string;
  /** Name the bundler is invoked as */
  bundlerCommand?: string;
  platform?: 'macos' | 'linux';
  /** Content of Resources/data.txt per architecture; defaults to "shared" */
  resourceContent?: Record<string, string>;
}

export const DEFAULT_TOOLS = [
  'pyinstaller',
  'lipo',
  'hdiutil',
  'osascript',
  'iconutil',
  'rsvg-convert',
  'sips',
  'magick',
  'qlmanage',
];

export function ok(stdout = ''): CommandResult {
  return { code: 0, stdout, stderr: '', duration_ms: 1, timed_out: false };
}

export function failed(code: number, stderr = ''): CommandResult {
  return { code, stdout: '', stderr, duration_ms: 1, timed_out: false };
}

function argAfter(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

async function archsOf(path: string): Promise<string[] | null> {
  try {
    const content = await readFile(path, 'utf-8');
    return content
      .split('\n')
      .filter((line) => line.startsWith('binary:'))
      .map((line) => line.slice('binary:'.length));
  } catch {
    return null;
  }
}

export class FakeToolchain implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly available: Set<string>;
  private readonly handlers = new Map<string, ToolHandler>();
  private readonly overrides = new Map<string, ToolHandler>();
  private lastVolumeName = 'Volume';
  /** Entries found on the volume when it was detached */
  volumeEntries: string[] = [];

  constructor(private readonly options: FakeToolchainOptions) {
    this.available = new Set(options.available ?? DEFAULT_TOOLS);
    this.handlers.set(options.bundlerCommand ?? 'pyinstaller', (args, opts) => this.simulateBundler(args, opts));
    this.handlers.set('lipo', (args) => this.simulateLipo(args));
    this.handlers.set('hdiutil', (args) => this.simulateHdiutil(args));
    this.handlers.set('iconutil', (args) => this.writeOutput(args[args.indexOf('-o') + 1], 'icns'));
    this.handlers.set('rsvg-convert', (args) => this.writeOutput(argAfter(args, '-o'), `png:${args[1]}`));
    this.handlers.set('sips', (args) => this.writeOutput(argAfter(args, '--out'), `png:${args[1]}`));
    this.handlers.set('magick', (args) => this.writeOutput(args[args.length - 1], 'png'));
    this.handlers.set('qlmanage', (args) => {
      const outDir = argAfter(args, '-o') ?? '.';
      return this.writeOutput(join(outDir, `${basename(args[args.length - 1])}.png`), 'png:1024');
    });
    this.handlers.set('osascript', () => ok());
  }

  /** Replaces the simulation of `command`. */
  on(command: string, handler: ToolHandler): this {
    this.overrides.set(command, handler);
    return this;
  }

  callsTo(command: string): RecordedCall[] {
    return this.calls.filter((call) => call.command === command);
  }

  async which(command: string): Promise<string | null> {
    if (isAbsolute(command)) return command;
    return this.available.has(command) ? `/usr/bin/${command}` : null;
  }

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args: [...args], options });
    const handler = this.overrides.get(command) ?? this.handlers.get(command);
    if (handler) {
      return handler([...args], options);
    }
    if (isAbsolute(command) && basename(command).startsWith('appimagetool')) {
      return this.appimagetool([...args]);
    }
    return { ...failed(127), error: `spawn ${command} ENOENT` };
  }

  private async writeOutput(path: string | undefined, content: string): Promise<CommandResult> {
    if (path === undefined) return failed(2, 'no output path');
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
    return ok();
  }

  /** Default bundler behaviour, for overrides that fail one architecture. */
  async simulateBundler(args: string[], options: CommandOptions): Promise<CommandResult> {
    const name = argAfter(args, '--name');
    const dist = argAfter(args, '--distpath');
    const arch = argAfter(args, '--target-architecture') ?? options.env?.TARGET_ARCH;
    if (!name || !dist || !arch) return failed(2, 'usage: pyinstaller --name N --distpath D');

    const resources = this.options.resourceContent?.[arch] ?? 'shared';
    if ((this.options.platform ?? 'macos') === 'macos') {
      const root = join(dist, `${name}.app`, 'Contents');
      await mkdir(join(root, 'MacOS'), { recursive: true });
      await mkdir(join(root, 'Resources'), { recursive: true });
      await writeFile(join(root, 'MacOS', name), `binary:${arch}\n`);
      await chmod(join(root, 'MacOS', name), 0o755);
      await writeFile(join(root, 'Resources', 'data.txt'), resources);
      await writeFile(join(root, 'Info.plist'), renderPlist({ CFBundleName: 'placeholder', NSHighResolutionCapable: 'true' }));
    } else {
      const root = join(dist, name);
      await mkdir(root, { recursive: true });
      await writeFile(join(root, name), `binary:${arch}\n`);
      await chmod(join(root, name), 0o755);
      await writeFile(join(root, 'data.txt'), resources);
    }
    return ok(`Building ${name} for ${arch}`);
  }

  /** Default lipo behaviour, for overrides that misreport one call. */
  async simulateLipo(args: string[]): Promise<CommandResult> {
    if (args[0] === '-archs') {
      const archs = await archsOf(args[1]);
      return archs === null ? failed(1, `can't open input file: ${args[1]}`) : ok(`${archs.join(' ')}\n`);
    }
    if (args[0] === '-create') {
      const output = argAfter(args, '-output');
      const inputs = args.slice(1, args.indexOf('-output'));
      const archs: string[] = [];
      for (const input of inputs) {
        const found = await archsOf(input);
        if (found === null) return failed(1, `can't open input file: ${input}`);
        archs.push(...found);
      }
      return this.writeOutput(output, archs.map((arch) => `binary:${arch}\n`).join(''));
    }
    return failed(1, 'unknown lipo operation');
  }

  /** Default hdiutil behaviour, for overrides that change a single verb. */
  async simulateHdiutil(args: string[]): Promise<CommandResult> {
    const mountPoint = join(this.options.volumeRoot, this.lastVolumeName);
    switch (args[0]) {
      case 'create':
        this.lastVolumeName = argAfter(args, '-volname') ?? 'Volume';
        return this.writeOutput(args[args.length - 1], 'rw-image');
      case 'attach':
        await mkdir(mountPoint, { recursive: true });
        return ok(`/dev/disk4\tGUID_partition_scheme\t\n/dev/disk4s1\tApple_HFS\t${mountPoint}\n`);
      case 'detach':
        this.volumeEntries = (await readdir(mountPoint).catch((): string[] => [])).sort();
        await rm(mountPoint, { recursive: true, force: true });
        return ok(`"disk4" ejected.\n`);
      case 'convert':
        return this.writeOutput(argAfter(args, '-o'), `udzo:${this.volumeEntries.join(',')}`);
      default:
        return failed(1, `unknown verb ${args[0]}`);
    }
  }

  private async appimagetool(args: string[]): Promise<CommandResult> {
    if (args.includes('--version')) {
      return ok('appimagetool, continuous build\n');
    }
    const [, , output] = args;
    return this.writeOutput(output, 'appimage');
  }
}
