import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_PRESENTATION } from '@/lib/config.js';
import { OsascriptPresentation, PresentationError, renderFinderScript, type PresentationRequest } from '@/lib/presentation.js';
import { join } from 'node:path';
import { writeFile } from 'node:fs/promises';
import { FakeToolchain, failed } from '../helpers/fake-toolchain.js';
import { makeTempDir, removeTempDir } from '../helpers/project.js';

function request(overrides: Partial<PresentationRequest> = {}): PresentationRequest {
  return {
    volume_name: 'Sample App',
    mount_point: '/Volumes/Sample App',
    app_bundle: 'Sample App.app',
    install_link: 'Applications',
    background: null,
    settings: DEFAULT_PRESENTATION,
    ...overrides,
  };
}

describe('renderFinderScript', () => {
  it('should place the bundle and the install link', () => {
    const script = renderFinderScript(
      'bounds {{{window_bounds}}}\n{{background_line}}\n"{{app_bundle}}" {{{app_position}}}\n"{{install_link}}" {{{install_link_position}}}\n{{volume_name}} {{icon_size}}',
      request()
    );

    expect(script).toBe(
      'bounds {400, 100, 900, 430}\n\n"Sample App.app" {125, 150}\n"Applications" {375, 150}\nSample App 100'
    );
  });

  it('should escape quotes in names', () => {
    expect(renderFinderScript('{{volume_name}}', request({ volume_name: 'Say "hi"' }))).toBe('Say \\"hi\\"');
  });

  it('should reference the background in Finder path syntax', () => {
    expect(renderFinderScript('{{background_line}}', request({ background: '.background/bg.png' }))).toBe(
      '        set background picture of viewOptions to file ".background:bg.png"'
    );
  });
});

describe('OsascriptPresentation', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('bundlesmith-presentation');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should feed the rendered script on stdin', async () => {
    const runner = new FakeToolchain({ volumeRoot: root });

    await new OsascriptPresentation(runner).apply(request());

    const [call] = runner.callsTo('osascript');
    expect(call.args).toEqual(['-']);
    expect(call.options.input).toContain('tell disk "Sample App"');
    expect(call.options.timeoutMs).toBe(60_000);
  });

  it('should use a custom script file', async () => {
    const runner = new FakeToolchain({ volumeRoot: root });
    const scriptFile = join(root, 'layout.applescript');
    await writeFile(scriptFile, 'custom {{app_bundle}}');

    await new OsascriptPresentation(runner).apply(request({ settings: { ...DEFAULT_PRESENTATION, script_file: scriptFile } }));

    expect(runner.callsTo('osascript')[0].options.input).toBe('custom Sample App.app');
  });

  it('should raise PresentationError when osascript fails', async () => {
    const runner = new FakeToolchain({ volumeRoot: root }).on('osascript', () =>
      failed(1, 'execution error: Finder got an error (-1712)')
    );

    const error = await new OsascriptPresentation(runner).apply(request()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PresentationError);
    expect(error instanceof PresentationError && error.message).toBe('osascript failed (exit code 1)');
    expect(error instanceof PresentationError && error.output).toBe('execution error: Finder got an error (-1712)');
  });
});
