/**
 * Linux AppImage assembly.
 *
 * Lays out an AppDir around the bundle (launcher, desktop entry, icon,
 * AppStream metadata) and packs it with appimagetool, which is fetched
 * through the tool cache on first use.
 */

import { chmod, copyFile, mkdir, symlink, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { IconChoice, MergedArtifact } from '../../types/artifact.js';
import type { Architecture, BuildConfig } from '../../types/config.js';
import { AssemblyError } from '../../types/errors.js';
import { describeFailure, succeeded } from '../../lib/exec.js';
import { copyTree, pathExists, removePath, resetDirectory } from '../../lib/fs.js';
import { logInfo, tail } from '../../lib/log.js';
import { appSlug, imagePath } from '../../lib/paths.js';
import { escapeXml } from '../../lib/plist.js';
import { loadTemplate, renderTemplate } from '../../lib/template.js';
import { finalizeImage } from './finalize.js';
import { iconSourceFor } from './staging.js';
import type { AssemblerDeps, AssemblyOutcome } from './types.js';

/** Architecture names as appimagetool expects them in ARCH. */
const APPIMAGE_ARCH: Readonly<Record<Architecture, string>> = {
  x86_64: 'x86_64',
  arm64: 'aarch64',
};

const ICON_EXTENSIONS = new Set(['.png', '.svg']);

export function appDirPath(config: Pick<BuildConfig, 'work_dir' | 'app_name'>): string {
  return join(config.work_dir, `${config.app_name}.AppDir`);
}

/**
 * Icon for the AppDir: the rendered set, else the default icon, else the
 * master icon itself when appimagetool can use it directly.
 */
async function pickIcon(icon: IconChoice, config: BuildConfig): Promise<string | null> {
  const candidates = [iconSourceFor(icon, config), config.default_icon_path, config.icon_path];
  for (const candidate of candidates) {
    if (candidate !== null && ICON_EXTENSIONS.has(extname(candidate).toLowerCase()) && (await pathExists(candidate))) {
      return candidate;
    }
  }
  return null;
}

/**
 * Writes the AppDir for `artifact`.
 *
 * @returns The AppDir path
 * @throws {AssemblyError} If no usable icon exists
 */
export async function buildAppDir(artifact: MergedArtifact, icon: IconChoice, config: BuildConfig): Promise<string> {
  const appDir = appDirPath(config);
  const slug = appSlug(config.app_name);
  const bundleName = basename(artifact.root);

  const iconSource = await pickIcon(icon, config);
  if (iconSource === null) {
    throw new AssemblyError(
      'An AppImage needs a PNG or SVG icon',
      'Set icon (SVG or PNG) or default_icon (PNG) in bundlesmith.json.'
    );
  }

  await resetDirectory(appDir);
  await copyTree(artifact.root, join(appDir, 'usr', 'lib', bundleName));

  const appRun = join(appDir, 'AppRun');
  await writeFile(
    appRun,
    renderTemplate(await loadTemplate('AppRun'), { bundle_dir: bundleName, executable: artifact.executable }),
    'utf-8'
  );
  await chmod(appRun, 0o755);

  const desktop = renderTemplate(await loadTemplate('app.desktop'), {
    name: config.app_name,
    exec: 'AppRun',
    icon: slug,
    version: config.version,
  });
  await writeFile(join(appDir, `${slug}.desktop`), desktop, 'utf-8');
  await mkdir(join(appDir, 'usr', 'share', 'applications'), { recursive: true });
  await writeFile(join(appDir, 'usr', 'share', 'applications', `${slug}.desktop`), desktop, 'utf-8');

  const iconFile = `${slug}${extname(iconSource).toLowerCase()}`;
  await copyFile(iconSource, join(appDir, iconFile));
  await symlink(iconFile, join(appDir, '.DirIcon'));

  const metainfo = renderTemplate(await loadTemplate('appstream.metainfo.xml'), {
    identifier: escapeXml(config.bundle_identifier),
    name: escapeXml(config.app_name),
    desktop_id: `${slug}.desktop`,
    version: escapeXml(config.version),
  });
  await mkdir(join(appDir, 'usr', 'share', 'metainfo'), { recursive: true });
  await writeFile(join(appDir, 'usr', 'share', 'metainfo', `${config.bundle_identifier}.appdata.xml`), metainfo, 'utf-8');

  return appDir;
}

/**
 * Builds the AppImage.
 *
 * @throws {FetchError} If appimagetool cannot be acquired
 * @throws {AssemblyError} If appimagetool fails or leaves no image
 */
export async function assembleAppImage(
  artifact: MergedArtifact,
  icon: IconChoice,
  config: BuildConfig,
  deps: AssemblerDeps
): Promise<AssemblyOutcome> {
  if (!deps.toolCache) {
    throw new AssemblyError('AppImage assembly needs a tool cache for appimagetool');
  }
  if (artifact.architectures.length !== 1) {
    throw new AssemblyError(`An AppImage holds one architecture, got ${artifact.architectures.join(', ')}`);
  }

  const tool = config.tools.appimagetool;
  const appimagetool = await deps.toolCache.acquire('appimagetool', tool.version, tool.url, tool.smoke_args);

  const appDir = await buildAppDir(artifact, icon, config);
  const finalPath = imagePath(config);
  await removePath(finalPath);
  await mkdir(config.dist_dir, { recursive: true });

  logInfo(`Packing ${basename(appDir)}`);
  const result = await deps.runner.run(appimagetool, ['--appimage-extract-and-run', appDir, finalPath], {
    env: { ARCH: APPIMAGE_ARCH[artifact.architectures[0]] },
    timeoutMs: 10 * 60_000,
  });
  if (!succeeded(result)) {
    throw new AssemblyError(`appimagetool failed (${describeFailure(result)}): ${tail(result.stderr, 5)}`);
  }
  if (await pathExists(finalPath)) {
    await chmod(finalPath, 0o755);
  }

  return { image: await finalizeImage(config, finalPath), warnings: [] };
}
