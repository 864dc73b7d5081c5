/**
 * Disk image presentation (window layout, icon positions, background).
 *
 * The assembler only sees the PresentationScript interface. The default
 * implementation drives Finder through osascript; the script is fed on
 * stdin so volume names never pass through a shell.
 */

import { basename } from 'node:path';
import type { PresentationSettings } from '../types/config.js';
import { describeFailure, succeeded, type CommandRunner } from './exec.js';
import { logDebug, tail } from './log.js';
import { loadTemplate, renderTemplate } from './template.js';

export interface PresentationRequest {
  volume_name: string;
  mount_point: string;
  /** Name of the bundle at the volume root, e.g. `My App.app` */
  app_bundle: string;
  /** Name of the install-location link at the volume root */
  install_link: string;
  /** Background image path relative to the volume root, if one was copied */
  background: string | null;
  settings: Readonly<PresentationSettings>;
}

export interface PresentationScript {
  /**
   * Applies the layout to a mounted volume.
   *
   * @throws {PresentationError} If the layout could not be applied
   */
  apply(request: PresentationRequest): Promise<void>;
}

export class PresentationError extends Error {
  constructor(
    message: string,
    public readonly output: string = ''
  ) {
    super(message);
    this.name = 'PresentationError';
  }
}

const DEFAULT_TEMPLATE = 'finder-layout.applescript';

function appleScriptString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** Renders the Finder layout script for a request. */
export function renderFinderScript(template: string, request: PresentationRequest): string {
  const { settings } = request;
  const background =
    request.background === null
      ? ''
      : `        set background picture of viewOptions to file "${appleScriptString(
          request.background.split('/').join(':')
        )}"`;

  return renderTemplate(template, {
    volume_name: appleScriptString(request.volume_name),
    window_bounds: settings.window_bounds.join(', '),
    icon_size: String(settings.icon_size),
    background_line: background,
    app_bundle: appleScriptString(request.app_bundle),
    app_position: settings.app_position.join(', '),
    install_link: appleScriptString(request.install_link),
    install_link_position: settings.install_link_position.join(', '),
  });
}

export class OsascriptPresentation implements PresentationScript {
  constructor(private readonly runner: CommandRunner) {}

  async apply(request: PresentationRequest): Promise<void> {
    const templateName = request.settings.script_file ?? DEFAULT_TEMPLATE;
    let script: string;
    try {
      script = renderFinderScript(await loadTemplate(templateName), request);
    } catch (error) {
      throw new PresentationError(
        `Could not prepare ${basename(templateName)}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    logDebug(`Applying Finder layout to ${request.mount_point}`);
    const result = await this.runner.run('osascript', ['-'], {
      input: script,
      timeoutMs: request.settings.timeout_seconds * 1000,
    });
    if (!succeeded(result)) {
      throw new PresentationError(`osascript failed (${describeFailure(result)})`, tail(result.stderr));
    }
  }
}
