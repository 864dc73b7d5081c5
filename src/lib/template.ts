/**
 * Text templates shipped in templates/.
 *
 * Placeholders are written `{{name}}`. Every placeholder must have a value.
 */

import { readFile } from 'node:fs/promises';

const TEMPLATES_DIR = new URL('../../templates/', import.meta.url);

export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly placeholder?: string
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

/** Reads a template from the bundled templates directory, or from an absolute path. */
export async function loadTemplate(nameOrPath: string): Promise<string> {
  const location = nameOrPath.startsWith('/') ? nameOrPath : new URL(nameOrPath, TEMPLATES_DIR);
  return readFile(location, 'utf-8');
}

/**
 * Replaces `{{name}}` placeholders.
 *
 * @throws {TemplateError} If a placeholder has no value
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new TemplateError(`No value for template placeholder {{${name}}}`, name);
    }
    return value;
  });
}
