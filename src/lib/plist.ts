/**
 * Minimal XML property-list handling for bundle manifests.
 *
 * Only top-level string values are read or written; every other entry of
 * an existing manifest is left untouched.
 */

const PLIST_HEADER = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">
<plist version="1.0">
<dict>
`;

const PLIST_FOOTER = `</dict>
</plist>
`;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function unescapeXml(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Renders a manifest holding only string values, in insertion order. */
export function renderPlist(values: Readonly<Record<string, string>>): string {
  const body = Object.entries(values)
    .map(([key, value]) => `    <key>${escapeXml(key)}</key>\n    <string>${escapeXml(value)}</string>\n`)
    .join('');
  return PLIST_HEADER + body + PLIST_FOOTER;
}

/**
 * Reads every `<key>` followed directly by a `<string>` value.
 */
export function readPlistStrings(xml: string): Record<string, string> {
  const result: Record<string, string> = {};
  const pattern = /<key>([^<]*)<\/key>\s*<string>([^<]*)<\/string>/g;
  for (const match of xml.matchAll(pattern)) {
    result[unescapeXml(match[1])] = unescapeXml(match[2]);
  }
  return result;
}

/**
 * Sets string values in an existing manifest.
 *
 * Keys already holding a string are replaced in place; missing keys are
 * appended before the closing `</dict>` of the top-level dictionary.
 */
export function setPlistStrings(xml: string, values: Readonly<Record<string, string>>): string {
  let output = xml;
  const appended: string[] = [];

  for (const [key, value] of Object.entries(values)) {
    const pattern = new RegExp(`(<key>${escapeRegExp(escapeXml(key))}</key>\\s*<string>)[^<]*(</string>)`);
    if (pattern.test(output)) {
      output = output.replace(pattern, (_match, open: string, close: string) => `${open}${escapeXml(value)}${close}`);
    } else {
      appended.push(`    <key>${escapeXml(key)}</key>\n    <string>${escapeXml(value)}</string>\n`);
    }
  }

  if (appended.length === 0) {
    return output;
  }

  const closing = output.lastIndexOf('</dict>');
  if (closing === -1) {
    return renderPlist({ ...readPlistStrings(output), ...values });
  }
  return output.slice(0, closing) + appended.join('') + output.slice(closing);
}
