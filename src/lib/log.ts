/**
 * Console logging with the tag format used across the CLI output.
 */

export function isDebugEnabled(): boolean {
  return process.env.BUNDLESMITH_DEBUG === '1';
}

export function logInfo(message: string): void {
  console.log(`[INFO]  ${message}`);
}

export function logOk(message: string): void {
  console.log(`[OK]    ${message}`);
}

export function logWarn(message: string): void {
  console.warn(`[WARN]  ${message}`);
}

export function logError(message: string): void {
  console.error(`[ERROR] ${message}`);
}

export function logDebug(message: string): void {
  if (isDebugEnabled()) {
    console.log(`[DEBUG] ${message}`);
  }
}

/** Prints a stage banner. */
export function logStage(index: number, total: number, title: string): void {
  console.log(`\n=== Step ${index}/${total}: ${title} ===`);
}

/** Last `maxLines` non-empty lines of process output, for error messages. */
export function tail(output: string, maxLines = 10): string {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
    .slice(-maxLines)
    .join('\n');
}
