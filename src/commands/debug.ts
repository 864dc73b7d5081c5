import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { formatVerifierReport, runInteractiveDiagnostics } from '../runner/verifier.js';
import type { StageCommandOptions } from './context.js';
import { createRunner } from './context.js';
import { inspectTarget, resolveInspectionTarget } from './verify.js';

/**
 * Inspects a bundle, then offers to relaunch it for live debugging.
 */
export async function debugCommand(path: string | undefined, options: StageCommandOptions): Promise<void> {
  const target = await resolveInspectionTarget(path, options);
  const report = await inspectTarget(target);
  for (const line of formatVerifierReport(report)) {
    console.log(line);
  }

  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });
  try {
    await runInteractiveDiagnostics(report, {
      runner: createRunner(),
      platform: target.platform,
      // End of input quits the menu.
      prompt: async (question) => (closed ? '' : rl.question(question)),
      print: (line) => console.log(line),
    });
  } finally {
    rl.close();
  }
}
