/**
 * Shared assembler types.
 */

import type { WarningCode } from '../../constants/failure_codes.js';
import type { PackageImage } from '../../types/artifact.js';
import type { CommandRunner } from '../../lib/exec.js';
import type { PresentationScript } from '../../lib/presentation.js';
import type { ToolCache } from '../../lib/tool_cache.js';

export interface AssemblyWarning {
  code: WarningCode;
  message: string;
}

export interface AssemblyOutcome {
  image: PackageImage;
  warnings: AssemblyWarning[];
}

export interface AssemblerDeps {
  runner: CommandRunner;
  /** Disk image layout; omitted means no layout is applied */
  presentation?: PresentationScript;
  /** Source of appimagetool */
  toolCache?: ToolCache;
  /** Delay used between mount polls */
  sleep?: (ms: number) => Promise<void>;
}
