/**
 * Preflight check types.
 *
 * Preflight runs before any mutation. A missing required tool blocks the
 * run; a missing optional tool only degrades it.
 */

/** Why a tool is needed. */
export type ToolRole =
  | 'bundler'
  | 'merge'
  | 'disk-image'
  | 'presentation'
  | 'icon-converter'
  | 'icon-container';

export interface ToolRequirement {
  command: string;
  role: ToolRole;
  required: boolean;
  /** How to install the tool */
  hint: string;
}

export interface ToolCheck extends ToolRequirement {
  /** Resolved location, or null when not found on PATH */
  path: string | null;
}

/**
 * Result of running preflight checks.
 *
 * If ok is false, `missing` lists the required tools and inputs that block
 * the run.
 */
export interface PreflightResult {
  ok: boolean;
  checks: ToolCheck[];
  /** Required commands or input files that are absent */
  missing: string[];
  /** One remediation line per missing item */
  remediation: string[];
  /** Non-fatal findings */
  warnings: string[];
}
