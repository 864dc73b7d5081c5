/**
 * Single source of truth for pipeline outcome codes.
 *
 * FAILURE_CODES end the run in the FAILED phase.
 * WARNING_CODES are collected on the state and surfaced in the final report.
 */

export const FAILURE_CODES = [
  'PREREQ_MISSING',
  'FETCH_FAILED',
  'COMPILE_FAILED',
  'MERGE_FAILED',
  'ICON_FAILED',
  'ASSEMBLY_FAILED',
  'MOUNT_TIMEOUT',
  'VERIFY_FAILED',
  'INTERNAL_ERROR',
] as const;

export const WARNING_CODES = [
  'ICON_UNAVAILABLE',
  'PRESENTATION_WARNING',
  'RESOURCE_MISMATCH',
  'PREREQ_OPTIONAL_MISSING',
] as const;

export type FailureCode = typeof FAILURE_CODES[number];
export type WarningCode = typeof WARNING_CODES[number];
