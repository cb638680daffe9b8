/**
 * JobRunner port for executing one configuration unit.
 * Purpose: keep the batch controller independent of how a worker is launched.
 * Assumptions: callers invoke runners strictly one at a time; runners do not lock output.
 */

import type { ConfigUnit } from "../../../core/config-enumerator.js";

// =============================================================================
// TYPES
// =============================================================================

export type JobOptions = {
  debug: boolean;
  download: boolean;
};

export type JobResult = {
  unit: ConfigUnit;
  exitCode: number;
  errorDetail?: string;
  durationMs: number;
};

export type JobExecuteContext = {
  signal?: AbortSignal;
};

export type JobRunner = {
  execute(unit: ConfigUnit, options: JobOptions, context?: JobExecuteContext): Promise<JobResult>;
};

// =============================================================================
// HELPERS
// =============================================================================

export function isJobSuccess(result: JobResult): boolean {
  return result.exitCode === 0;
}
