import type { JobResult } from "../workers/job-runner.js";
import { GENERIC_FAILURE_EXIT_CODE } from "../workers/process-job-runner.js";

import type { TerminalBatchState } from "./batch-state.js";

export type BatchStatus = "success" | "failure";

export type BatchResult = Readonly<{
  status: BatchStatus;
  failure?: JobResult;
  error?: string;
  // ISO 8601, UTC.
  completedAt: string;
  unitsRun: number;
  unitsTotal: number;
}>;

export type CompletedBatchState = Exclude<TerminalBatchState, { kind: "aborted" }>;

export function buildBatchResult(
  state: CompletedBatchState,
  meta: { completedAt: Date; unitsTotal: number },
): BatchResult {
  const base = {
    completedAt: meta.completedAt.toISOString(),
    unitsRun: state.unitsRun,
    unitsTotal: meta.unitsTotal,
  };

  switch (state.kind) {
    case "succeeded":
      return Object.freeze({ ...base, status: "success" });
    case "failed_at":
      return Object.freeze({ ...base, status: "failure", failure: state.result });
    case "failed":
      return Object.freeze({ ...base, status: "failure", error: state.error });
  }
}

export function resolveBatchExitCode(result: BatchResult): number {
  if (result.status === "success") return 0;
  const code = result.failure?.exitCode;
  return code !== undefined && code !== 0 ? code : GENERIC_FAILURE_EXIT_CODE;
}
