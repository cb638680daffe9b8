/**
 * Batch state machine.
 * Purpose: make the fail-fast loop explicit instead of tracking a mutable "last status".
 * Transitions are pure; invalid transitions throw so controller bugs surface in tests.
 */

import type { ConfigUnit } from "../../../core/config-enumerator.js";
import { CacheRefreshError } from "../../../core/errors.js";
import { isJobSuccess, type JobResult } from "../workers/job-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type BatchState =
  | { kind: "pending"; unitsRun: number }
  | { kind: "running"; unitsRun: number; unit: ConfigUnit }
  | { kind: "succeeded"; unitsRun: number }
  | { kind: "failed_at"; unitsRun: number; result: JobResult }
  | { kind: "failed"; unitsRun: number; error: string }
  | { kind: "aborted"; unitsRun: number; signal: string };

export type TerminalBatchState = Extract<
  BatchState,
  { kind: "succeeded" | "failed_at" | "failed" | "aborted" }
>;

export type BatchEvent =
  | { type: "unit.start"; unit: ConfigUnit }
  | { type: "unit.finish"; result: JobResult }
  | { type: "units.exhausted" }
  | { type: "error"; message: string }
  | { type: "signal"; signal: string };

export class BatchStateError extends CacheRefreshError {
  constructor(state: BatchState, event: BatchEvent) {
    super(`Invalid batch transition: ${event.type} while ${state.kind}`);
    this.name = "BatchStateError";
  }
}

// =============================================================================
// TRANSITIONS
// =============================================================================

export const initialBatchState: BatchState = { kind: "pending", unitsRun: 0 };

export function transitionBatchState(state: BatchState, event: BatchEvent): BatchState {
  if (isTerminalBatchState(state)) {
    throw new BatchStateError(state, event);
  }

  if (event.type === "signal") {
    return { kind: "aborted", unitsRun: state.unitsRun, signal: event.signal };
  }

  switch (state.kind) {
    case "pending":
      if (event.type === "unit.start") {
        return { kind: "running", unitsRun: state.unitsRun, unit: event.unit };
      }
      if (event.type === "units.exhausted") {
        return { kind: "succeeded", unitsRun: state.unitsRun };
      }
      if (event.type === "error") {
        return { kind: "failed", unitsRun: state.unitsRun, error: event.message };
      }
      break;
    case "running":
      if (event.type === "unit.finish" && event.result.unit.id === state.unit.id) {
        const unitsRun = state.unitsRun + 1;
        return isJobSuccess(event.result)
          ? { kind: "pending", unitsRun }
          : { kind: "failed_at", unitsRun, result: event.result };
      }
      break;
  }

  throw new BatchStateError(state, event);
}

export function isTerminalBatchState(state: BatchState): state is TerminalBatchState {
  return (
    state.kind === "succeeded" ||
    state.kind === "failed_at" ||
    state.kind === "failed" ||
    state.kind === "aborted"
  );
}
