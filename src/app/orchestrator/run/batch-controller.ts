/**
 * BatchController drives one scheduled batch run.
 * Purpose: hold the single-instance lock, run every unit in order under fail-fast policy,
 * finalize on success, release the lock, then notify.
 * Assumptions: units run strictly one at a time; the worker provides no isolation of its own.
 * Usage: const exitCode = await controller.run(configDir, { debug, download })
 */

import type { ConfigEnumerator, ConfigUnit } from "../../../core/config-enumerator.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import type { BatchLock, LockToken } from "../../../core/batch-lock.js";
import { logBatchEvent, type BatchEventLogger } from "../../../core/logger.js";
import {
  createStopSignalHandler,
  type SignalSource,
  type StopSignalHandler,
} from "../../../core/stop-signal.js";
import type { FinalizeReport, Finalizer } from "../finalize/artifact-finalizer.js";
import type { BatchResult } from "./batch-result.js";
import { buildBatchResult, resolveBatchExitCode } from "./batch-result.js";
import {
  initialBatchState,
  isTerminalBatchState,
  transitionBatchState,
  type BatchState,
  type TerminalBatchState,
} from "./batch-state.js";
import type { JobOptions, JobResult, JobRunner } from "../workers/job-runner.js";
import { GENERIC_FAILURE_EXIT_CODE } from "../workers/process-job-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export const SIGNAL_ABORT_EXIT_CODE = 255;

export type StatusNotifier = {
  notify(recipient: string, result: BatchResult): Promise<boolean>;
};

export type BatchControllerDeps = {
  lock: BatchLock;
  enumerator: ConfigEnumerator;
  jobRunner: JobRunner;
  finalizer: Finalizer;
  notifier: StatusNotifier;
  logger: BatchEventLogger;
  outputDir: string;
  recipient?: string;
  signalSource?: SignalSource;
  clock?: () => Date;
};

export type BatchOutcome =
  | { kind: "already_running"; exitCode: 0; lockPath: string }
  | {
      kind: "completed";
      exitCode: number;
      result: BatchResult;
      finalize: FinalizeReport | null;
      notified: boolean;
      lockReleaseError?: string;
    }
  | {
      kind: "aborted";
      exitCode: typeof SIGNAL_ABORT_EXIT_CODE;
      signal: string;
      unitsRun: number;
      lockReleaseError?: string;
    };

type UnitsPhase = {
  state: TerminalBatchState;
  unitsTotal: number;
};

// =============================================================================
// CONTROLLER
// =============================================================================

export class BatchController {
  private readonly clock: () => Date;

  constructor(private readonly deps: BatchControllerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(configDir: string, options: JobOptions): Promise<number> {
    const outcome = await this.execute(configDir, options);
    return outcome.exitCode;
  }

  async execute(configDir: string, options: JobOptions): Promise<BatchOutcome> {
    const { logger } = this.deps;

    const acquired = await this.deps.lock.acquire();
    if (acquired.status === "held") {
      logBatchEvent(logger, "batch.lock.held", { lock_path: acquired.lockPath });
      return { kind: "already_running", exitCode: 0, lockPath: acquired.lockPath };
    }

    const stop = createStopSignalHandler({
      source: this.deps.signalSource,
      onSignal: (signal) => logBatchEvent(logger, "batch.signal", { signal }),
    });

    let phase: UnitsPhase;
    let completedAt: Date;
    let finalize: FinalizeReport | null = null;
    let lockReleaseError: string | undefined;
    try {
      logBatchEvent(logger, "batch.start", {
        config_dir: configDir,
        lock_path: acquired.token.lockPath,
        debug: options.debug,
        download: options.download,
      });

      phase = await this.runUnits(configDir, options, stop);
      completedAt = this.clock();

      if (phase.state.kind === "succeeded" && !stop.isStopped()) {
        finalize = await this.deps.finalizer.finalize(this.deps.outputDir, completedAt.toISOString(), {
          signal: stop.signal,
        });
      }
    } finally {
      try {
        lockReleaseError = await this.releaseLock(acquired.token);
      } finally {
        stop.cleanup();
      }
    }
    const lockWarning = lockReleaseError === undefined ? {} : { lockReleaseError };

    const signal = stop.stoppedBy();
    if (phase.state.kind === "aborted" || signal) {
      const signalName = phase.state.kind === "aborted" ? phase.state.signal : String(signal);
      logBatchEvent(logger, "batch.aborted", { signal: signalName, units_run: phase.state.unitsRun });
      return {
        kind: "aborted",
        exitCode: SIGNAL_ABORT_EXIT_CODE,
        signal: signalName,
        unitsRun: phase.state.unitsRun,
        ...lockWarning,
      };
    }

    const result = buildBatchResult(phase.state, { completedAt, unitsTotal: phase.unitsTotal });
    const exitCode = resolveBatchExitCode(result);
    logBatchEvent(logger, result.status === "success" ? "batch.complete" : "batch.failed", {
      exit_code: exitCode,
      units_run: result.unitsRun,
      units_total: result.unitsTotal,
      completed_at: result.completedAt,
      ...(result.failure ? { failed_unit: result.failure.unit.id } : {}),
      ...(result.error ? { error: result.error } : {}),
    });

    const notified = this.deps.recipient
      ? await this.deps.notifier.notify(this.deps.recipient, result)
      : false;

    return { kind: "completed", exitCode, result, finalize, notified, ...lockWarning };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  // A lock that cannot be removed must not mask the batch result; it is reported alongside it.
  private async releaseLock(token: LockToken): Promise<string | undefined> {
    try {
      await token.release();
      return undefined;
    } catch (err) {
      const message = formatErrorMessage(err);
      logBatchEvent(this.deps.logger, "batch.lock.release_failed", {
        lock_path: token.lockPath,
        message,
      });
      return message;
    }
  }

  private async runUnits(
    configDir: string,
    options: JobOptions,
    stop: StopSignalHandler,
  ): Promise<UnitsPhase> {
    let state: BatchState = initialBatchState;

    let units: Iterable<ConfigUnit> & { size: number };
    try {
      units = await this.deps.enumerator.list(configDir);
    } catch (err) {
      return {
        state: finish(transitionBatchState(state, { type: "error", message: formatErrorMessage(err) })),
        unitsTotal: 0,
      };
    }

    for (const unit of units) {
      if (stop.isStopped()) break;

      state = transitionBatchState(state, { type: "unit.start", unit });
      logBatchEvent(this.deps.logger, "job.start", { unitId: unit.id, path: unit.path });

      const result = await this.executeUnit(unit, options, stop.signal);

      if (stop.isStopped()) {
        logBatchEvent(this.deps.logger, "job.aborted", { unitId: unit.id });
        break;
      }

      state = transitionBatchState(state, { type: "unit.finish", result });
      logBatchEvent(this.deps.logger, result.exitCode === 0 ? "job.complete" : "job.failed", {
        unitId: unit.id,
        exit_code: result.exitCode,
        duration_ms: result.durationMs,
        ...(result.errorDetail ? { detail: result.errorDetail } : {}),
      });

      if (isTerminalBatchState(state)) {
        return { state, unitsTotal: units.size };
      }
    }

    const signal = stop.stoppedBy();
    const next = signal
      ? transitionBatchState(state, { type: "signal", signal })
      : transitionBatchState(state, { type: "units.exhausted" });
    return { state: finish(next), unitsTotal: units.size };
  }

  private async executeUnit(
    unit: ConfigUnit,
    options: JobOptions,
    signal: AbortSignal,
  ): Promise<JobResult> {
    const startedAt = Date.now();
    try {
      return await this.deps.jobRunner.execute(unit, options, { signal });
    } catch (err) {
      return {
        unit,
        exitCode: GENERIC_FAILURE_EXIT_CODE,
        errorDetail: formatErrorMessage(err),
        durationMs: Date.now() - startedAt,
      };
    }
  }
}

function finish(state: BatchState): TerminalBatchState {
  if (!isTerminalBatchState(state)) {
    throw new Error(`Batch loop ended in non-terminal state ${state.kind}`);
  }
  return state;
}
