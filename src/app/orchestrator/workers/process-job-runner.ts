/**
 * ProcessJobRunner spawns the external worker once per configuration unit.
 * Purpose: translate a unit + run options into a worker command line and an exit status.
 * Assumptions: the worker is opaque; stdout/stderr are inherited or discarded, never parsed.
 * Usage: new ProcessJobRunner(config.worker).execute(unit, { debug, download }, { signal })
 */

import { execa, ExecaError } from "execa";

import type { ConfigUnit } from "../../../core/config-enumerator.js";
import type { WorkerConfig } from "../../../core/config.js";

import type { JobExecuteContext, JobOptions, JobResult, JobRunner } from "./job-runner.js";

const FORCE_KILL_AFTER_MS = 5_000;

// Exit status used when the worker produced no usable non-zero code.
export const GENERIC_FAILURE_EXIT_CODE = 1;

// =============================================================================
// RUNNER
// =============================================================================

export class ProcessJobRunner implements JobRunner {
  constructor(private readonly worker: WorkerConfig) {}

  async execute(
    unit: ConfigUnit,
    options: JobOptions,
    context: JobExecuteContext = {},
  ): Promise<JobResult> {
    const args = buildWorkerArgs(this.worker, unit, options);
    const startedAt = Date.now();

    const result = await execa(this.worker.command, args, {
      reject: false,
      stdin: "ignore",
      stdout: this.worker.inherit_output ? "inherit" : "ignore",
      stderr: this.worker.inherit_output ? "inherit" : "ignore",
      cancelSignal: context.signal,
      forceKillAfterDelay: FORCE_KILL_AFTER_MS,
      timeout: this.worker.timeout_seconds ? this.worker.timeout_seconds * 1000 : undefined,
    });

    const durationMs = Date.now() - startedAt;

    if (!result.failed && result.exitCode === 0) {
      return { unit, exitCode: 0, durationMs };
    }

    return {
      unit,
      exitCode: resolveFailureExitCode(result.exitCode),
      errorDetail: describeFailure(result),
      durationMs,
    };
  }
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export function buildWorkerArgs(
  worker: Pick<WorkerConfig, "args" | "conf_flag" | "debug_flag" | "download_args">,
  unit: ConfigUnit,
  options: JobOptions,
): string[] {
  const args = [...worker.args, worker.conf_flag, unit.path];
  if (options.debug) args.push(worker.debug_flag);
  if (options.download) args.push(...worker.download_args);
  args.push(...unit.flags);
  return args;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFailureExitCode(exitCode: number | undefined): number {
  if (typeof exitCode === "number" && Number.isInteger(exitCode) && exitCode !== 0) {
    return exitCode;
  }
  return GENERIC_FAILURE_EXIT_CODE;
}

type FailedRun = {
  exitCode?: number;
  timedOut: boolean;
  isCanceled: boolean;
  signal?: string;
};

function describeFailure(result: FailedRun): string {
  if (result.timedOut) return "worker timed out";
  if (result.isCanceled) return "worker canceled";
  if (result.signal) return `worker terminated by ${result.signal}`;
  if (result instanceof ExecaError && result.exitCode === undefined) {
    return result.shortMessage;
  }
  return `worker exited with code ${result.exitCode ?? "unknown"}`;
}
