import { createAppContext, type AppContext, type CreateAppContextInput } from "../app/context.js";
import type { BatchOutcome } from "../app/orchestrator/run/batch-controller.js";
import type { BatchConfig } from "../core/config.js";
import { loadBatchConfig } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  LockError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";

import { toConfigOverrides, type BatchCliOptions } from "./config.js";

export type RunCommandOptions = BatchCliOptions;

export type RunCommandDeps = {
  createContext?: (input: CreateAppContextInput) => AppContext;
  loadConfig?: typeof loadBatchConfig;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function runCommand(opts: RunCommandOptions, deps: RunCommandDeps = {}): Promise<number> {
  const loadConfig = deps.loadConfig ?? loadBatchConfig;
  const createContext = deps.createContext ?? createAppContext;

  const config = loadConfig({ configPath: opts.config, overrides: toConfigOverrides(opts) });

  try {
    const ctx = createContext({ config });
    try {
      const outcome = await ctx.controller.execute(config.config_dir, {
        debug: config.debug,
        download: config.download,
      });
      printOutcome(ctx.batchId, outcome, config);
      return outcome.exitCode;
    } finally {
      ctx.close();
    }
  } catch (error) {
    throw normalizeRunCommandError(error, config);
  }
}

function printOutcome(batchId: string, outcome: BatchOutcome, config: BatchConfig): void {
  switch (outcome.kind) {
    case "already_running":
      // Another scheduled run owns the lock; stay quiet so cron does not mail on every tick.
      if (config.debug) {
        console.log(`Lock ${outcome.lockPath} is held by another run; nothing to do.`);
      }
      return;
    case "aborted":
      printLockReleaseError(outcome.lockReleaseError);
      console.error(
        `Batch ${batchId} aborted by ${outcome.signal} after ${outcome.unitsRun} unit(s)` +
          (outcome.lockReleaseError === undefined ? "; lock released." : "."),
      );
      return;
    case "completed":
      break;
  }

  printLockReleaseError(outcome.lockReleaseError);

  for (const warning of outcome.finalize?.warnings ?? []) {
    console.warn(`Warning: finalize ${warning}`);
  }

  const { result } = outcome;
  if (result.status === "success") {
    console.log(`Batch ${batchId} OK: ${result.unitsRun} unit(s) at ${result.completedAt}.`);
    return;
  }

  if (result.failure) {
    const detail = result.failure.errorDetail ? ` (${result.failure.errorDetail})` : "";
    console.error(
      `Batch ${batchId} NG: unit ${result.failure.unit.id} failed with exit code ${result.failure.exitCode}${detail}; ` +
        `${result.unitsTotal - result.unitsRun} unit(s) skipped.`,
    );
    return;
  }

  console.error(`Batch ${batchId} NG: ${result.error ?? "unknown error"}`);
}

function printLockReleaseError(message: string | undefined): void {
  if (message === undefined) return;
  console.warn(`Warning: ${message}; remove it before the next run.`);
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Batch run failed.";

function normalizeRunCommandError(error: unknown, config: BatchConfig): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  const code: UserFacingErrorCode =
    error instanceof LockError ? USER_FACING_ERROR_CODES.lock : USER_FACING_ERROR_CODES.unknown;

  return new UserFacingError({
    code,
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint:
      error instanceof LockError
        ? `Check that the directory of ${config.lock_path} exists and is writable.`
        : undefined,
    cause: error,
  });
}
