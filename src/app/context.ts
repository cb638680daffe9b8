/**
 * AppContext wires a validated BatchConfig into a ready-to-run BatchController.
 * Purpose: keep the CLI free of construction details and let tests swap single collaborators.
 * Usage: const ctx = createAppContext({ config }); try { await ctx.controller.run(...) } finally { ctx.close(); }
 */

import type { BatchConfig } from "../core/config.js";
import { createFileBatchLock } from "../core/batch-lock.js";
import { DirectoryConfigEnumerator } from "../core/config-enumerator.js";
import { JsonlLogger, type BatchEventLogger } from "../core/logger.js";
import type { CommandRunner } from "../core/process.js";
import { defaultBatchId } from "../core/utils.js";

import { ArtifactFinalizer } from "./orchestrator/finalize/artifact-finalizer.js";
import { CommandMailTransport } from "./orchestrator/notify/mail-transport.js";
import { Notifier, type MailTransport } from "./orchestrator/notify/notifier.js";
import { BatchController, type BatchControllerDeps } from "./orchestrator/run/batch-controller.js";
import type { JobRunner } from "./orchestrator/workers/job-runner.js";
import { ProcessJobRunner } from "./orchestrator/workers/process-job-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  batchId: string;
  config: BatchConfig;
  logger: BatchEventLogger;
  controller: BatchController;
  close: () => void;
};

export type CreateAppContextInput = {
  config: BatchConfig;
  batchId?: string;
  logger?: BatchEventLogger;
  jobRunner?: JobRunner;
  mailTransport?: MailTransport;
  runCommand?: CommandRunner;
  signalSource?: BatchControllerDeps["signalSource"];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const { config } = input;
  const batchId = input.batchId ?? defaultBatchId();
  const logger = input.logger ?? new JsonlLogger(config.log_path, { batchId }, config.debug);

  const controller = new BatchController({
    lock: createFileBatchLock(config.lock_path),
    enumerator: new DirectoryConfigEnumerator(config.config_suffix),
    jobRunner: input.jobRunner ?? new ProcessJobRunner(config.worker),
    finalizer: new ArtifactFinalizer({
      markerFilename: config.marker_filename,
      label: config.label,
      hardlink: config.hardlink,
      logger,
      runCommand: input.runCommand,
    }),
    notifier: new Notifier({
      transport: input.mailTransport ?? new CommandMailTransport(config.mail.command, input.runCommand),
      productName: config.product_name,
      logger,
    }),
    logger,
    outputDir: config.output_dir,
    recipient: config.recipient,
    signalSource: input.signalSource,
  });

  return {
    batchId,
    config,
    logger,
    controller,
    close: () => logger.close(),
  };
}
