/**
 * ArtifactFinalizer runs the post-success pass over the output area.
 * Purpose: relabel served content, optionally dedup with hard links, then stamp the completion marker.
 * Assumptions: only called after every unit succeeded; every step here is best-effort and
 * reports warnings instead of throwing.
 * Usage: const report = await finalizer.finalize(outputDir, batchResult.completedAt, { signal })
 */

import path from "node:path";

import type { LabelConfig } from "../../../core/config.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logBatchEvent, type BatchEventLogger } from "../../../core/logger.js";
import { describeCommand, runCommand, type CommandRunner } from "../../../core/process.js";
import { ensureDir, writeTextFile } from "../../../core/utils.js";

import { hardlinkDuplicates } from "./hardlink-dedup.js";

// =============================================================================
// TYPES
// =============================================================================

export type FinalizeReport = {
  markerPath?: string;
  warnings: string[];
  linked: number;
  // Set when the signal fired part way; the marker is then left untouched.
  aborted: boolean;
};

export type FinalizeContext = {
  signal?: AbortSignal;
};

export type ArtifactFinalizerOptions = {
  markerFilename: string;
  label: LabelConfig;
  hardlink: boolean;
  logger: BatchEventLogger;
  runCommand?: CommandRunner;
};

export type Finalizer = {
  finalize(outputDir: string, completedAt: string, context?: FinalizeContext): Promise<FinalizeReport>;
};

// =============================================================================
// FINALIZER
// =============================================================================

export class ArtifactFinalizer implements Finalizer {
  private readonly run: CommandRunner;

  constructor(private readonly options: ArtifactFinalizerOptions) {
    this.run = options.runCommand ?? runCommand;
  }

  async finalize(
    outputDir: string,
    completedAt: string,
    context: FinalizeContext = {},
  ): Promise<FinalizeReport> {
    const { signal } = context;
    const report: FinalizeReport = { warnings: [], linked: 0, aborted: false };
    const warn = (step: string, message: string): void => {
      report.warnings.push(`${step}: ${message}`);
      logBatchEvent(this.options.logger, "finalize.warning", { step, message });
    };
    const stopped = (): boolean => {
      if (signal?.aborted) report.aborted = true;
      return report.aborted;
    };

    if (this.options.label.enabled && !stopped()) {
      await this.relabel(outputDir, warn, signal);
    }

    if (this.options.hardlink && !stopped()) {
      try {
        const dedup = await hardlinkDuplicates(outputDir, {
          exclude: [this.options.markerFilename],
          signal,
        });
        report.linked = dedup.linked;
        for (const failure of dedup.failures) {
          warn("hardlink", `${failure.path}: ${failure.message}`);
        }
        logBatchEvent(this.options.logger, "finalize.dedup", {
          scanned: dedup.scanned,
          linked: dedup.linked,
          bytes_saved: dedup.bytesSaved,
          failed: dedup.failures.length,
        });
      } catch (err) {
        warn("hardlink", formatErrorMessage(err));
      }
    }

    // Stamped last so an aborted pass never leaves a fresh marker.
    if (stopped()) return report;

    const markerPath = path.join(outputDir, this.options.markerFilename);
    try {
      await ensureDir(outputDir);
      await writeTextFile(markerPath, `${completedAt}\n`);
      report.markerPath = markerPath;
    } catch (err) {
      warn("marker", formatErrorMessage(err));
    }

    return report;
  }

  private async relabel(
    outputDir: string,
    warn: (step: string, message: string) => void,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const { command } = this.options.label;
    const args = [...this.options.label.args, outputDir];
    try {
      const res = await this.run(command, args, { signal });
      if (signal?.aborted) return;
      if (res.exitCode !== 0) {
        const stderr = res.stderr.trim();
        warn(
          "label",
          `${describeCommand(command, args)} exited with code ${res.exitCode}${stderr ? `: ${stderr}` : ""}`,
        );
      }
    } catch (err) {
      warn("label", formatErrorMessage(err));
    }
  }
}
