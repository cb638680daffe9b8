import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { acquireBatchLock, createFileBatchLock, type BatchLock } from "../../../core/batch-lock.js";
import { LockError } from "../../../core/errors.js";
import { DirectoryConfigEnumerator } from "../../../core/config-enumerator.js";
import { BatchController, SIGNAL_ABORT_EXIT_CODE } from "../run/batch-controller.js";

import {
  MemoryLogger,
  RecordingFinalizer,
  RecordingNotifier,
  ScriptedJobRunner,
  type FinalizeHook,
  type JobHook,
} from "./fakes.js";

const COMPLETED_AT = "2024-06-01T02:03:04.000Z";
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

type Harness = {
  controller: BatchController;
  configDir: string;
  lockPath: string;
  outputDir: string;
  logger: MemoryLogger;
  runner: ScriptedJobRunner;
  finalizer: RecordingFinalizer;
  notifier: RecordingNotifier;
  signals: EventEmitter;
};

type HarnessOptions = {
  units?: string[];
  exitCodes?: Record<string, number>;
  hook?: (harness: { signals: EventEmitter }) => JobHook;
  recipient?: string;
  finalizer?: RecordingFinalizer;
  finalizeHook?: (harness: { signals: EventEmitter }) => FinalizeHook;
  lock?: (lockPath: string) => BatchLock;
  createConfigDir?: boolean;
};

function makeHarness(options: HarnessOptions = {}): Harness {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "batch-controller-"));
  tempDirs.push(root);

  const configDir = path.join(root, "jobs");
  if (options.createConfigDir ?? true) {
    fs.mkdirSync(configDir);
    for (const id of options.units ?? []) {
      fs.writeFileSync(path.join(configDir, `${id}.conf`), `# ${id}\n`, "utf8");
    }
  }

  const lockPath = path.join(root, "run", "cache-refresh.lock");
  const outputDir = path.join(root, "out");
  const signals = new EventEmitter();
  const logger = new MemoryLogger();
  const runner = new ScriptedJobRunner(options.exitCodes, options.hook?.({ signals }));
  const finalizer =
    options.finalizer ?? new RecordingFinalizer(undefined, options.finalizeHook?.({ signals }));
  const notifier = new RecordingNotifier();

  const controller = new BatchController({
    lock: options.lock?.(lockPath) ?? createFileBatchLock(lockPath),
    enumerator: new DirectoryConfigEnumerator(),
    jobRunner: runner,
    finalizer,
    notifier,
    logger,
    outputDir,
    recipient: options.recipient,
    signalSource: signals,
    clock: () => new Date(COMPLETED_AT),
  });

  return { controller, configDir, lockPath, outputDir, logger, runner, finalizer, notifier, signals };
}

const OPTIONS = { debug: false, download: false };

// =============================================================================
// TESTS
// =============================================================================

describe("BatchController", () => {
  it("runs every unit in order, finalizes and exits 0", async () => {
    const h = makeHarness({ units: ["c", "a", "b"] });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome.exitCode).toBe(0);
    expect(h.runner.unitIds()).toEqual(["a", "b", "c"]);
    expect(h.finalizer.calls).toEqual([{ outputDir: h.outputDir, completedAt: COMPLETED_AT }]);
    expect(h.finalizer.contexts[0].signal?.aborted).toBe(false);
    expect(fs.existsSync(h.lockPath)).toBe(false);
    expect(h.logger.types()).toEqual([
      "batch.start",
      "job.start",
      "job.complete",
      "job.start",
      "job.complete",
      "job.start",
      "job.complete",
      "batch.complete",
    ]);

    expect(outcome.kind).toBe("completed");
    if (outcome.kind !== "completed") return;
    expect(outcome.result).toEqual({
      status: "success",
      completedAt: COMPLETED_AT,
      unitsRun: 3,
      unitsTotal: 3,
    });
    expect(outcome.notified).toBe(false);
  });

  it("passes run options through to the job runner", async () => {
    const h = makeHarness({ units: ["a"] });

    await h.controller.run(h.configDir, { debug: true, download: true });

    expect(h.runner.calls[0].options).toEqual({ debug: true, download: true });
  });

  it("stops at the first failing unit and skips finalize", async () => {
    const h = makeHarness({ units: ["a", "b", "c"], exitCodes: { b: 5 } });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome.exitCode).toBe(5);
    expect(h.runner.unitIds()).toEqual(["a", "b"]);
    expect(h.finalizer.calls).toEqual([]);
    expect(fs.existsSync(h.lockPath)).toBe(false);
    expect(h.logger.events).toContainEqual({
      type: "job.failed",
      unitId: "b",
      payload: { exit_code: 5, duration_ms: 0, detail: "worker exited with code 5" },
    });
    expect(h.logger.events.at(-1)).toEqual({
      type: "batch.failed",
      payload: {
        exit_code: 5,
        units_run: 2,
        units_total: 3,
        completed_at: COMPLETED_AT,
        failed_unit: "b",
      },
    });

    if (outcome.kind !== "completed") throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.result.failure?.unit.id).toBe("b");
    expect(outcome.finalize).toBeNull();
  });

  it("does nothing when another run holds the lock", async () => {
    const h = makeHarness({ units: ["a"], recipient: "ops@example.test" });
    fs.mkdirSync(path.dirname(h.lockPath), { recursive: true });
    fs.writeFileSync(h.lockPath, "other run\n", "utf8");

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome).toEqual({ kind: "already_running", exitCode: 0, lockPath: h.lockPath });
    expect(h.runner.calls).toEqual([]);
    expect(h.finalizer.calls).toEqual([]);
    expect(h.notifier.sent).toEqual([]);
    expect(fs.readFileSync(h.lockPath, "utf8")).toBe("other run\n");
    expect(h.logger.types()).toEqual(["batch.lock.held"]);
  });

  it("treats an empty config directory as success", async () => {
    const h = makeHarness({ units: [] });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome.exitCode).toBe(0);
    expect(h.runner.calls).toEqual([]);
    expect(h.finalizer.calls).toHaveLength(1);
  });

  it("notifies the recipient with the batch result", async () => {
    const h = makeHarness({ units: ["a"], recipient: "ops@example.test" });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(h.notifier.sent).toHaveLength(1);
    expect(h.notifier.sent[0].recipient).toBe("ops@example.test");
    expect(h.notifier.sent[0].result.status).toBe("success");
    if (outcome.kind !== "completed") throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.notified).toBe(true);
  });

  it("notifies failures too", async () => {
    const h = makeHarness({ units: ["a"], exitCodes: { a: 3 }, recipient: "ops@example.test" });

    await h.controller.execute(h.configDir, OPTIONS);

    expect(h.notifier.sent.map((s) => s.result.status)).toEqual(["failure"]);
  });

  it("aborts with 255 on a signal, skipping remaining units", async () => {
    const h = makeHarness({
      units: ["a", "b", "c"],
      recipient: "ops@example.test",
      hook:
        ({ signals }) =>
        (unit) => {
          if (unit.id === "b") signals.emit("SIGTERM", "SIGTERM");
        },
    });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome).toEqual({
      kind: "aborted",
      exitCode: SIGNAL_ABORT_EXIT_CODE,
      signal: "SIGTERM",
      unitsRun: 1,
    });
    expect(h.runner.unitIds()).toEqual(["a", "b"]);
    expect(h.finalizer.calls).toEqual([]);
    expect(h.notifier.sent).toEqual([]);
    expect(fs.existsSync(h.lockPath)).toBe(false);
    expect(h.logger.types().slice(-3)).toEqual(["batch.signal", "job.aborted", "batch.aborted"]);
    expect(h.signals.listenerCount("SIGTERM")).toBe(0);
    expect(h.signals.listenerCount("SIGINT")).toBe(0);
  });

  it("hands the abort signal to the running job", async () => {
    let seen: AbortSignal | undefined;
    const h = makeHarness({
      units: ["a"],
      hook:
        ({ signals }) =>
        (_unit, context) => {
          seen = context.signal;
          signals.emit("SIGINT", "SIGINT");
        },
    });

    await h.controller.execute(h.configDir, OPTIONS);

    expect(seen?.aborted).toBe(true);
  });

  it("fails with exit 1 when the config directory is missing", async () => {
    const h = makeHarness({ createConfigDir: false, recipient: "ops@example.test" });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome.exitCode).toBe(1);
    expect(h.finalizer.calls).toEqual([]);
    expect(fs.existsSync(h.lockPath)).toBe(false);
    expect(h.notifier.sent).toHaveLength(1);
    expect(h.notifier.sent[0].result).toEqual({
      status: "failure",
      error: `Config directory ${h.configDir} is not readable`,
      completedAt: COMPLETED_AT,
      unitsRun: 0,
      unitsTotal: 0,
    });
  });

  it("turns a job runner exception into a unit failure", async () => {
    const h = makeHarness({
      units: ["a", "b"],
      hook: () => () => {
        throw new Error("spawn blew up");
      },
    });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome.exitCode).toBe(1);
    expect(h.runner.unitIds()).toEqual(["a"]);
    if (outcome.kind !== "completed") throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.result.failure?.errorDetail).toBe("spawn blew up");
  });

  it("releases the lock when finalize throws", async () => {
    const h = makeHarness({ units: ["a"], finalizer: new RecordingFinalizer(new Error("disk full")) });

    await expect(h.controller.execute(h.configDir, OPTIONS)).rejects.toThrow("disk full");

    expect(fs.existsSync(h.lockPath)).toBe(false);
    expect(h.signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("can run again after a completed batch", async () => {
    const h = makeHarness({ units: ["a"] });

    expect(await h.controller.run(h.configDir, OPTIONS)).toBe(0);
    expect(await h.controller.run(h.configDir, OPTIONS)).toBe(0);
    expect(h.runner.unitIds()).toEqual(["a", "a"]);
  });

  it("aborts with 255 when a signal arrives during finalize", async () => {
    const h = makeHarness({
      units: ["a"],
      recipient: "ops@example.test",
      finalizeHook:
        ({ signals }) =>
        (context) => {
          signals.emit("SIGTERM", "SIGTERM");
          expect(context.signal?.aborted).toBe(true);
        },
    });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome).toEqual({
      kind: "aborted",
      exitCode: SIGNAL_ABORT_EXIT_CODE,
      signal: "SIGTERM",
      unitsRun: 1,
    });
    expect(h.finalizer.calls).toHaveLength(1);
    expect(h.notifier.sent).toEqual([]);
    expect(fs.existsSync(h.lockPath)).toBe(false);
    expect(h.logger.types().slice(-2)).toEqual(["batch.signal", "batch.aborted"]);
  });

  it("keeps the batch result when the lock file cannot be removed", async () => {
    const lockError = new LockError("Failed to remove lock file /run/x.lock", "/run/x.lock");
    const h = makeHarness({
      units: ["a", "b", "c"],
      exitCodes: { b: 5 },
      recipient: "ops@example.test",
      lock: (lockPath) => ({
        acquire: async () => {
          const acquired = await acquireBatchLock(lockPath);
          if (acquired.status === "held") return acquired;
          return {
            status: "acquired",
            token: {
              ...acquired.token,
              release: async () => {
                throw lockError;
              },
            },
          };
        },
      }),
    });

    const outcome = await h.controller.execute(h.configDir, OPTIONS);

    expect(outcome.exitCode).toBe(5);
    if (outcome.kind !== "completed") throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.lockReleaseError).toBe("Failed to remove lock file /run/x.lock");
    expect(outcome.result.failure?.unit.id).toBe("b");
    expect(h.notifier.sent.map((s) => s.result.status)).toEqual(["failure"]);
    expect(h.logger.events).toContainEqual({
      type: "batch.lock.release_failed",
      payload: { lock_path: h.lockPath, message: "Failed to remove lock file /run/x.lock" },
    });
    expect(h.logger.types().slice(-2)).toEqual(["batch.lock.release_failed", "batch.failed"]);
    expect(h.signals.listenerCount("SIGTERM")).toBe(0);
  });
});
