import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { MemoryLogger, ScriptedJobRunner } from "../app/orchestrator/__tests__/fakes.js";
import { createAppContext, type CreateAppContextInput } from "../app/context.js";
import { BatchConfigSchema, type BatchConfig } from "../core/config.js";
import { LockError, UserFacingError } from "../core/errors.js";

import { runCommand, type RunCommandDeps } from "./run.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  vi.restoreAllMocks();
});

// =============================================================================
// HELPERS
// =============================================================================

type Fixture = {
  config: BatchConfig;
  logger: MemoryLogger;
  runner: ScriptedJobRunner;
  deps: RunCommandDeps;
};

function makeFixture(units: string[], exitCodes: Record<string, number> = {}): Fixture {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "run-cli-"));
  tempDirs.push(root);

  const configDir = path.join(root, "jobs");
  fs.mkdirSync(configDir);
  for (const id of units) {
    fs.writeFileSync(path.join(configDir, `${id}.conf`), "", "utf8");
  }

  const config = BatchConfigSchema.parse({
    config_dir: configDir,
    output_dir: path.join(root, "out"),
    lock_path: path.join(root, "run", "cache-refresh.lock"),
    log_path: path.join(root, "log", "events.jsonl"),
    label: { enabled: false },
  });
  const logger = new MemoryLogger();
  const runner = new ScriptedJobRunner(exitCodes);

  return {
    config,
    logger,
    runner,
    deps: {
      loadConfig: () => config,
      createContext: (input: CreateAppContextInput) =>
        createAppContext({ ...input, batchId: "b1", logger, jobRunner: runner }),
    },
  };
}

function captured(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => call.map(String).join(" "));
}

// =============================================================================
// TESTS
// =============================================================================

describe("run command", () => {
  it("reports a successful batch and returns 0", async () => {
    const fx = makeFixture(["a", "b"]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const exitCode = await runCommand({}, fx.deps);

    expect(exitCode).toBe(0);
    expect(fx.runner.unitIds()).toEqual(["a", "b"]);
    const lines = captured(logSpy);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^Batch b1 OK: 2 unit\(s\) at \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\.$/);
    expect(fs.existsSync(path.join(fx.config.output_dir, "timestamp.txt"))).toBe(true);
    expect(fx.logger.closed).toBe(true);
  });

  it("reports the failing unit and returns its exit code", async () => {
    const fx = makeFixture(["a", "b", "c"], { b: 5 });
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const exitCode = await runCommand({}, fx.deps);

    expect(exitCode).toBe(5);
    expect(captured(errorSpy)).toEqual([
      "Batch b1 NG: unit b failed with exit code 5 (worker exited with code 5); 1 unit(s) skipped.",
    ]);
    expect(fs.existsSync(path.join(fx.config.output_dir, "timestamp.txt"))).toBe(false);
  });

  it("stays silent and returns 0 when the lock is held", async () => {
    const fx = makeFixture(["a"]);
    fs.mkdirSync(path.dirname(fx.config.lock_path), { recursive: true });
    fs.writeFileSync(fx.config.lock_path, "other\n", "utf8");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const exitCode = await runCommand({}, fx.deps);

    expect(exitCode).toBe(0);
    expect(fx.runner.calls).toEqual([]);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("reports a missing config directory as a failed batch", async () => {
    const fx = makeFixture([]);
    fs.rmSync(fx.config.config_dir, { recursive: true });
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const exitCode = await runCommand({}, fx.deps);

    expect(exitCode).toBe(1);
    expect(captured(errorSpy)).toEqual([
      `Batch b1 NG: Config directory ${fx.config.config_dir} is not readable`,
    ]);
  });

  it("passes CLI flags to the config loader as overrides", async () => {
    const fx = makeFixture([]);
    const loadConfig = vi.fn(() => fx.config);
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runCommand(
      { config: "/etc/cache-refresh.yaml", outputDir: "/srv/out", download: true, mailTo: " ops@example.test " },
      { ...fx.deps, loadConfig },
    );

    expect(loadConfig).toHaveBeenCalledWith({
      configPath: "/etc/cache-refresh.yaml",
      overrides: { output_dir: "/srv/out", download: true, recipient: "ops@example.test" },
    });
  });

  it("surfaces a missing config file unchanged", async () => {
    const missing = path.join(os.tmpdir(), "run-cli-no-such-config.yaml");

    await expect(runCommand({ config: missing })).rejects.toMatchObject({
      title: "Config file missing.",
      message: `Config file not found at ${missing}.`,
    });
  });

  it("turns lock failures into a user-facing error", async () => {
    const fx = makeFixture([]);
    const lockError = new LockError("Failed to create lock file /run/x.lock", "/run/x.lock");

    const running = runCommand(
      {},
      {
        ...fx.deps,
        createContext: () => {
          throw lockError;
        },
      },
    );

    await expect(running).rejects.toBeInstanceOf(UserFacingError);
    await expect(running).rejects.toMatchObject({
      code: "LOCK_ERROR",
      title: "Batch run failed.",
      message: "Failed to create lock file /run/x.lock",
      hint: `Check that the directory of ${fx.config.lock_path} exists and is writable.`,
      cause: lockError,
    });
  });

  it("warns about a lock file it could not remove and keeps the batch exit code", async () => {
    const fx = makeFixture(["a", "b"], { b: 5 });
    // Swapping the lock file for a directory makes the final unlink fail.
    const runner = new ScriptedJobRunner({ b: 5 }, (unit) => {
      if (unit.id !== "a") return;
      fs.rmSync(fx.config.lock_path);
      fs.mkdirSync(fx.config.lock_path);
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const exitCode = await runCommand(
      {},
      {
        ...fx.deps,
        createContext: (input: CreateAppContextInput) =>
          createAppContext({ ...input, batchId: "b1", logger: fx.logger, jobRunner: runner }),
      },
    );

    expect(exitCode).toBe(5);
    expect(captured(warnSpy)).toEqual([
      `Warning: Failed to remove lock file ${fx.config.lock_path}; remove it before the next run.`,
    ]);
    expect(captured(errorSpy)).toEqual([
      "Batch b1 NG: unit b failed with exit code 5 (worker exited with code 5); 0 unit(s) skipped.",
    ]);
    expect(fx.logger.types()).toContain("batch.lock.release_failed");
  });
});
