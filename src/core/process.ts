import { execa } from "execa";

import { CacheRefreshError } from "./errors.js";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandRunOptions = {
  input?: string;
  cwd?: string;
  // Aborting kills the child (SIGTERM, then SIGKILL after FORCE_KILL_AFTER_MS).
  signal?: AbortSignal;
};

const FORCE_KILL_AFTER_MS = 5000;

export type CommandRunner = (
  command: string,
  args: string[],
  opts?: CommandRunOptions,
) => Promise<CommandResult>;

// Never throws for a non-zero exit; spawn failures (missing binary) still reject.
export const runCommand: CommandRunner = async (command, args, opts = {}) => {
  const res = await execa(command, args, {
    cwd: opts.cwd,
    input: opts.input,
    stdin: opts.input === undefined ? "ignore" : undefined,
    stdout: "pipe",
    stderr: "pipe",
    reject: false,
    cancelSignal: opts.signal,
    forceKillAfterDelay: FORCE_KILL_AFTER_MS,
  });

  if (res.failed && !res.isCanceled && res.exitCode === undefined && res.signal === undefined) {
    throw new CacheRefreshError(`Failed to start ${describeCommand(command, args)}`, res);
  }

  return {
    exitCode: res.exitCode ?? -1,
    stdout: typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? ""),
    stderr: typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? ""),
  };
};

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}
