import type { BatchConfigOverrides } from "../core/config-loader.js";

// Flags shared by every command.
export type CommonCliOptions = {
  config?: string;
  configDir?: string;
};

export type BatchCliOptions = CommonCliOptions & {
  outputDir?: string;
  lockPath?: string;
  logPath?: string;
  debug?: boolean;
  download?: boolean;
  mailTo?: string;
  hardlink?: boolean;
};

// Only flags the user actually passed become overrides; commander leaves the rest undefined.
export function toConfigOverrides(opts: BatchCliOptions): BatchConfigOverrides {
  const overrides: BatchConfigOverrides = {};
  if (opts.configDir !== undefined) overrides.config_dir = opts.configDir;
  if (opts.outputDir !== undefined) overrides.output_dir = opts.outputDir;
  if (opts.lockPath !== undefined) overrides.lock_path = opts.lockPath;
  if (opts.logPath !== undefined) overrides.log_path = opts.logPath;
  if (opts.debug !== undefined) overrides.debug = opts.debug;
  if (opts.download !== undefined) overrides.download = opts.download;
  if (opts.hardlink !== undefined) overrides.hardlink = opts.hardlink;
  if (opts.mailTo !== undefined && opts.mailTo.trim() !== "") overrides.recipient = opts.mailTo.trim();
  return overrides;
}
