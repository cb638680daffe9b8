import { Command } from "commander";

import { CONFIG_PATH_ENV } from "../core/config-loader.js";

import { listCommand } from "./list.js";
import { runCommand, type RunCommandOptions } from "./run.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("cache-refresh")
    .description("Regenerate cached data sets by running a worker once per job configuration")
    .version("0.1.0");

  program
    .command("run", { isDefault: true })
    .description("Run every job configuration in order, stopping at the first failure")
    .option("--config <path>", `YAML config file (default: $${CONFIG_PATH_ENV}, else built-in defaults)`)
    .option("--config-dir <dir>", "Directory of job configuration files")
    .option("--output-dir <dir>", "Output storage root that receives the completion marker")
    .option("--lock-path <path>", "Single-instance lock file")
    .option("--log-path <path>", "JSONL event log file")
    .option("--debug", "Pass the debug flag to the worker and show error details")
    .option("--download", "Pass the download flag to the worker")
    .option("--hardlink", "Hard-link identical output files after a successful batch")
    .option("--mail-to <address>", "Send an OK/NG status mail to this address")
    .action(async (opts: RunCommandOptions) => {
      process.exitCode = await runCommand(opts);
    });

  program
    .command("list")
    .description("Print job configurations in run order without running them")
    .option("--config <path>", `YAML config file (default: $${CONFIG_PATH_ENV}, else built-in defaults)`)
    .option("--config-dir <dir>", "Directory of job configuration files")
    .action(async (opts: { config?: string; configDir?: string }) => {
      await listCommand(opts);
    });

  return program;
}
