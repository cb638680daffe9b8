import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { parseBooleanFlag } from "./core/utils.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): error is CommanderError {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

export function resolveDebugEnabled(argv: string[], env: NodeJS.ProcessEnv = process.env): boolean {
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") return true;
  }

  return parseBooleanFlag(env.DEBUG) ?? false;
}

export function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode) && exitCode !== 0) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = error.exitCode;
      return;
    }

    // Commander already printed its own usage errors.
    if (!(error instanceof CommanderError)) {
      console.error(renderCliError(error, { debug: resolveDebugEnabled(argv) }));
    }
    process.exitCode = resolveExitCode(error);
  }
}
