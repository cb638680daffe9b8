import { DirectoryConfigEnumerator } from "../core/config-enumerator.js";
import { loadBatchConfig } from "../core/config-loader.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { toConfigOverrides, type CommonCliOptions } from "./config.js";

// Prints units in run order without taking the lock or running anything.
export async function listCommand(opts: CommonCliOptions): Promise<string[]> {
  const config = loadBatchConfig({ configPath: opts.config, overrides: toConfigOverrides(opts) });
  const enumerator = new DirectoryConfigEnumerator(config.config_suffix);

  let lines: string[];
  try {
    const units = await enumerator.list(config.config_dir);
    lines = [...units].map((unit) =>
      unit.flags.length > 0 ? `${unit.id}\t${unit.path}\t${unit.flags.join(" ")}` : `${unit.id}\t${unit.path}`,
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Cannot list job configurations.",
        message: error.message,
        hint: "Pass --config-dir <dir> or set config_dir in the config file.",
        cause: error,
      });
    }
    throw error;
  }

  if (lines.length === 0) {
    console.log(`No *${config.config_suffix} files in ${config.config_dir}.`);
  }
  for (const line of lines) {
    console.log(line);
  }
  return lines;
}
