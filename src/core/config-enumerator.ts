/**
 * ConfigEnumerator lists job configuration units from a directory.
 * Purpose: give the batch controller a deterministic, restartable run order.
 * Assumptions: non-recursive; units are files ending in the configured suffix.
 * Usage: for (const unit of await enumerator.list(configDir)) { ... }
 */

import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigUnit = {
  readonly id: string;
  readonly path: string;
  readonly flags: readonly string[];
};

export type ConfigEnumerator = {
  list(configDir: string): Promise<ConfigUnitSequence>;
};

export const UNIT_ARGS_SUFFIX = ".args";

// =============================================================================
// SEQUENCE
// =============================================================================

export class ConfigUnitSequence implements Iterable<ConfigUnit> {
  private readonly units: readonly ConfigUnit[];

  constructor(units: ConfigUnit[]) {
    this.units = Object.freeze([...units]);
  }

  get size(): number {
    return this.units.length;
  }

  *[Symbol.iterator](): Iterator<ConfigUnit> {
    for (const unit of this.units) {
      yield unit;
    }
  }
}

// =============================================================================
// ENUMERATOR
// =============================================================================

export class DirectoryConfigEnumerator implements ConfigEnumerator {
  constructor(private readonly suffix: string = ".conf") {}

  async list(configDir: string): Promise<ConfigUnitSequence> {
    const dir = path.resolve(configDir);
    const stat = await fse.stat(dir).catch((err: unknown) => {
      throw new ConfigError(`Config directory ${dir} is not readable`, err);
    });
    if (!stat.isDirectory()) {
      throw new ConfigError(`Config path ${dir} is not a directory`);
    }

    const names = await fg(`*${fg.escapePath(this.suffix)}`, {
      cwd: dir,
      onlyFiles: true,
      dot: false,
      deep: 1,
    });

    const units: ConfigUnit[] = [];
    for (const name of sortByFilename(names)) {
      const id = name.slice(0, name.length - this.suffix.length);
      if (id.length === 0) continue;

      units.push({
        id,
        path: path.join(dir, name),
        flags: Object.freeze(await readUnitFlags(path.join(dir, `${id}${UNIT_ARGS_SUFFIX}`))),
      });
    }

    return new ConfigUnitSequence(units);
  }
}

// Code-unit order, independent of the process locale.
export function sortByFilename(names: readonly string[]): string[] {
  return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function parseUnitFlags(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

async function readUnitFlags(argsPath: string): Promise<string[]> {
  if (!(await fse.pathExists(argsPath))) {
    return [];
  }
  return parseUnitFlags(await fse.readFile(argsPath, "utf8"));
}
