// Hard-link deduplication over the output area.
// Files are linked only when size, mode, owner and SHA-256 all match; contents never change.
// The first path in sorted order is kept as the link target.
// A pair that cannot be linked is recorded and skipped; an aborted signal ends the pass early.

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";

import { sortByFilename } from "../../../core/config-enumerator.js";
import { formatErrorMessage } from "../../../core/error-format.js";

export type DedupOptions = {
  // Paths relative to the root that must never be replaced.
  exclude?: string[];
  signal?: AbortSignal;
};

export type DedupFailure = {
  path: string;
  message: string;
};

export type DedupReport = {
  scanned: number;
  linked: number;
  bytesSaved: number;
  failures: DedupFailure[];
};

type FileEntry = {
  filePath: string;
  stat: fs.Stats;
};

export async function hardlinkDuplicates(
  rootDir: string,
  options: DedupOptions = {},
): Promise<DedupReport> {
  const root = path.resolve(rootDir);
  const excluded = new Set((options.exclude ?? []).map((p) => path.resolve(root, p)));
  const aborted = (): boolean => options.signal?.aborted === true;

  const candidates = await fg("**/*", {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
  });

  const entries: FileEntry[] = [];
  for (const filePath of sortByFilename(candidates)) {
    if (aborted()) break;
    if (excluded.has(filePath)) continue;
    const stat = await fs.promises.lstat(filePath);
    if (!stat.isFile() || stat.size === 0) continue;
    entries.push({ filePath, stat });
  }

  const report: DedupReport = { scanned: entries.length, linked: 0, bytesSaved: 0, failures: [] };

  for (const group of groupBy(entries, metadataKey).values()) {
    if (aborted()) break;
    if (group.length < 2) continue;

    const byDigest = new Map<string, FileEntry[]>();
    for (const entry of group) {
      if (aborted()) return report;
      const digest = await sha256File(entry.filePath);
      const bucket = byDigest.get(digest) ?? [];
      bucket.push(entry);
      byDigest.set(digest, bucket);
    }

    for (const [first, ...duplicates] of byDigest.values()) {
      for (const duplicate of duplicates) {
        if (aborted()) return report;
        if (duplicate.stat.dev !== first.stat.dev) continue;
        if (duplicate.stat.ino === first.stat.ino) continue;

        try {
          await replaceWithLink(first.filePath, duplicate.filePath);
        } catch (err) {
          report.failures.push({
            path: path.relative(root, duplicate.filePath),
            message: formatErrorMessage(err),
          });
          continue;
        }
        report.linked += 1;
        report.bytesSaved += duplicate.stat.size;
      }
    }
  }

  return report;
}

// =============================================================================
// INTERNALS
// =============================================================================

function metadataKey(entry: FileEntry): string {
  const { size, mode, uid, gid } = entry.stat;
  return `${size}:${mode}:${uid}:${gid}`;
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key) ?? [];
    bucket.push(item);
    groups.set(key, bucket);
  }
  return groups;
}

async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

// Link beside the duplicate, then rename over it, so the path is never missing.
async function replaceWithLink(target: string, duplicate: string): Promise<void> {
  const tempPath = `${duplicate}.dedup-${process.pid}`;
  await fs.promises.link(target, tempPath);
  try {
    await fs.promises.rename(tempPath, duplicate);
  } catch (err) {
    await fs.promises.rm(tempPath, { force: true });
    throw err;
  }
}
