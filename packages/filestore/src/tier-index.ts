import { lstat, readdir } from "node:fs/promises";
import { extname, join, relative, resolve, sep } from "node:path";
import { TIER_ORDER, type TierLevel } from "@tierwise/core";
import { hasErrorCode, writeJsonFile } from "./fs-utils";
import { TIER_FILE_EXTENSION } from "./file-store";
import { CONFIG_DIRECTORY } from "./stats-file";

export const TIER_INDEX_VERSION = 1;
export const TIER_INDEX_FILE = "index.json";

export type TierIndexEntry = {
  path: string;
  namespace: string;
  tier: TierLevel;
  size: number;
  modified: string;
};

export type TierIndex = {
  version: number;
  createdAt: string;
  namespaces: string[];
  entries: TierIndexEntry[];
};

async function readDirectoryNames(directory: string, kind: "file" | "directory"): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => (kind === "directory" ? entry.isDirectory() : entry.isFile() || entry.isSymbolicLink()))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }
}

/** Every tier file under `root`, grouped by namespace directory. */
export async function buildTierIndex(root: string, now: Date = new Date()): Promise<TierIndex> {
  const rootPath = resolve(root);
  const namespaces = (await readDirectoryNames(rootPath, "directory")).filter((name) => name !== CONFIG_DIRECTORY);
  const entries: TierIndexEntry[] = [];

  for (const namespace of namespaces) {
    for (const tier of TIER_ORDER) {
      const tierDirectory = join(rootPath, namespace, tier);
      for (const name of await readDirectoryNames(tierDirectory, "file")) {
        if (extname(name) !== TIER_FILE_EXTENSION) {
          continue;
        }
        const filePath = join(tierDirectory, name);
        const info = await lstat(filePath);
        entries.push({
          path: relative(rootPath, filePath).split(sep).join("/"),
          namespace,
          tier,
          size: info.size,
          modified: info.mtime.toISOString()
        });
      }
    }
  }

  return {
    version: TIER_INDEX_VERSION,
    createdAt: now.toISOString(),
    namespaces,
    entries
  };
}

export async function writeTierIndex(root: string, now: Date = new Date()): Promise<TierIndex> {
  const index = await buildTierIndex(root, now);
  await writeJsonFile(join(resolve(root), TIER_INDEX_FILE), index);
  return index;
}
