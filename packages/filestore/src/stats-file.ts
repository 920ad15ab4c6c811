import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import {
  MalformedConfigError,
  parseStatsSnapshot,
  StorageUnavailableError,
  type StatsPersistence,
  type StatsSnapshot
} from "@tierwise/core";
import { errorMessage, hasErrorCode, writeJsonFile } from "./fs-utils";

export const CONFIG_DIRECTORY = "config";
export const STATS_FILE = "stats.json";

export function statsFilePath(root: string): string {
  return join(resolve(root), CONFIG_DIRECTORY, STATS_FILE);
}

export class FileStatsPersistence implements StatsPersistence {
  readonly filePath: string;

  constructor(root: string) {
    this.filePath = statsFilePath(root);
  }

  async loadSnapshot(): Promise<StatsSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw new StorageUnavailableError(`stats file read failed: ${errorMessage(error)}`, {
        operation: "load_stats",
        cause: error
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new MalformedConfigError(`Stats file ${this.filePath} is not valid JSON`, [errorMessage(error)]);
    }
    return parseStatsSnapshot(parsed);
  }

  async saveSnapshot(snapshot: StatsSnapshot): Promise<void> {
    try {
      await writeJsonFile(this.filePath, snapshot);
    } catch (error) {
      throw new StorageUnavailableError(`stats file write failed: ${errorMessage(error)}`, {
        operation: "save_stats",
        cause: error
      });
    }
  }
}
