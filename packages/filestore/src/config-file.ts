import { readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import {
  MalformedConfigError,
  parseEngineConfig,
  type EngineConfig,
  type EngineConfigInput
} from "@tierwise/core";
import { createLogger, type Logger } from "@tierwise/observability";
import { errorMessage, hasErrorCode, writeJsonFile } from "./fs-utils";
import { CONFIG_DIRECTORY } from "./stats-file";

export const ENGINE_CONFIG_FILE = "engine-config.json";

export function engineConfigPath(root: string): string {
  return join(resolve(root), CONFIG_DIRECTORY, ENGINE_CONFIG_FILE);
}

async function readConfigInput(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return {};
    }
    throw new MalformedConfigError(`Unable to read engine config at ${filePath}`, [errorMessage(error)]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new MalformedConfigError(`Engine config at ${filePath} is not valid JSON`, [errorMessage(error)]);
  }
}

/** A missing file yields the defaults; present fields override them. */
export async function loadEngineConfigFile(root: string): Promise<EngineConfig> {
  return parseEngineConfig(await readConfigInput(engineConfigPath(root)));
}

export async function saveEngineConfigFile(root: string, input: EngineConfigInput): Promise<EngineConfig> {
  const config = parseEngineConfig(input);
  await writeJsonFile(engineConfigPath(root), config);
  return config;
}

/**
 * Polls the config file's modification time. `poll` resolves to the new config when
 * the file changed since the last poll and to null otherwise.
 */
export class ConfigFileWatcher {
  readonly root: string;
  readonly filePath: string;
  private lastModifiedMs: number | null = null;
  private readonly logger: Logger;

  constructor(root: string, options: { logger?: Logger } = {}) {
    this.root = root;
    this.filePath = engineConfigPath(root);
    this.logger = options.logger ?? createLogger({ component: "config-watcher" });
  }

  private async modifiedMs(): Promise<number> {
    try {
      return (await stat(this.filePath)).mtimeMs;
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return 0;
      }
      throw error;
    }
  }

  async poll(): Promise<EngineConfig | null> {
    const modifiedMs = await this.modifiedMs();
    if (this.lastModifiedMs !== null && modifiedMs === this.lastModifiedMs) {
      return null;
    }

    const config = await loadEngineConfigFile(this.root);
    this.lastModifiedMs = modifiedMs;
    this.logger.info({ filePath: this.filePath, mode: config.mode }, "engine config loaded");
    return config;
  }
}
