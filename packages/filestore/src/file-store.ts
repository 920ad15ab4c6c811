import { copyFile, lstat, mkdir, readdir, readFile, rm, symlink } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import {
  StorageUnavailableError,
  TIER_ORDER,
  type FullContentLink,
  type StorageOperation,
  type TierLevel,
  type TierStore
} from "@tierwise/core";
import { createLogger, type Logger } from "@tierwise/observability";
import { errorMessage, hasErrorCode, writeFileAtomic } from "./fs-utils";

export const DEFAULT_NAMESPACE = "memory";
export const TIER_FILE_EXTENSION = ".md";

const SAFE_KEY_PATTERN = /^[^/\\]+$/;

export type FileTierStoreOptions = {
  root: string;
  namespace?: string;
  logger?: Logger;
};

function isFileSafeKey(documentKey: string): boolean {
  return SAFE_KEY_PATTERN.test(documentKey) && documentKey !== "." && documentKey !== "..";
}

function assertDocumentKey(documentKey: string): void {
  if (!isFileSafeKey(documentKey)) {
    throw new Error(`Invalid document key "${documentKey}"`);
  }
}

function storageError(
  operation: StorageOperation,
  error: unknown,
  details: { documentKey?: string; tier?: TierLevel } = {}
): StorageUnavailableError {
  return new StorageUnavailableError(`filesystem ${operation} failed: ${errorMessage(error)}`, {
    operation,
    ...details,
    cause: error
  });
}

/**
 * Tier files under `<root>/<namespace>/<tier>/<key>.md`. L2 may be a symbolic link
 * to the source document.
 */
export class FileTierStore implements TierStore {
  readonly root: string;
  readonly namespace: string;
  private readonly logger: Logger;

  constructor(options: FileTierStoreOptions) {
    this.root = resolve(options.root);
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.logger = options.logger ?? createLogger({ component: "file-tier-store", namespace: this.namespace });
  }

  tierDirectory(tier: TierLevel): string {
    return join(this.root, this.namespace, tier);
  }

  tierPath(documentKey: string, tier: TierLevel): string {
    assertDocumentKey(documentKey);
    return join(this.tierDirectory(tier), `${documentKey}${TIER_FILE_EXTENSION}`);
  }

  /** A key that cannot name a tier file has no content. */
  async getTierContent(documentKey: string, tier: TierLevel): Promise<string | null> {
    if (!isFileSafeKey(documentKey)) {
      return null;
    }
    const filePath = this.tierPath(documentKey, tier);
    try {
      return await readFile(filePath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw storageError("get", error, { documentKey, tier });
    }
  }

  async putTierContent(documentKey: string, tier: TierLevel, content: string): Promise<void> {
    const filePath = this.tierPath(documentKey, tier);
    try {
      // The rename replaces a previous L2 link instead of writing into its source.
      await writeFileAtomic(filePath, content);
    } catch (error) {
      throw storageError("put", error, { documentKey, tier });
    }
  }

  /** Most recently modified first; a document's time is that of its newest tier file. */
  async listDocuments(): Promise<string[]> {
    const modified = new Map<string, number>();

    try {
      for (const tier of TIER_ORDER) {
        let entries: string[];
        try {
          entries = await readdir(this.tierDirectory(tier));
        } catch (error) {
          if (hasErrorCode(error, "ENOENT")) {
            continue;
          }
          throw error;
        }

        for (const entry of entries) {
          if (extname(entry) !== TIER_FILE_EXTENSION) {
            continue;
          }
          const info = await lstat(join(this.tierDirectory(tier), entry));
          const key = basename(entry, TIER_FILE_EXTENSION);
          modified.set(key, Math.max(modified.get(key) ?? 0, info.mtimeMs));
        }
      }
    } catch (error) {
      throw storageError("list", error);
    }

    return [...modified.entries()]
      .sort(([keyA, timeA], [keyB, timeB]) => timeB - timeA || keyA.localeCompare(keyB))
      .map(([key]) => key);
  }

  /** Points L2 at `sourcePath`, copying the file where links are not available. */
  async linkFullContent(documentKey: string, sourcePath: string): Promise<FullContentLink> {
    const target = this.tierPath(documentKey, "L2");
    const source = resolve(sourcePath);

    try {
      await mkdir(this.tierDirectory("L2"), { recursive: true });
      await rm(target, { force: true });
    } catch (error) {
      throw storageError("put", error, { documentKey, tier: "L2" });
    }

    try {
      await symlink(source, target);
      return "linked";
    } catch (linkError) {
      this.logger.debug({ documentKey, err: linkError }, "symlink unavailable, copying full content");
    }

    try {
      await copyFile(source, target);
      return "copied";
    } catch (error) {
      throw storageError("put", error, { documentKey, tier: "L2" });
    }
  }
}
