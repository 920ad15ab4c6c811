import type { TierLevel } from "./types";

export type StorageOperation = "get" | "put" | "list" | "load_stats" | "save_stats";

export class StorageUnavailableError extends Error {
  readonly operation: StorageOperation;
  readonly documentKey?: string;
  readonly tier?: TierLevel;

  constructor(
    message: string,
    details: { operation: StorageOperation; documentKey?: string; tier?: TierLevel; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "StorageUnavailableError";
    this.operation = details.operation;
    this.documentKey = details.documentKey;
    this.tier = details.tier;
  }
}

export class MalformedConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "MalformedConfigError";
    this.issues = issues;
  }
}
