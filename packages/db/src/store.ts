import {
  parseStatsSnapshot,
  StorageUnavailableError,
  type StatsPersistence,
  type StatsSnapshot,
  type StorageOperation,
  type TierLevel,
  type TierStore
} from "@tierwise/core";
import { getTierContent, upsertTierContent } from "./cached-repositories";
import { getStatsSnapshotRow, listDocumentKeys, upsertStatsSnapshotRow } from "./repositories";

export const DEFAULT_NAMESPACE = "memory";

async function guarded<T>(
  operation: StorageOperation,
  details: { documentKey?: string; tier?: TierLevel },
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageUnavailableError(`postgres ${operation} failed: ${reason}`, { operation, ...details, cause: error });
  }
}

export class PostgresTierStore implements TierStore {
  readonly namespace: string;

  constructor(options: { namespace?: string } = {}) {
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
  }

  getTierContent(documentKey: string, tier: TierLevel): Promise<string | null> {
    return guarded("get", { documentKey, tier }, () => getTierContent(this.namespace, documentKey, tier));
  }

  async putTierContent(documentKey: string, tier: TierLevel, content: string): Promise<void> {
    await guarded("put", { documentKey, tier }, () =>
      upsertTierContent({ namespace: this.namespace, documentKey, tier, content })
    );
  }

  async listDocuments(): Promise<string[]> {
    const records = await guarded("list", {}, () => listDocumentKeys(this.namespace));
    return records.map((record) => record.documentKey);
  }
}

export class PostgresStatsPersistence implements StatsPersistence {
  readonly namespace: string;

  constructor(options: { namespace?: string } = {}) {
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
  }

  async loadSnapshot(): Promise<StatsSnapshot | null> {
    const row = await guarded("load_stats", {}, () => getStatsSnapshotRow(this.namespace));
    return row === null ? null : parseStatsSnapshot(row);
  }

  async saveSnapshot(snapshot: StatsSnapshot): Promise<void> {
    await guarded("save_stats", {}, () => upsertStatsSnapshotRow(this.namespace, snapshot));
  }
}
