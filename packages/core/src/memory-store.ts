import type { StatsPersistence, StatsSnapshot, TierLevel, TierStore } from "./types";

type StoredDocument = {
  tiers: Partial<Record<TierLevel, string>>;
  updatedAt: number;
};

export class InMemoryTierStore implements TierStore {
  private readonly documents = new Map<string, StoredDocument>();
  private sequence = 0;

  async getTierContent(documentKey: string, tier: TierLevel): Promise<string | null> {
    return this.documents.get(documentKey)?.tiers[tier] ?? null;
  }

  async putTierContent(documentKey: string, tier: TierLevel, content: string): Promise<void> {
    const document = this.documents.get(documentKey) ?? { tiers: {}, updatedAt: 0 };
    document.tiers[tier] = content;
    // Write sequence, not wall time: two writes in one millisecond still order.
    this.sequence += 1;
    document.updatedAt = this.sequence;
    this.documents.set(documentKey, document);
  }

  async listDocuments(): Promise<string[]> {
    return [...this.documents.entries()]
      .sort(([, a], [, b]) => b.updatedAt - a.updatedAt)
      .map(([key]) => key);
  }
}

export class InMemoryStatsPersistence implements StatsPersistence {
  private stored: StatsSnapshot | null = null;

  constructor(initial?: StatsSnapshot) {
    this.stored = initial ? structuredClone(initial) : null;
  }

  async loadSnapshot(): Promise<StatsSnapshot | null> {
    return this.stored ? structuredClone(this.stored) : null;
  }

  async saveSnapshot(snapshot: StatsSnapshot): Promise<void> {
    this.stored = structuredClone(snapshot);
  }
}
