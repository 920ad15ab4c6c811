export type TierLevel = "L0" | "L1" | "L2";

export const TIER_ORDER: readonly TierLevel[] = ["L0", "L1", "L2"];

export type RetrievalMode = "traditional" | "tiered-only" | "hybrid";

export type QueryType =
  | "factual_date"
  | "administrative"
  | "analytical"
  | "creative"
  | "factual_list"
  | "factual"
  | "general";

export type TierOverview = {
  text: string;
  keyPoints: string[];
  sections: string[];
};

export type TieredDigest = {
  key?: string;
  tier0: string;
  tier1: string;
  keyPoints: string[];
  sections: string[];
  // Same string as the source document; L2 is never rebuilt.
  full: string;
};

export type ClassificationResult = {
  primaryType: QueryType;
  confidence: number;
  scores: Partial<Record<QueryType, number>>;
};

export type SelectionStrategy =
  | "traditional"
  | "tiered_only"
  | "classifier_disabled"
  | "hybrid_low_confidence"
  | "hybrid_administrative"
  | "hybrid_factual"
  | "hybrid_analytical"
  | "hybrid_creative"
  | "hybrid_default";

export type TierSelection = {
  tiers: TierLevel[];
  strategy: SelectionStrategy;
};

export type RetrievalMetrics = {
  tiersRequested: TierLevel[];
  tiersLoaded: TierLevel[];
  bytesReturned: number;
  estimatedTokensReturned: number;
  estimatedTokensBaseline: number;
  tokensSaved: number;
  savingRate: number;
};

export type RetrievalResult = {
  content: string;
  metrics: RetrievalMetrics;
};

export type QueryMetrics = {
  query: string;
  documentKey?: string;
  queryType: QueryType;
  confidence: number;
  strategy: SelectionStrategy;
  tiersLoaded: TierLevel[];
  bytesReturned: number;
  estimatedTokensReturned: number;
  estimatedTokensBaseline: number;
  tokensSaved: number;
  savingRate: number;
  latencyMs: number;
  timestamp: string;
};

export type AnswerResult = {
  content: string;
  metrics: QueryMetrics;
};

export type QueryTypeStats = {
  count: number;
  tokensSaved: number;
  tokensBaseline: number;
};

export type StatsSnapshot = {
  version: number;
  totalQueries: number;
  totalTokensReturned: number;
  totalTokensBaseline: number;
  totalTokensSaved: number;
  averageSavingRate: number;
  byType: Partial<Record<QueryType, QueryTypeStats>>;
  history: QueryMetrics[];
  lastResetAt: string;
};

export type StatsDashboard = {
  totalQueries: number;
  averageSavingRate: number;
  totalTokensSaved: number;
  totalTokensReturned: number;
  estimatedCostSaved: number;
  byType: Partial<Record<QueryType, { count: number; averageSavingRate: number }>>;
  recent: QueryMetrics[];
  lastResetAt: string;
};

export type FullContentLink = "linked" | "copied";

export interface TierStore {
  getTierContent(documentKey: string, tier: TierLevel): Promise<string | null>;
  putTierContent(documentKey: string, tier: TierLevel, content: string): Promise<void>;
  /** Document keys, most recently modified first. */
  listDocuments(): Promise<string[]>;
  /** Stores L2 as a reference to `sourcePath` when possible, else as a copy. */
  linkFullContent?(documentKey: string, sourcePath: string): Promise<FullContentLink>;
}

export interface StatsPersistence {
  loadSnapshot(): Promise<StatsSnapshot | null>;
  saveSnapshot(snapshot: StatsSnapshot): Promise<void>;
}
