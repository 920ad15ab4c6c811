import { z } from "zod";
import type { Logger } from "@tierwise/observability";
import { QUERY_TYPES } from "./classifier";
import { formatZodIssues } from "./config";
import { MalformedConfigError } from "./errors";
import type {
  QueryMetrics,
  QueryType,
  QueryTypeStats,
  StatsDashboard,
  StatsPersistence,
  StatsSnapshot
} from "./types";

export const STATS_SNAPSHOT_VERSION = 1;
export const HISTORY_QUERY_MAX_CHARS = 50;
const RECENT_ENTRIES = 5;

const queryTypeSchema = z.enum(QUERY_TYPES);
const tierSchema = z.enum(["L0", "L1", "L2"]);

const queryMetricsSchema = z.object({
  query: z.string(),
  documentKey: z.string().optional(),
  queryType: queryTypeSchema,
  confidence: z.number().min(0).max(1),
  strategy: z.enum([
    "traditional",
    "tiered_only",
    "classifier_disabled",
    "hybrid_low_confidence",
    "hybrid_administrative",
    "hybrid_factual",
    "hybrid_analytical",
    "hybrid_creative",
    "hybrid_default"
  ]),
  tiersLoaded: z.array(tierSchema),
  bytesReturned: z.number().nonnegative(),
  estimatedTokensReturned: z.number().nonnegative(),
  estimatedTokensBaseline: z.number().nonnegative(),
  tokensSaved: z.number(),
  savingRate: z.number(),
  latencyMs: z.number().nonnegative(),
  timestamp: z.string()
});

const queryTypeStatsSchema = z.object({
  count: z.number().int().nonnegative(),
  tokensSaved: z.number(),
  tokensBaseline: z.number().nonnegative()
});

export const statsSnapshotSchema = z.object({
  version: z.literal(STATS_SNAPSHOT_VERSION),
  totalQueries: z.number().int().nonnegative(),
  totalTokensReturned: z.number().nonnegative(),
  totalTokensBaseline: z.number().nonnegative(),
  totalTokensSaved: z.number(),
  averageSavingRate: z.number(),
  byType: z.record(queryTypeSchema, queryTypeStatsSchema),
  history: z.array(queryMetricsSchema),
  lastResetAt: z.string()
});

export function parseStatsSnapshot(input: unknown): StatsSnapshot {
  const parsed = statsSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedConfigError("Invalid stats snapshot", formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export function emptyStatsSnapshot(now: Date = new Date()): StatsSnapshot {
  return {
    version: STATS_SNAPSHOT_VERSION,
    totalQueries: 0,
    totalTokensReturned: 0,
    totalTokensBaseline: 0,
    totalTokensSaved: 0,
    averageSavingRate: 0,
    byType: {},
    history: [],
    lastResetAt: now.toISOString()
  };
}

function cloneSnapshot(snapshot: StatsSnapshot): StatsSnapshot {
  const byType: Partial<Record<QueryType, QueryTypeStats>> = {};
  for (const type of QUERY_TYPES) {
    const entry = snapshot.byType[type];
    if (entry) {
      byType[type] = { ...entry };
    }
  }

  return {
    ...snapshot,
    byType,
    history: snapshot.history.map((entry) => ({ ...entry, tiersLoaded: [...entry.tiersLoaded] }))
  };
}

export type StatsTrackerOptions = {
  historyCapacity: number;
  costPerToken: number;
  persistence?: StatsPersistence;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Process-wide savings aggregate. `record` is synchronous and runs to completion on
 * the event loop, so one call is one atomic update. Persistence calls share a single
 * queue and never overlap.
 */
export class StatsTracker {
  private state: StatsSnapshot;
  private persistQueue: Promise<void> = Promise.resolve();
  private options: StatsTrackerOptions;

  constructor(options: StatsTrackerOptions, initial?: StatsSnapshot) {
    this.options = options;
    this.state = initial ? this.fitHistory(cloneSnapshot(initial)) : emptyStatsSnapshot(this.now());
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private fitHistory(snapshot: StatsSnapshot): StatsSnapshot {
    const overflow = snapshot.history.length - this.options.historyCapacity;
    if (overflow > 0) {
      snapshot.history = snapshot.history.slice(overflow);
    }
    return snapshot;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.persistQueue.then(task);
    // The caller receives the rejection through `run`; the queue itself keeps going.
    this.persistQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  configure(update: Pick<StatsTrackerOptions, "historyCapacity" | "costPerToken">): void {
    this.options = { ...this.options, ...update };
    this.fitHistory(this.state);
  }

  record(metrics: QueryMetrics): void {
    const state = this.state;
    state.totalQueries += 1;
    state.totalTokensReturned += metrics.estimatedTokensReturned;
    state.totalTokensBaseline += metrics.estimatedTokensBaseline;
    state.totalTokensSaved += metrics.tokensSaved;
    state.averageSavingRate = state.totalTokensBaseline > 0 ? state.totalTokensSaved / state.totalTokensBaseline : 0;

    const typeStats = state.byType[metrics.queryType] ?? { count: 0, tokensSaved: 0, tokensBaseline: 0 };
    typeStats.count += 1;
    typeStats.tokensSaved += metrics.tokensSaved;
    typeStats.tokensBaseline += metrics.estimatedTokensBaseline;
    state.byType[metrics.queryType] = typeStats;

    state.history.push({
      ...metrics,
      query: metrics.query.slice(0, HISTORY_QUERY_MAX_CHARS),
      tiersLoaded: [...metrics.tiersLoaded]
    });
    this.fitHistory(state);
  }

  get totalQueries(): number {
    return this.state.totalQueries;
  }

  snapshot(): StatsSnapshot {
    return cloneSnapshot(this.state);
  }

  dashboard(): StatsDashboard {
    const byType: StatsDashboard["byType"] = {};
    for (const type of QUERY_TYPES) {
      const entry = this.state.byType[type];
      if (entry) {
        byType[type] = {
          count: entry.count,
          averageSavingRate: entry.tokensBaseline > 0 ? entry.tokensSaved / entry.tokensBaseline : 0
        };
      }
    }

    return {
      totalQueries: this.state.totalQueries,
      averageSavingRate: this.state.averageSavingRate,
      totalTokensSaved: this.state.totalTokensSaved,
      totalTokensReturned: this.state.totalTokensReturned,
      estimatedCostSaved: this.state.totalTokensSaved * this.options.costPerToken,
      byType,
      recent: this.state.history.slice(-RECENT_ENTRIES).map((entry) => ({ ...entry })),
      lastResetAt: this.state.lastResetAt
    };
  }

  reset(): void {
    this.state = emptyStatsSnapshot(this.now());
    this.options.logger?.warn({ lastResetAt: this.state.lastResetAt }, "stats reset");
  }

  /** Replaces the in-memory aggregate with the persisted one, when there is one. */
  load(): Promise<boolean> {
    const persistence = this.options.persistence;
    if (!persistence) {
      return Promise.resolve(false);
    }

    return this.enqueue(async () => {
      const stored = await persistence.loadSnapshot();
      if (!stored) {
        return false;
      }
      this.state = this.fitHistory(cloneSnapshot(stored));
      this.options.logger?.info({ totalQueries: this.state.totalQueries }, "stats loaded");
      return true;
    });
  }

  flush(): Promise<void> {
    const persistence = this.options.persistence;
    if (!persistence) {
      return Promise.resolve();
    }

    return this.enqueue(async () => {
      const snapshot = this.snapshot();
      await persistence.saveSnapshot(snapshot);
      this.options.logger?.info({ totalQueries: snapshot.totalQueries }, "stats flushed");
    });
  }
}
