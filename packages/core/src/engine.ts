import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import { createLogger, type Logger } from "@tierwise/observability";
import { classify, getDefaultClassifierRules, type ClassifierRuleSet } from "./classifier";
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from "./config";
import { emptyRetrieval, retrieve } from "./retrieval";
import { StatsTracker } from "./stats";
import { summarize } from "./summarizer";
import { selectTiers } from "./tier-selection";
import type {
  AnswerResult,
  ClassificationResult,
  FullContentLink,
  QueryMetrics,
  RetrievalMode,
  StatsDashboard,
  StatsPersistence,
  TieredDigest,
  TierStore
} from "./types";

export type TierEngineOptions = {
  store: TierStore;
  config?: EngineConfigInput;
  rules?: ClassifierRuleSet;
  statsPersistence?: StatsPersistence;
  logger?: Logger;
  now?: () => Date;
};

export type IngestResult = {
  digest: TieredDigest;
  fullContent: FullContentLink;
};

export type EngineDashboard = StatsDashboard & {
  mode: RetrievalMode;
  configuration: {
    minConfidenceThreshold: number;
    classifierEnabled: boolean;
    tokensPerByte: number;
    costPerToken: number;
  };
};

export class TierEngine {
  readonly store: TierStore;
  readonly stats: StatsTracker;
  private configValue: EngineConfig;
  private readonly rules: ClassifierRuleSet;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TierEngineOptions) {
    this.store = options.store;
    this.configValue = parseEngineConfig(options.config ?? {});
    this.rules = options.rules ?? getDefaultClassifierRules();
    this.logger = options.logger ?? createLogger({ component: "tier-engine" });
    this.now = options.now ?? (() => new Date());
    this.stats = new StatsTracker({
      historyCapacity: this.configValue.historyCapacity,
      costPerToken: this.configValue.costPerToken,
      persistence: options.statsPersistence,
      logger: this.logger,
      now: this.now
    });
  }

  get config(): EngineConfig {
    return this.configValue;
  }

  /** Swaps the config between queries; validation happens before anything changes. */
  updateConfig(next: EngineConfigInput): EngineConfig {
    this.configValue = parseEngineConfig(next);
    this.stats.configure({
      historyCapacity: this.configValue.historyCapacity,
      costPerToken: this.configValue.costPerToken
    });
    this.logger.info({ mode: this.configValue.mode }, "engine config updated");
    return this.configValue;
  }

  summarize(text: string, key?: string): TieredDigest {
    return summarize(text, this.configValue, key);
  }

  classify(query: string): ClassificationResult {
    return classify(query, this.rules);
  }

  /**
   * Writes L0 and L1 and stores L2. With `sourcePath` and a store that can reference
   * files, L2 points at the source instead of holding a second copy.
   */
  async ingest(documentKey: string, text: string, options: { sourcePath?: string } = {}): Promise<IngestResult> {
    const digest = this.summarize(text, documentKey);
    await this.store.putTierContent(documentKey, "L0", digest.tier0);
    await this.store.putTierContent(documentKey, "L1", digest.tier1);

    let fullContent: FullContentLink = "copied";
    if (options.sourcePath && this.store.linkFullContent) {
      fullContent = await this.store.linkFullContent(documentKey, options.sourcePath);
    } else {
      await this.store.putTierContent(documentKey, "L2", digest.full);
    }

    this.logger.debug(
      {
        documentKey,
        originalChars: text.length,
        tier0Chars: digest.tier0.length,
        tier1Chars: digest.tier1.length,
        fullContent
      },
      "document ingested"
    );
    return { digest, fullContent };
  }

  answer(query: string, documentKey: string): Promise<AnswerResult> {
    return this.answerFrom(query, documentKey);
  }

  /** Answers from the most recently written document; with none stored the answer is empty. */
  async answerLatest(query: string): Promise<AnswerResult> {
    const [latest] = await this.store.listDocuments();
    return this.answerFrom(query, latest ?? null);
  }

  private async answerFrom(query: string, documentKey: string | null): Promise<AnswerResult> {
    const config = this.configValue;
    const startedAt = performance.now();
    const classification = this.classify(query);
    const selection = selectTiers(classification.primaryType, classification.confidence, config.mode, config);
    const { content, metrics: retrieval } =
      documentKey === null ? emptyRetrieval(selection) : await retrieve(this.store, selection, documentKey, config);

    const metrics: QueryMetrics = {
      query,
      documentKey: documentKey ?? "",
      queryType: classification.primaryType,
      confidence: classification.confidence,
      strategy: selection.strategy,
      tiersLoaded: retrieval.tiersLoaded,
      bytesReturned: retrieval.bytesReturned,
      estimatedTokensReturned: retrieval.estimatedTokensReturned,
      estimatedTokensBaseline: retrieval.estimatedTokensBaseline,
      tokensSaved: retrieval.tokensSaved,
      savingRate: retrieval.savingRate,
      latencyMs: performance.now() - startedAt,
      timestamp: this.now().toISOString()
    };

    this.stats.record(metrics);
    this.logger.child({ queryId: randomUUID() }).debug(
      {
        documentKey,
        queryType: metrics.queryType,
        strategy: metrics.strategy,
        tiersLoaded: metrics.tiersLoaded,
        savingRate: metrics.savingRate
      },
      "query answered"
    );

    if (this.stats.totalQueries % config.flushEveryQueries === 0) {
      try {
        await this.stats.flush();
      } catch (error) {
        // The answer stands; the next flush retries with the full aggregate.
        this.logger.error({ err: error, totalQueries: this.stats.totalQueries }, "stats flush failed");
      }
    }

    return { content, metrics };
  }

  dashboard(): EngineDashboard {
    const config = this.configValue;
    return {
      ...this.stats.dashboard(),
      mode: config.mode,
      configuration: {
        minConfidenceThreshold: config.minConfidenceThreshold,
        classifierEnabled: config.classifierEnabled,
        tokensPerByte: config.tokensPerByte,
        costPerToken: config.costPerToken
      }
    };
  }

  loadStats(): Promise<boolean> {
    return this.stats.load();
  }

  flushStats(): Promise<void> {
    return this.stats.flush();
  }

  resetStats(): void {
    this.stats.reset();
  }
}
