import type { EngineConfig } from "./config";
import type { QueryType, RetrievalMode, TierSelection } from "./types";

export type SelectionPolicy = Pick<EngineConfig, "minConfidenceThreshold" | "classifierEnabled">;

const ANALYTICAL_NARROW_CONFIDENCE = 0.7;

const FACTUAL_TYPES: ReadonlySet<QueryType> = new Set(["factual", "factual_date", "factual_list"]);

/**
 * Maps a classification to the tiers to load. Narrow intents get fewer tiers;
 * low-confidence and open-ended intents get more.
 */
export function selectTiers(
  primaryType: QueryType,
  confidence: number,
  mode: RetrievalMode,
  policy: SelectionPolicy
): TierSelection {
  if (mode === "traditional") {
    return { tiers: ["L2"], strategy: "traditional" };
  }

  if (mode === "tiered-only") {
    return { tiers: ["L0", "L1"], strategy: "tiered_only" };
  }

  if (!policy.classifierEnabled) {
    return { tiers: ["L0", "L1"], strategy: "classifier_disabled" };
  }

  // No intent signal at all: the confidence of the fallback category says nothing
  // about how much context the query needs.
  if (primaryType === "general") {
    return { tiers: ["L0", "L1"], strategy: "hybrid_default" };
  }

  if (confidence < policy.minConfidenceThreshold) {
    return { tiers: ["L0", "L1", "L2"], strategy: "hybrid_low_confidence" };
  }

  if (primaryType === "administrative") {
    return { tiers: ["L0"], strategy: "hybrid_administrative" };
  }

  if (FACTUAL_TYPES.has(primaryType)) {
    return { tiers: ["L0", "L1"], strategy: "hybrid_factual" };
  }

  if (primaryType === "analytical") {
    return {
      tiers: confidence > ANALYTICAL_NARROW_CONFIDENCE ? ["L1", "L2"] : ["L0", "L1", "L2"],
      strategy: "hybrid_analytical"
    };
  }

  if (primaryType === "creative") {
    return { tiers: ["L0", "L1", "L2"], strategy: "hybrid_creative" };
  }

  return { tiers: ["L0", "L1"], strategy: "hybrid_default" };
}
