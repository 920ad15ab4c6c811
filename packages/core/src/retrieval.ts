import type { EngineConfig } from "./config";
import { TIER_ORDER, type RetrievalResult, type TierLevel, type TierSelection, type TierStore } from "./types";

type RetrievalConfig = Pick<EngineConfig, "tokensPerByte">;

// Used when L2 is missing and the full-content cost has to be guessed.
const BASELINE_FALLBACK_MULTIPLIER = 3;

export function estimateTokens(chars: number, tokensPerByte: number): number {
  return chars * tokensPerByte;
}

export function renderTierPart(tier: TierLevel, content: string): string {
  return `--- ${tier} ---\n${content}`;
}

export function computeSaving(
  returnedTokens: number,
  baselineTokens: number
): { savingRate: number; tokensSaved: number } {
  if (baselineTokens <= 0) {
    return { savingRate: 0, tokensSaved: 0 };
  }
  return {
    savingRate: 1 - returnedTokens / baselineTokens,
    tokensSaved: baselineTokens - returnedTokens
  };
}

/** The result for a query with no document to answer from. */
export function emptyRetrieval(selection: TierSelection): RetrievalResult {
  return {
    content: "",
    metrics: {
      tiersRequested: TIER_ORDER.filter((tier) => selection.tiers.includes(tier)),
      tiersLoaded: [],
      bytesReturned: 0,
      estimatedTokensReturned: 0,
      estimatedTokensBaseline: 0,
      ...computeSaving(0, 0)
    }
  };
}

/**
 * Loads the selected tiers of one document and prices the result against loading
 * L2 alone. Missing tiers are skipped; store failures propagate.
 */
export async function retrieve(
  store: TierStore,
  selection: TierSelection,
  documentKey: string,
  config: RetrievalConfig
): Promise<RetrievalResult> {
  const requested = TIER_ORDER.filter((tier) => selection.tiers.includes(tier));
  const fetched = new Map<TierLevel, string | null>();
  const parts: string[] = [];
  const tiersLoaded: TierLevel[] = [];

  for (const tier of requested) {
    const tierContent = await store.getTierContent(documentKey, tier);
    fetched.set(tier, tierContent);
    if (tierContent) {
      parts.push(renderTierPart(tier, tierContent));
      tiersLoaded.push(tier);
    }
  }

  const content = parts.join("\n\n");
  const bytesReturned = content.length;
  const estimatedTokensReturned = estimateTokens(bytesReturned, config.tokensPerByte);

  const fullContent = fetched.has("L2") ? fetched.get("L2") : await store.getTierContent(documentKey, "L2");
  const estimatedTokensBaseline = fullContent
    ? estimateTokens(fullContent.length, config.tokensPerByte)
    : estimatedTokensReturned * BASELINE_FALLBACK_MULTIPLIER;

  return {
    content,
    metrics: {
      tiersRequested: requested,
      tiersLoaded,
      bytesReturned,
      estimatedTokensReturned,
      estimatedTokensBaseline,
      ...computeSaving(estimatedTokensReturned, estimatedTokensBaseline)
    }
  };
}
