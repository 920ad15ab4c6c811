import { buildCacheKey, deleteCache, getCache, setCache } from "@tierwise/cache";
import type { TierLevel } from "@tierwise/core";
import { getTierContentRecord, upsertTierContent as upsertTierContentOriginal } from "./repositories";
import type { TierContentRecord, TierContentUpsertInput } from "./types";

// Cache TTLs (in seconds)
const CACHE_TTL = {
  TIER_CONTENT: 3600
};

function parseCachedContent(value: unknown): string {
  if (typeof value !== "string") {
    throw new Error("cached tier content is not a string");
  }
  return value;
}

export function tierContentCacheKey(namespace: string, documentKey: string, tier: TierLevel): string {
  return buildCacheKey("tier", namespace, documentKey, tier);
}

export async function getTierContent(namespace: string, documentKey: string, tier: TierLevel): Promise<string | null> {
  const cacheKey = tierContentCacheKey(namespace, documentKey, tier);
  const cached = await getCache(cacheKey, parseCachedContent);
  if (cached !== null) {
    return cached;
  }

  const record = await getTierContentRecord(namespace, documentKey, tier);
  if (!record) {
    return null;
  }

  await setCache(cacheKey, record.content, { ttlSeconds: CACHE_TTL.TIER_CONTENT });
  return record.content;
}

export async function upsertTierContent(input: TierContentUpsertInput): Promise<TierContentRecord> {
  const record = await upsertTierContentOriginal(input);
  await deleteCache(tierContentCacheKey(input.namespace, input.documentKey, input.tier));
  return record;
}
