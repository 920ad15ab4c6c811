import { createLogger } from "@tierwise/observability";
import { getRedisClient } from "./client";
import type { CacheParser, CacheSetOptions } from "./types";

const log = createLogger({ component: "cache" });

const DEFAULT_SERIALIZE = (value: unknown): string => JSON.stringify(value);

export const CACHE_PREFIX = "cache";

export function buildCacheKey(...parts: (string | undefined)[]): string {
  return [CACHE_PREFIX, ...parts.filter((part): part is string => Boolean(part))].join(":");
}

/** Reads a cached value; misses and failures both return null. */
export async function getCache<T>(key: string, parse: CacheParser<T>): Promise<T | null> {
  const redis = getRedisClient();
  if (!redis) {
    return null;
  }

  try {
    const value = await redis.get(key);
    if (value === null) {
      return null;
    }
    return parse(JSON.parse(value));
  } catch (error) {
    log.error({ err: error, key }, "cache read failed");
    return null;
  }
}

export async function setCache(key: string, value: unknown, options: CacheSetOptions): Promise<void> {
  const redis = getRedisClient();
  if (!redis) {
    return;
  }

  try {
    const serialize = options.serialize ?? DEFAULT_SERIALIZE;
    await redis.setex(key, options.ttlSeconds, serialize(value));
  } catch (error) {
    log.error({ err: error, key }, "cache write failed");
  }
}

/** Deletes one exact key. Keys are never read as patterns. */
export async function deleteCache(key: string): Promise<number> {
  const redis = getRedisClient();
  if (!redis) {
    return 0;
  }

  try {
    return await redis.del(key);
  } catch (error) {
    log.error({ err: error, key }, "cache delete failed");
    return 0;
  }
}
