export * from "./client";
export * from "./schema";
export * from "./types";
export * from "./repositories";
export {
  getTierContent as getTierContentCached,
  upsertTierContent as upsertTierContentCached,
  tierContentCacheKey
} from "./cached-repositories";
export * from "./store";
