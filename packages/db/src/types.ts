import type { TierLevel } from "@tierwise/core";

export type TierContentRecord = {
  namespace: string;
  documentKey: string;
  tier: TierLevel;
  content: string;
  updatedAt: string;
};

export type TierContentUpsertInput = {
  namespace: string;
  documentKey: string;
  tier: TierLevel;
  content: string;
};

export type DocumentKeyRecord = {
  documentKey: string;
  updatedAt: string;
};
