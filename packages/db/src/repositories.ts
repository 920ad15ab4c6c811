import { TIER_ORDER, type TierLevel } from "@tierwise/core";
import { query } from "./client";
import type { DocumentKeyRecord, TierContentRecord, TierContentUpsertInput } from "./types";

type DbTierContentRow = {
  namespace: string;
  document_key: string;
  tier: string;
  content: string;
  updated_at: Date | string;
};

type DbDocumentKeyRow = {
  document_key: string;
  updated_at: Date | string;
};

type DbStatsRow = {
  snapshot: unknown;
};

function toIso(value: Date | string): string {
  return new Date(value).toISOString();
}

function toTier(value: string): TierLevel {
  const tier = TIER_ORDER.find((candidate) => candidate === value);
  if (!tier) {
    throw new Error(`Unknown tier ${value} in tier_contents`);
  }
  return tier;
}

function mapTierContent(row: DbTierContentRow): TierContentRecord {
  return {
    namespace: row.namespace,
    documentKey: row.document_key,
    tier: toTier(row.tier),
    content: row.content,
    updatedAt: toIso(row.updated_at)
  };
}

export async function getTierContentRecord(
  namespace: string,
  documentKey: string,
  tier: TierLevel
): Promise<TierContentRecord | null> {
  const rows = await query<DbTierContentRow>(
    `
      SELECT namespace, document_key, tier, content, updated_at
      FROM tier_contents
      WHERE namespace = $1
        AND document_key = $2
        AND tier = $3
      LIMIT 1
    `,
    [namespace, documentKey, tier]
  );

  return rows[0] ? mapTierContent(rows[0]) : null;
}

export async function upsertTierContent(input: TierContentUpsertInput): Promise<TierContentRecord> {
  const rows = await query<DbTierContentRow>(
    `
      INSERT INTO tier_contents (namespace, document_key, tier, content, updated_at)
      VALUES ($1, $2, $3, $4, NOW())
      ON CONFLICT (namespace, document_key, tier)
      DO UPDATE SET content = EXCLUDED.content, updated_at = NOW()
      RETURNING namespace, document_key, tier, content, updated_at
    `,
    [input.namespace, input.documentKey, input.tier, input.content]
  );

  const row = rows[0];
  if (!row) {
    throw new Error(`Upsert of ${input.namespace}/${input.documentKey}/${input.tier} returned no row`);
  }
  return mapTierContent(row);
}

/** Most recently written document first. */
export async function listDocumentKeys(namespace: string, limit = 1000): Promise<DocumentKeyRecord[]> {
  const rows = await query<DbDocumentKeyRow>(
    `
      SELECT document_key, MAX(updated_at) AS updated_at
      FROM tier_contents
      WHERE namespace = $1
      GROUP BY document_key
      ORDER BY MAX(updated_at) DESC, document_key ASC
      LIMIT $2
    `,
    [namespace, limit]
  );

  return rows.map((row) => ({ documentKey: row.document_key, updatedAt: toIso(row.updated_at) }));
}

export async function getStatsSnapshotRow(namespace: string): Promise<unknown> {
  const rows = await query<DbStatsRow>(
    `
      SELECT snapshot
      FROM tier_stats
      WHERE namespace = $1
      LIMIT 1
    `,
    [namespace]
  );
  return rows[0] ? rows[0].snapshot : null;
}

export async function upsertStatsSnapshotRow(namespace: string, snapshot: unknown): Promise<void> {
  await query(
    `
      INSERT INTO tier_stats (namespace, snapshot, updated_at)
      VALUES ($1, $2::jsonb, NOW())
      ON CONFLICT (namespace)
      DO UPDATE SET snapshot = EXCLUDED.snapshot, updated_at = NOW()
    `,
    [namespace, JSON.stringify(snapshot)]
  );
}
