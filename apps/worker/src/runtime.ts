import { resolve } from "node:path";
import { z } from "zod";
import {
  loadEngineConfigFromEnv,
  TierEngine,
  type EngineConfig,
  type StatsPersistence,
  type TierStore
} from "@tierwise/core";
import { closeRedis } from "@tierwise/cache";
import { closePool, PostgresStatsPersistence, PostgresTierStore } from "@tierwise/db";
import {
  ConfigFileWatcher,
  DEFAULT_NAMESPACE,
  FileStatsPersistence,
  FileTierStore,
  loadEngineConfigFile
} from "@tierwise/filestore";
import { createLogger } from "@tierwise/observability";

export type StoreKind = "filesystem" | "postgres";

export type WorkerRuntime = {
  kind: StoreKind;
  root: string;
  namespace: string;
  engine: TierEngine;
  configWatcher: ConfigFileWatcher;
};

type Env = Record<string, string | undefined>;

const storeKindSchema = z.enum(["filesystem", "postgres"]).default("filesystem");

export function resolveStoreKind(env: Env = process.env): StoreKind {
  const parsed = storeKindSchema.safeParse(env.TIERWISE_STORE || undefined);
  if (!parsed.success) {
    throw new Error(`TIERWISE_STORE must be "filesystem" or "postgres", got "${env.TIERWISE_STORE}"`);
  }
  return parsed.data;
}

/** File config first, then TIERWISE_* variables on top. */
export async function resolveEngineConfig(root: string, env: Env = process.env): Promise<EngineConfig> {
  const fileConfig = await loadEngineConfigFile(root);
  return loadEngineConfigFromEnv(env, fileConfig);
}

export async function createRuntime(env: Env = process.env): Promise<WorkerRuntime> {
  const kind = resolveStoreKind(env);
  const root = resolve(env.TIERWISE_ROOT ?? "./tierwise-data");
  const namespace = env.TIERWISE_NAMESPACE ?? DEFAULT_NAMESPACE;

  let store: TierStore;
  let statsPersistence: StatsPersistence;
  if (kind === "postgres") {
    store = new PostgresTierStore({ namespace });
    statsPersistence = new PostgresStatsPersistence({ namespace });
  } else {
    store = new FileTierStore({ root, namespace });
    statsPersistence = new FileStatsPersistence(root);
  }

  const engine = new TierEngine({
    store,
    statsPersistence,
    config: await resolveEngineConfig(root, env),
    logger: createLogger({ component: "tier-engine", store: kind, namespace })
  });
  await engine.loadStats();

  const configWatcher = new ConfigFileWatcher(root);
  // Record the current modification time so the first reload only fires on a change.
  await configWatcher.poll();

  return { kind, root, namespace, engine, configWatcher };
}

/** Persists stats and releases connections held for the postgres store. */
export async function closeRuntime(runtime: Pick<WorkerRuntime, "engine" | "kind">): Promise<void> {
  await runtime.engine.flushStats();
  if (runtime.kind === "postgres") {
    await closeRedis();
    await closePool();
  }
}
