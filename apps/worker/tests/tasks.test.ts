import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryStatsPersistence, InMemoryTierStore, TierEngine } from "@tierwise/core";
import { ConfigFileWatcher, FileTierStore, saveEngineConfigFile } from "@tierwise/filestore";
import { flushStats } from "../src/tasks/flushStats";
import { ingestDocument, ingestDocumentPayloadSchema } from "../src/tasks/ingestDocument";
import { migrateDirectory } from "../src/tasks/migrateDirectory";
import { rebuildIndex } from "../src/tasks/rebuildIndex";
import { reloadConfig } from "../src/tasks/reloadConfig";
import { formatDashboard, statsReport } from "../src/tasks/statsReport";

const REPORT = "# Report\n## Progress\n- done task A\n- done task B\n";

function helpersMock() {
  return {
    logger: {
      info: vi.fn(),
      error: vi.fn()
    }
  };
}

describe("worker tasks", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tierwise-worker-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("ingests inline text", async () => {
    const store = new InMemoryTierStore();
    const engine = new TierEngine({ store });
    const helpers = helpersMock();

    await ingestDocument({ documentKey: "2026-02-11", text: REPORT }, helpers, { engine });

    await expect(store.getTierContent("2026-02-11", "L0")).resolves.toBe("Report...");
    expect(helpers.logger.info).toHaveBeenCalledWith(
      expect.stringContaining("ingestDocument key=2026-02-11 chars=49 tier0=9")
    );
  });

  it("ingests from a source path and links L2", async () => {
    const sourcePath = join(root, "2026-02-11.md");
    await writeFile(sourcePath, REPORT, "utf8");
    const store = new FileTierStore({ root: join(root, "tiers") });
    const helpers = helpersMock();

    await ingestDocument({ documentKey: "2026-02-11", sourcePath }, helpers, { engine: new TierEngine({ store }) });

    await expect(store.getTierContent("2026-02-11", "L2")).resolves.toBe(REPORT);
  });

  it("requires text or a source path", () => {
    expect(ingestDocumentPayloadSchema.safeParse({ documentKey: "2026-02-11" }).success).toBe(false);
    expect(ingestDocumentPayloadSchema.safeParse({ documentKey: "2026-02-11", text: "" }).success).toBe(true);
  });

  it("migrates a directory and writes the index", async () => {
    const sourceDir = join(root, "notes");
    const tiers = join(root, "tiers");
    await mkdir(sourceDir, { recursive: true });
    await writeFile(join(sourceDir, "2026-02-11.md"), REPORT, "utf8");
    const engine = new TierEngine({ store: new FileTierStore({ root: tiers }) });
    const helpers = helpersMock();

    await migrateDirectory({ sourceDir }, helpers, { engine, root: tiers, kind: "filesystem" });

    expect(helpers.logger.info).toHaveBeenCalledWith(expect.stringContaining("migrated=1/1 failed=0"));
    expect(helpers.logger.error).not.toHaveBeenCalled();

    const indexHelpers = helpersMock();
    await rebuildIndex({}, indexHelpers, { root: tiers, kind: "filesystem" });
    expect(indexHelpers.logger.info).toHaveBeenCalledWith("rebuildIndex namespaces=1 files=3");
  });

  it("skips the index for the postgres store", async () => {
    const helpers = helpersMock();

    await rebuildIndex({}, helpers, { root, kind: "postgres" });

    expect(helpers.logger.info).toHaveBeenCalledWith("rebuildIndex skipped store=postgres");
  });

  it("flushes stats to persistence", async () => {
    const persistence = new InMemoryStatsPersistence();
    const engine = new TierEngine({ store: new InMemoryTierStore(), statsPersistence: persistence });
    await engine.ingest("2026-02-11", REPORT);
    await engine.answer("检查状态", "2026-02-11");
    const helpers = helpersMock();

    await flushStats({}, helpers, { engine });

    await expect(persistence.loadSnapshot()).resolves.toMatchObject({ totalQueries: 1 });
    expect(helpers.logger.info).toHaveBeenCalledWith("flushStats queries=1");
  });

  it("reports the dashboard line by line", async () => {
    const engine = new TierEngine({ store: new InMemoryTierStore() });
    await engine.ingest("2026-02-11", REPORT);
    await engine.answer("检查状态", "2026-02-11");
    const helpers = helpersMock();

    await statsReport({}, helpers, { engine });

    const lines = formatDashboard(engine.dashboard());
    expect(lines[1]).toBe("  administrative: count=1 saving=59.2%");
    expect(helpers.logger.info).toHaveBeenCalledTimes(2);
    expect(helpers.logger.info).toHaveBeenNthCalledWith(2, "statsReport   administrative: count=1 saving=59.2%");
  });

  it("reloads the config only when the file changed", async () => {
    const engine = new TierEngine({ store: new InMemoryTierStore() });
    const configWatcher = new ConfigFileWatcher(root);
    await configWatcher.poll();
    const helpers = helpersMock();

    await reloadConfig({}, helpers, { engine, configWatcher }, {});
    expect(helpers.logger.info).not.toHaveBeenCalled();

    await saveEngineConfigFile(root, { mode: "tiered-only", minConfidenceThreshold: 0.5 });
    await reloadConfig({}, helpers, { engine, configWatcher }, { TIERWISE_MIN_CONFIDENCE: "0.7" });

    expect(engine.config.mode).toBe("tiered-only");
    expect(engine.config.minConfidenceThreshold).toBe(0.7);
    expect(helpers.logger.info).toHaveBeenCalledWith("reloadConfig mode=tiered-only minConfidence=0.7");
  });
});
