import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryTierStore, TierEngine, type TierStore } from "@tierwise/core";
import { FileTierStore } from "../src/file-store";
import { migrateDirectory, migrationReportPath } from "../src/migration";
import { buildTierIndex, writeTierIndex } from "../src/tier-index";

const REPORT = "# Report\n## Progress\n- done task A\n- done task B\n";
const PLAN = "Weekly sync\nWe agreed to move the launch to March because of QA.";

describe("migrateDirectory", () => {
  let workspace: string;
  let sourceDir: string;
  let root: string;

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), "tierwise-migrate-"));
    sourceDir = join(workspace, "notes");
    root = join(workspace, "tiers");
    await mkdir(sourceDir, { recursive: true });
    await writeFile(join(sourceDir, "2026-02-11.md"), REPORT, "utf8");
    await writeFile(join(sourceDir, "2026-02-10.md"), PLAN, "utf8");
    await writeFile(join(sourceDir, "readme.txt"), "not markdown", "utf8");
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it("writes every tier and reports compression", async () => {
    const store = new FileTierStore({ root });
    const engine = new TierEngine({ store });
    const times = [new Date("2026-02-11T09:00:00.000Z"), new Date("2026-02-11T09:00:05.000Z")];

    const report = await migrateDirectory(engine, { sourceDir, root, now: () => times.shift() ?? new Date(0) });

    expect(report).toMatchObject({
      totalFiles: 2,
      migratedFiles: 2,
      failedFiles: 0,
      failures: [],
      totalOriginalSize: 49 + 64,
      totalTier0Size: 9 + 67,
      startedAt: "2026-02-11T09:00:00.000Z",
      finishedAt: "2026-02-11T09:00:05.000Z"
    });
    expect(report.compressionRatioTier0).toBeCloseTo(76 / 113);
    expect(report.expectedTokenSaving).toBeCloseTo(1 - report.totalTier1Size / 113);
    await expect(store.getTierContent("2026-02-11", "L0")).resolves.toBe("Report...");
    await expect(store.getTierContent("2026-02-10", "L2")).resolves.toBe(PLAN);

    const stored: unknown = JSON.parse(await readFile(migrationReportPath(root), "utf8"));
    expect(stored).toEqual(report);
  });

  it("copies full content when linking is disabled", async () => {
    const engine = new TierEngine({ store: new FileTierStore({ root }) });

    const report = await migrateDirectory(engine, { sourceDir, root, linkFullContent: false });

    expect(report.linkedFiles).toBe(0);
  });

  it("records failing files and keeps going", async () => {
    const inner = new InMemoryTierStore();
    const flaky: TierStore = {
      getTierContent: (key, tier) => inner.getTierContent(key, tier),
      putTierContent: async (key, tier, content) => {
        if (key === "2026-02-10") {
          throw new Error("disk full");
        }
        await inner.putTierContent(key, tier, content);
      },
      listDocuments: () => inner.listDocuments()
    };

    const report = await migrateDirectory(new TierEngine({ store: flaky }), { sourceDir, root });

    expect(report.migratedFiles).toBe(1);
    expect(report.failedFiles).toBe(1);
    expect(report.failures).toEqual([{ file: "2026-02-10.md", error: "disk full" }]);
    await expect(inner.listDocuments()).resolves.toEqual(["2026-02-11"]);
  });
});

describe("tier index", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tierwise-index-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists tier files per namespace and skips the config directory", async () => {
    await new FileTierStore({ root }).putTierContent("2026-02-11", "L0", "Report...");
    await new FileTierStore({ root, namespace: "skills" }).putTierContent("typescript", "L1", "overview");
    await mkdir(join(root, "config"), { recursive: true });
    await writeFile(join(root, "config", "stats.json"), "{}", "utf8");

    const index = await buildTierIndex(root, new Date("2026-02-11T09:00:00.000Z"));

    expect(index.version).toBe(1);
    expect(index.createdAt).toBe("2026-02-11T09:00:00.000Z");
    expect(index.namespaces).toEqual(["memory", "skills"]);
    expect(index.entries.map(({ path, namespace, tier, size }) => ({ path, namespace, tier, size }))).toEqual([
      { path: "memory/L0/2026-02-11.md", namespace: "memory", tier: "L0", size: 9 },
      { path: "skills/L1/typescript.md", namespace: "skills", tier: "L1", size: 8 }
    ]);
  });

  it("writes index.json at the root", async () => {
    await new FileTierStore({ root }).putTierContent("2026-02-11", "L0", "Report...");

    const index = await writeTierIndex(root);

    const stored: unknown = JSON.parse(await readFile(join(root, "index.json"), "utf8"));
    expect(stored).toEqual(index);
  });
});
