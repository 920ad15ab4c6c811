import { beforeEach, describe, expect, it, vi } from "vitest";
import { emptyStatsSnapshot, MalformedConfigError, StorageUnavailableError } from "@tierwise/core";

const { queryMock, getCacheMock, setCacheMock, deleteCacheMock } = vi.hoisted(() => ({
  queryMock: vi.fn(),
  getCacheMock: vi.fn(),
  setCacheMock: vi.fn(),
  deleteCacheMock: vi.fn()
}));

vi.mock("../src/client", () => ({
  query: queryMock,
  withTransaction: vi.fn(),
  pool: {
    connect: vi.fn()
  }
}));

vi.mock("@tierwise/cache", () => ({
  buildCacheKey: (...parts: string[]) => ["cache", ...parts].join(":"),
  getCache: getCacheMock,
  setCache: setCacheMock,
  deleteCache: deleteCacheMock
}));

import { PostgresStatsPersistence, PostgresTierStore } from "../src/store";

describe("PostgresTierStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    getCacheMock.mockResolvedValue(null);
    setCacheMock.mockResolvedValue(undefined);
    deleteCacheMock.mockResolvedValue(0);
  });

  it("serves cached tiers without querying", async () => {
    getCacheMock.mockResolvedValueOnce("Report...");
    const store = new PostgresTierStore();

    await expect(store.getTierContent("2026-02-11", "L0")).resolves.toBe("Report...");
    expect(getCacheMock).toHaveBeenCalledWith("cache:tier:memory:2026-02-11:L0", expect.any(Function));
    expect(queryMock).not.toHaveBeenCalled();
  });

  it("fills the cache after a database hit", async () => {
    queryMock.mockResolvedValueOnce([
      {
        namespace: "memory",
        document_key: "2026-02-11",
        tier: "L0",
        content: "Report...",
        updated_at: "2026-02-11T09:00:00.000Z"
      }
    ]);
    const store = new PostgresTierStore();

    await expect(store.getTierContent("2026-02-11", "L0")).resolves.toBe("Report...");
    expect(setCacheMock).toHaveBeenCalledWith("cache:tier:memory:2026-02-11:L0", "Report...", { ttlSeconds: 3600 });
  });

  it("returns null for a missing tier without caching it", async () => {
    queryMock.mockResolvedValueOnce([]);
    const store = new PostgresTierStore({ namespace: "skills" });

    await expect(store.getTierContent("typescript", "L1")).resolves.toBeNull();
    expect(setCacheMock).not.toHaveBeenCalled();
  });

  it("invalidates the cached tier on write", async () => {
    queryMock.mockResolvedValueOnce([
      {
        namespace: "skills",
        document_key: "typescript",
        tier: "L1",
        content: "overview",
        updated_at: "2026-02-11T09:00:00.000Z"
      }
    ]);
    const store = new PostgresTierStore({ namespace: "skills" });

    await store.putTierContent("typescript", "L1", "overview");

    expect(deleteCacheMock).toHaveBeenCalledWith("cache:tier:skills:typescript:L1");
  });

  it("invalidates keys with glob characters by their exact name", async () => {
    queryMock.mockResolvedValueOnce([
      {
        namespace: "memory",
        document_key: "notes[1]",
        tier: "L0",
        content: "Notes...",
        updated_at: "2026-02-11T09:00:00.000Z"
      }
    ]);

    await new PostgresTierStore().putTierContent("notes[1]", "L0", "Notes...");

    expect(deleteCacheMock).toHaveBeenCalledTimes(1);
    expect(deleteCacheMock).toHaveBeenCalledWith("cache:tier:memory:notes[1]:L0");
  });

  it("lists document keys", async () => {
    queryMock.mockResolvedValueOnce([
      { document_key: "2026-02-11", updated_at: "2026-02-11T09:00:00.000Z" },
      { document_key: "2026-02-09", updated_at: "2026-02-10T09:00:00.000Z" }
    ]);

    await expect(new PostgresTierStore().listDocuments()).resolves.toEqual(["2026-02-11", "2026-02-09"]);
  });

  it("wraps driver failures", async () => {
    queryMock.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    const store = new PostgresTierStore();

    const failure = await store.getTierContent("2026-02-11", "L2").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(StorageUnavailableError);
    if (failure instanceof StorageUnavailableError) {
      expect(failure.message).toBe("postgres get failed: connect ECONNREFUSED");
      expect(failure.operation).toBe("get");
      expect(failure.documentKey).toBe("2026-02-11");
      expect(failure.tier).toBe("L2");
    }
  });
});

describe("PostgresStatsPersistence", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("round-trips a validated snapshot", async () => {
    const snapshot = emptyStatsSnapshot(new Date("2026-02-11T09:00:00.000Z"));
    queryMock.mockResolvedValueOnce([]).mockResolvedValueOnce([{ snapshot: JSON.parse(JSON.stringify(snapshot)) }]);
    const persistence = new PostgresStatsPersistence();

    await persistence.saveSnapshot(snapshot);
    await expect(persistence.loadSnapshot()).resolves.toEqual(snapshot);
  });

  it("returns null when nothing was stored", async () => {
    queryMock.mockResolvedValueOnce([]);

    await expect(new PostgresStatsPersistence().loadSnapshot()).resolves.toBeNull();
  });

  it("rejects a corrupted snapshot", async () => {
    queryMock.mockResolvedValueOnce([{ snapshot: { version: 1 } }]);

    await expect(new PostgresStatsPersistence().loadSnapshot()).rejects.toBeInstanceOf(MalformedConfigError);
  });

  it("wraps write failures", async () => {
    queryMock.mockRejectedValueOnce(new Error("read-only transaction"));

    await expect(
      new PostgresStatsPersistence().saveSnapshot(emptyStatsSnapshot(new Date("2026-02-11T09:00:00.000Z")))
    ).rejects.toMatchObject({ name: "StorageUnavailableError", operation: "save_stats" });
  });
});
