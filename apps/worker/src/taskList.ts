import type { TaskList } from "graphile-worker";
import type { WorkerRuntime } from "./runtime";
import { flushStats } from "./tasks/flushStats";
import { ingestDocument, ingestDocumentPayloadSchema } from "./tasks/ingestDocument";
import { migrateDirectory, migrateDirectoryPayloadSchema } from "./tasks/migrateDirectory";
import { rebuildIndex } from "./tasks/rebuildIndex";
import { reloadConfig } from "./tasks/reloadConfig";
import { statsReport } from "./tasks/statsReport";

export function buildTaskList(runtime: WorkerRuntime): TaskList {
  return {
    "ingest-document": async (payload, helpers) => {
      await ingestDocument(ingestDocumentPayloadSchema.parse(payload), helpers, runtime);
    },
    "migrate-directory": async (payload, helpers) => {
      await migrateDirectory(migrateDirectoryPayloadSchema.parse(payload), helpers, runtime);
    },
    "flush-stats": async (_payload, helpers) => {
      await flushStats({}, helpers, runtime);
    },
    "stats-report": async (_payload, helpers) => {
      await statsReport({}, helpers, runtime);
    },
    "reload-config": async (_payload, helpers) => {
      await reloadConfig({}, helpers, runtime);
    },
    "rebuild-index": async (_payload, helpers) => {
      await rebuildIndex({}, helpers, runtime);
    }
  };
}
