import { writeTierIndex } from "@tierwise/filestore";
import type { WorkerRuntime } from "../runtime";
import type { TaskHelpers } from "./types";

export async function rebuildIndex(
  _payload: Record<string, never>,
  helpers: TaskHelpers,
  runtime: Pick<WorkerRuntime, "root" | "kind">
): Promise<void> {
  if (runtime.kind !== "filesystem") {
    helpers.logger.info(`rebuildIndex skipped store=${runtime.kind}`);
    return;
  }

  const index = await writeTierIndex(runtime.root);
  helpers.logger.info(`rebuildIndex namespaces=${index.namespaces.length} files=${index.entries.length}`);
}
