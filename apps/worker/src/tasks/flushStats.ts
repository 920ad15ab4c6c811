import type { WorkerRuntime } from "../runtime";
import type { TaskHelpers } from "./types";

export async function flushStats(
  _payload: Record<string, never>,
  helpers: TaskHelpers,
  runtime: Pick<WorkerRuntime, "engine">
): Promise<void> {
  await runtime.engine.flushStats();
  helpers.logger.info(`flushStats queries=${runtime.engine.stats.totalQueries}`);
}
