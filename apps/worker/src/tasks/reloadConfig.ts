import { loadEngineConfigFromEnv } from "@tierwise/core";
import type { WorkerRuntime } from "../runtime";
import type { TaskHelpers } from "./types";

export async function reloadConfig(
  _payload: Record<string, never>,
  helpers: TaskHelpers,
  runtime: Pick<WorkerRuntime, "engine" | "configWatcher">,
  env: Record<string, string | undefined> = process.env
): Promise<void> {
  const fileConfig = await runtime.configWatcher.poll();
  if (!fileConfig) {
    return;
  }

  const config = runtime.engine.updateConfig(loadEngineConfigFromEnv(env, fileConfig));
  helpers.logger.info(`reloadConfig mode=${config.mode} minConfidence=${config.minConfidenceThreshold}`);
}
