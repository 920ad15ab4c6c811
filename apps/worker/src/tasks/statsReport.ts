import type { EngineDashboard } from "@tierwise/core";
import type { WorkerRuntime } from "../runtime";
import type { TaskHelpers } from "./types";

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatDashboard(dashboard: EngineDashboard): string[] {
  const lines = [
    `mode=${dashboard.mode} queries=${dashboard.totalQueries} saving=${percent(dashboard.averageSavingRate)} tokensSaved=${Math.round(dashboard.totalTokensSaved)} costSaved=$${dashboard.estimatedCostSaved.toFixed(4)}`
  ];

  for (const [type, entry] of Object.entries(dashboard.byType)) {
    lines.push(`  ${type}: count=${entry.count} saving=${percent(entry.averageSavingRate)}`);
  }

  return lines;
}

export async function statsReport(
  _payload: Record<string, never>,
  helpers: TaskHelpers,
  runtime: Pick<WorkerRuntime, "engine">
): Promise<void> {
  for (const line of formatDashboard(runtime.engine.dashboard())) {
    helpers.logger.info(`statsReport ${line}`);
  }
}
