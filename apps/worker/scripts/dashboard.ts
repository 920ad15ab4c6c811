import { closeRuntime, createRuntime } from "../src/runtime";
import { formatDashboard } from "../src/tasks/statsReport";

async function main(): Promise<void> {
  const reset = process.argv.slice(2).includes("--reset");
  const runtime = await createRuntime();

  try {
    const dashboard = runtime.engine.dashboard();
    for (const line of formatDashboard(dashboard)) {
      console.log(`[tierwise:dashboard] ${line}`);
    }
    for (const entry of dashboard.recent) {
      console.log(
        `[tierwise:dashboard] recent ${entry.timestamp} ${entry.queryType} tiers=${entry.tiersLoaded.join(",")} saving=${(entry.savingRate * 100).toFixed(1)}% "${entry.query}"`
      );
    }

    if (reset) {
      runtime.engine.resetStats();
      console.log("[tierwise:dashboard] stats reset");
    }
  } finally {
    await closeRuntime(runtime);
  }
}

main().catch((error: unknown) => {
  console.error("[tierwise:dashboard] failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
