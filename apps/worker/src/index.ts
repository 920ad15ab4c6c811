import { run } from "graphile-worker";
import { createLogger } from "@tierwise/observability";
import { closeRuntime, createRuntime } from "./runtime";
import { buildTaskList } from "./taskList";

const log = createLogger({ component: "worker" });

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required for worker runtime");
  }

  const runtime = await createRuntime();
  const runner = await run({
    connectionString,
    concurrency: Number(process.env.WORKER_CONCURRENCY ?? 5),
    taskList: buildTaskList(runtime),
    pollInterval: 2000,
    crontab: `
*/5 * * * * flush-stats {}
0 * * * * stats-report {}
* * * * * reload-config {}
30 * * * * rebuild-index {}
`
  });

  log.info({ store: runtime.kind, root: runtime.root, namespace: runtime.namespace }, "worker started");

  process.on("SIGTERM", () => {
    const shutdown = async () => {
      await runner.stop();
      await closeRuntime(runtime);
    };
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, "worker shutdown failed");
        process.exit(1);
      }
    );
  });
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "worker failed to start");
  process.exit(1);
});
