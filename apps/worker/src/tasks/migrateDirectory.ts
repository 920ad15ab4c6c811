import { z } from "zod";
import { migrateDirectory as runMigration, writeTierIndex } from "@tierwise/filestore";
import type { WorkerRuntime } from "../runtime";
import type { TaskHelpers } from "./types";

export const migrateDirectoryPayloadSchema = z.object({
  sourceDir: z.string().min(1),
  linkFullContent: z.boolean().optional()
});

export type MigrateDirectoryPayload = z.infer<typeof migrateDirectoryPayloadSchema>;

export async function migrateDirectory(
  payload: MigrateDirectoryPayload,
  helpers: TaskHelpers,
  runtime: Pick<WorkerRuntime, "engine" | "root" | "kind">
): Promise<void> {
  const report = await runMigration(runtime.engine, {
    sourceDir: payload.sourceDir,
    root: runtime.root,
    linkFullContent: payload.linkFullContent
  });

  if (runtime.kind === "filesystem") {
    await writeTierIndex(runtime.root);
  }

  for (const failure of report.failures) {
    helpers.logger.error(`migrateDirectory file=${failure.file} error=${failure.error}`);
  }
  helpers.logger.info(
    `migrateDirectory source=${report.sourceDir} migrated=${report.migratedFiles}/${report.totalFiles} failed=${report.failedFiles} tier1Ratio=${report.compressionRatioTier1.toFixed(3)}`
  );
}
