import { applySchema } from "@tierwise/db";
import { migrateDirectory, writeTierIndex } from "@tierwise/filestore";
import { closeRuntime, createRuntime, resolveStoreKind } from "../src/runtime";

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const indexOnly = args.includes("--index");
  const copy = args.includes("--copy");
  const sourceDir = args.find((arg) => !arg.startsWith("--"));

  if (resolveStoreKind() === "postgres") {
    await applySchema();
  }

  const runtime = await createRuntime();
  try {
    if (!indexOnly) {
      if (!sourceDir) {
        throw new Error("Usage: migrate.ts <sourceDir> [--copy] | --index");
      }

      const report = await migrateDirectory(runtime.engine, {
        sourceDir,
        root: runtime.root,
        linkFullContent: !copy
      });

      const summary = [
        `files=${report.totalFiles}`,
        `migrated=${report.migratedFiles}`,
        `failed=${report.failedFiles}`,
        `linked=${report.linkedFiles}`,
        `original=${report.totalOriginalSize}B`,
        `L0=${report.totalTier0Size}B (${percent(report.compressionRatioTier0)})`,
        `L1=${report.totalTier1Size}B (${percent(report.compressionRatioTier1)})`,
        `expectedSaving=${percent(report.expectedTokenSaving)}`
      ].join(" ");
      console.log(`[tierwise:migrate] ${summary}`);

      for (const failure of report.failures) {
        console.error(`[tierwise:migrate] ${failure.file}: ${failure.error}`);
      }
    }

    if (runtime.kind === "filesystem") {
      const index = await writeTierIndex(runtime.root);
      console.log(`[tierwise:migrate] index namespaces=${index.namespaces.length} files=${index.entries.length}`);
    }
  } finally {
    await closeRuntime(runtime);
  }
}

main().catch((error: unknown) => {
  console.error("[tierwise:migrate] failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
