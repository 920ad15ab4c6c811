import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import type { TierEngine } from "@tierwise/core";
import { createLogger, type Logger } from "@tierwise/observability";
import { errorMessage, writeJsonFile } from "./fs-utils";
import { CONFIG_DIRECTORY } from "./stats-file";

export const MIGRATION_REPORT_FILE = "migration-report.json";

export type MigrationFailure = {
  file: string;
  error: string;
};

export type MigrationReport = {
  sourceDir: string;
  totalFiles: number;
  migratedFiles: number;
  failedFiles: number;
  failures: MigrationFailure[];
  linkedFiles: number;
  totalOriginalSize: number;
  totalTier0Size: number;
  totalTier1Size: number;
  compressionRatioTier0: number;
  compressionRatioTier1: number;
  expectedTokenSaving: number;
  startedAt: string;
  finishedAt: string;
};

export type MigrateDirectoryOptions = {
  sourceDir: string;
  /** Root of the tier tree; the report goes to `<root>/config/migration-report.json`. */
  root: string;
  /** Reference source files from L2 instead of storing a copy. Defaults to true. */
  linkFullContent?: boolean;
  logger?: Logger;
  now?: () => Date;
};

export function migrationReportPath(root: string): string {
  return join(resolve(root), CONFIG_DIRECTORY, MIGRATION_REPORT_FILE);
}

async function listMarkdownFiles(sourceDir: string): Promise<string[]> {
  const entries = await readdir(sourceDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name) === ".md")
    .map((entry) => entry.name)
    .sort();
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

/**
 * Summarizes every Markdown file of `sourceDir` in name order, keyed by file name
 * without extension. A failing file is recorded and the run moves on.
 */
export async function migrateDirectory(engine: TierEngine, options: MigrateDirectoryOptions): Promise<MigrationReport> {
  const log = options.logger ?? createLogger({ component: "migration" });
  const now = options.now ?? (() => new Date());
  const sourceDir = resolve(options.sourceDir);
  const linkFullContent = options.linkFullContent ?? true;
  const startedAt = now().toISOString();

  const files = await listMarkdownFiles(sourceDir);
  log.info({ sourceDir, files: files.length }, "migration started");

  let migratedFiles = 0;
  let linkedFiles = 0;
  let totalOriginalSize = 0;
  let totalTier0Size = 0;
  let totalTier1Size = 0;
  const failures: MigrationFailure[] = [];

  for (const file of files) {
    const sourcePath = join(sourceDir, file);
    try {
      const text = await readFile(sourcePath, "utf8");
      const result = await engine.ingest(basename(file, ".md"), text, linkFullContent ? { sourcePath } : {});

      migratedFiles += 1;
      if (result.fullContent === "linked") {
        linkedFiles += 1;
      }
      totalOriginalSize += Buffer.byteLength(text, "utf8");
      totalTier0Size += Buffer.byteLength(result.digest.tier0, "utf8");
      totalTier1Size += Buffer.byteLength(result.digest.tier1, "utf8");
    } catch (error) {
      failures.push({ file, error: errorMessage(error) });
      log.error({ err: error, file }, "migration of file failed");
    }
  }

  const report: MigrationReport = {
    sourceDir,
    totalFiles: files.length,
    migratedFiles,
    failedFiles: failures.length,
    failures,
    linkedFiles,
    totalOriginalSize,
    totalTier0Size,
    totalTier1Size,
    compressionRatioTier0: ratio(totalTier0Size, totalOriginalSize),
    compressionRatioTier1: ratio(totalTier1Size, totalOriginalSize),
    expectedTokenSaving: totalOriginalSize > 0 ? 1 - ratio(totalTier1Size, totalOriginalSize) : 0,
    startedAt,
    finishedAt: now().toISOString()
  };

  await writeJsonFile(migrationReportPath(options.root), report);
  log.info(
    {
      migratedFiles,
      failedFiles: report.failedFiles,
      compressionRatioTier1: report.compressionRatioTier1
    },
    "migration finished"
  );
  return report;
}
