import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { WorkerRuntime } from "../runtime";
import type { TaskHelpers } from "./types";

export const ingestDocumentPayloadSchema = z
  .object({
    documentKey: z.string().min(1),
    text: z.string().optional(),
    sourcePath: z.string().min(1).optional()
  })
  .refine((payload) => payload.text !== undefined || payload.sourcePath !== undefined, {
    message: "either text or sourcePath is required"
  });

export type IngestDocumentPayload = z.infer<typeof ingestDocumentPayloadSchema>;

export async function ingestDocument(
  payload: IngestDocumentPayload,
  helpers: TaskHelpers,
  runtime: Pick<WorkerRuntime, "engine">
): Promise<void> {
  const text = payload.text ?? (payload.sourcePath ? await readFile(payload.sourcePath, "utf8") : "");
  const result = await runtime.engine.ingest(
    payload.documentKey,
    text,
    payload.sourcePath ? { sourcePath: payload.sourcePath } : {}
  );

  helpers.logger.info(
    `ingestDocument key=${payload.documentKey} chars=${text.length} tier0=${result.digest.tier0.length} tier1=${result.digest.tier1.length} full=${result.fullContent}`
  );
}
