import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { withTransaction } from "./client";

export function loadInitialSchemaSql(): string {
  const filePath = resolve(fileURLToPath(new URL("../migrations/0001_init.sql", import.meta.url)));
  return readFileSync(filePath, "utf8");
}

export async function applySchema(sql: string = loadInitialSchemaSql()): Promise<void> {
  await withTransaction(async (client) => {
    await client.query(sql);
  });
}
