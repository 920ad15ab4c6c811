import { closeRuntime, createRuntime } from "../src/runtime";

async function main(): Promise<void> {
  const [query, documentKey] = process.argv.slice(2);
  if (!query) {
    throw new Error("Usage: query.ts \"<query>\" [documentKey]");
  }

  const runtime = await createRuntime();
  try {
    const { content, metrics } = documentKey
      ? await runtime.engine.answer(query, documentKey)
      : await runtime.engine.answerLatest(query);

    const summary = [
      `document=${metrics.documentKey || "n/a"}`,
      `type=${metrics.queryType}`,
      `confidence=${metrics.confidence.toFixed(2)}`,
      `strategy=${metrics.strategy}`,
      `tiers=${metrics.tiersLoaded.join(",") || "none"}`,
      `tokens=${metrics.estimatedTokensReturned.toFixed(1)}/${metrics.estimatedTokensBaseline.toFixed(1)}`,
      `saving=${(metrics.savingRate * 100).toFixed(1)}%`,
      `latencyMs=${metrics.latencyMs.toFixed(1)}`
    ].join(" ");

    console.log(`[tierwise:query] ${summary}`);
    console.log(content);
  } finally {
    await closeRuntime(runtime);
  }
}

main().catch((error: unknown) => {
  console.error("[tierwise:query] failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
