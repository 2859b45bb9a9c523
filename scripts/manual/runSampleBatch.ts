import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { ConfigError, loadConfig } from "../../src/config/env";
import { createOpenAIClient, createOpenAINarrativeGenerator } from "../../src/llm/client";
import { parseCsvRows } from "../../src/parsers/csv-rows";
import { runBatch } from "../../src/usecases/orchestrator";

const DEFAULT_CSV = path.resolve(__dirname, "..", "..", "fixtures", "sample-use-cases.csv");

function preview(value: string, max = 160): string {
  const singleLine = value.replace(/\s+/g, " ").trim();
  return singleLine.length > max ? `${singleLine.slice(0, max)}…` : singleLine;
}

async function main(): Promise<void> {
  const csvPath = process.argv[2] ?? DEFAULT_CSV;
  const config = loadConfig();

  const openai = createOpenAIClient(config.openaiApiKey);
  const generator = createOpenAINarrativeGenerator({
    completions: openai.chat.completions,
    model: config.openaiModel,
    timeoutMs: config.narrativeTimeoutMs
  });

  const rows = parseCsvRows(fs.readFileSync(csvPath));
  console.log(`Running ${rows.length} rows from ${csvPath} against ${config.openaiModel}...\n`);

  const startedAt = Date.now();
  const resultSet = await runBatch(rows, {
    generator,
    timeoutMs: config.narrativeTimeoutMs,
    concurrency: config.narrativeConcurrency
  });

  for (const row of resultSet.results) {
    console.log(`${row.use_case}`);
    console.log(`  status: ${row.status} severity: ${row.severity} difference: ${row.difference}`);
    console.log(`  solution: ${preview(row.solution)}\n`);
  }

  const elapsed = ((Date.now() - startedAt) * 0.001).toFixed(1);
  console.log(`Resolved ${resultSet.total} rows in ${elapsed} seconds.`);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
    console.error("Ensure your .env mirrors .env.example before running this script.");
  } else {
    console.error("Sample batch crashed:", error instanceof Error ? error.stack ?? error.message : error);
  }
  process.exitCode = 1;
});
