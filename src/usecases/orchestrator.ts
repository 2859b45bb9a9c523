import pLimit from "p-limit";
import type { InputRow, ResultSet } from "../types";
import { classifyRow } from "./classifier";
import { resolveRow, type ResolverDeps } from "./resolver";

export interface BatchDeps extends ResolverDeps {
  concurrency?: number;
}

const DEFAULT_CONCURRENCY = 3;

export async function runBatch(rows: readonly InputRow[], deps: BatchDeps): Promise<ResultSet> {
  const limit = pLimit(deps.concurrency ?? DEFAULT_CONCURRENCY);

  // Promise.all keeps input order regardless of which narrative returns first.
  const results = await Promise.all(
    rows.map((row) => limit(() => resolveRow(classifyRow(row, deps.registry), deps)))
  );

  return { total: results.length, results };
}
