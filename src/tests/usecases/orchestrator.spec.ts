import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { InputRow, NarrativePrompt, NarrativeResult } from "../../types";
import { runBatch } from "../../usecases/orchestrator";
import { defaultRegistry } from "../../usecases/registry";
import { REJECTED_SOLUTION } from "../../usecases/resolver";
import { echoGenerator, stubGenerator } from "../helpers/generators";

const ROWS: InputRow[] = [
  { use_case: "Donation Commitment vs Actual Reconciliation", source: "Donor A", target: "Partner B", sent: "10", received: "7" },
  { use_case: "CSV Upload Validation" },
  { use_case: "Not A Real Case" },
  { use_case: "Receipt Confirmation", source: "Partner B", target: "Beneficiary E" },
  { use_case: "Duplicate Asset Detection", sent: "5", received: "3" }
];

describe("runBatch", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns one resolved row per input row, in input order", async () => {
    const resultSet = await runBatch(ROWS, { generator: echoGenerator() });

    expect(resultSet.total).toBe(5);
    expect(resultSet.results).toHaveLength(5);
    expect(resultSet.results.map((row) => row.use_case)).toEqual(ROWS.map((row) => row.use_case));
    expect(resultSet.results.map((row) => row.status)).toEqual([
      "MISMATCH",
      "VALIDATION_REQUIRED",
      "INVALID_USE_CASE",
      "PROCESS_EVENT",
      "VALIDATION_REQUIRED"
    ]);
    expect(resultSet.results[2]?.solution).toBe(REJECTED_SOLUTION);
  });

  it("restores input order when later rows finish first", async () => {
    const delays = new Map<string, number>([
      ["Receipt Confirmation", 1],
      ["Donation Commitment vs Actual Reconciliation", 30],
      ["Duplicate Asset Detection", 10]
    ]);
    const generator = {
      generate: async (prompt: NarrativePrompt): Promise<NarrativeResult> => {
        await new Promise((resolve) => setTimeout(resolve, delays.get(prompt.use_case) ?? 0));
        return { ok: true, text: `done: ${prompt.use_case}` };
      }
    };

    const resultSet = await runBatch(ROWS, { generator, concurrency: 5 });

    expect(resultSet.results.map((row) => row.solution)).toEqual([
      "done: Donation Commitment vs Actual Reconciliation",
      "Simple binary validation. System accepts or rejects the upload. No chatbot needed.",
      REJECTED_SOLUTION,
      "done: Receipt Confirmation",
      "done: Duplicate Asset Detection"
    ]);
  });

  it("never runs more narratives at once than the concurrency allows", async () => {
    let inFlight = 0;
    let peak = 0;
    const generator = {
      generate: async (prompt: NarrativePrompt): Promise<NarrativeResult> => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return { ok: true, text: prompt.use_case };
      }
    };
    const rows: InputRow[] = Array.from({ length: 8 }, () => ({ use_case: "Receipt Confirmation" }));

    const resultSet = await runBatch(rows, { generator, concurrency: 2 });

    expect(resultSet.total).toBe(8);
    expect(peak).toBe(2);
  });

  it("degrades every narrative row to its fallback when generation always fails", async () => {
    const rows: InputRow[] = defaultRegistry.list().map((entry) => ({ use_case: entry.name, sent: "2", received: "1" }));
    const resultSet = await runBatch(rows, { generator: stubGenerator() });

    expect(resultSet.total).toBe(29);
    for (const row of resultSet.results) {
      if (row.use_case === "CSV Upload Validation") {
        expect(row.solution).toBe("Simple binary validation. System accepts or rejects the upload. No chatbot needed.");
      } else {
        expect(row.solution).toBe(
          `Narrative generation unavailable. Suggested action: ${defaultRegistry.remediationText(row.use_case)}`
        );
      }
    }
  });

  it("returns an empty result set for no rows", async () => {
    const generator = echoGenerator();
    await expect(runBatch([], { generator })).resolves.toEqual({ total: 0, results: [] });
    expect(generator.generate).not.toHaveBeenCalled();
  });
});
