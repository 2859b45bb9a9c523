import { toNarrativePrompt } from "../llm/prompt";
import type { ClassifiedRow, NarrativeGenerator, NarrativeResult, ResolvedRow } from "../types";
import { describeError, TimeoutError, withTimeout } from "../utils";
import { defaultRegistry, UseCaseRegistry } from "./registry";

export const REJECTED_SOLUTION = "Rejected: use_case not recognized.";
export const MANUAL_REVIEW_SOLUTION = "Manual review required.";
export const FALLBACK_PREFIX = "Narrative generation unavailable. Suggested action: ";

export const DEFAULT_NARRATIVE_TIMEOUT_MS = 5_000;

export interface ResolverDeps {
  generator: NarrativeGenerator;
  timeoutMs?: number;
  registry?: UseCaseRegistry;
}

export async function resolveRow(row: ClassifiedRow, deps: ResolverDeps): Promise<ResolvedRow> {
  const registry = deps.registry ?? defaultRegistry;
  return { ...row, solution: await chooseSolution(row, deps, registry) };
}

async function chooseSolution(row: ClassifiedRow, deps: ResolverDeps, registry: UseCaseRegistry): Promise<string> {
  if (row.status === "INVALID_USE_CASE") {
    return REJECTED_SOLUTION;
  }

  const entry = registry.get(row.use_case);
  if (entry && !entry.narrative) {
    return entry.remediation ?? MANUAL_REVIEW_SOLUTION;
  }

  const outcome = await requestNarrative(row, deps);
  if (outcome.ok) {
    return outcome.text;
  }

  console.warn(`Narrative generation failed for "${row.use_case}" (${outcome.reason})${outcome.detail ? `: ${outcome.detail}` : ""}`);
  return composeFallback(registry.remediationText(row.use_case));
}

async function requestNarrative(row: ClassifiedRow, deps: ResolverDeps): Promise<NarrativeResult> {
  const timeoutMs = deps.timeoutMs ?? DEFAULT_NARRATIVE_TIMEOUT_MS;
  try {
    const result = await withTimeout(deps.generator.generate(toNarrativePrompt(row)), timeoutMs);
    if (result.ok && result.text.trim().length === 0) {
      return { ok: false, reason: "malformed_response", detail: "Narrative text was empty" };
    }
    return result;
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof TimeoutError ? "timeout" : "unavailable",
      detail: describeError(error)
    };
  }
}

export function composeFallback(remediation: string | null): string {
  return `${FALLBACK_PREFIX}${remediation ?? MANUAL_REVIEW_SOLUTION}`;
}
