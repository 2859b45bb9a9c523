import type { ClassifiedRow, NarrativePrompt } from "../types";

export function buildSystemPrompt(): string {
  return "You are a donation logistics operations assistant. Give admins short, practical resolution steps. Do not invent quantities or parties that are not in the request.";
}

export function toNarrativePrompt(row: ClassifiedRow): NarrativePrompt {
  return {
    use_case: row.use_case,
    source: row.source,
    target: row.target,
    status: row.status
  };
}

export function buildUserPrompt(prompt: NarrativePrompt): string {
  return [
    `Use case: ${prompt.use_case}`,
    `Source: ${prompt.source}`,
    `Target: ${prompt.target}`,
    `Status: ${prompt.status}`,
    "",
    "Explain the resolution clearly for an admin."
  ].join("\n");
}
