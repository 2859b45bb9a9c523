import OpenAI from "openai";
import type { NarrativeFailureReason, NarrativeGenerator, NarrativePrompt, NarrativeResult } from "../types";
import { describeError } from "../utils";
import { buildSystemPrompt, buildUserPrompt } from "./prompt";

export interface NarrativeCompletionRequest {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: Array<{ role: "system"; content: string } | { role: "user"; content: string }>;
}

export interface NarrativeCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

// The slice of the OpenAI chat completions API the generator calls.
export interface ChatCompletionsApi {
  create(
    body: NarrativeCompletionRequest,
    options?: { timeout?: number; maxRetries?: number }
  ): Promise<NarrativeCompletionResponse>;
}

export interface OpenAINarrativeOptions {
  completions: ChatCompletionsApi;
  model: string;
  timeoutMs: number;
}

export function createOpenAIClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

export function createOpenAINarrativeGenerator({ completions, model, timeoutMs }: OpenAINarrativeOptions): NarrativeGenerator {
  return {
    async generate(prompt: NarrativePrompt): Promise<NarrativeResult> {
      let response: NarrativeCompletionResponse;
      try {
        response = await completions.create(
          {
            model,
            temperature: 0.2,
            max_tokens: 400,
            messages: [
              { role: "system", content: buildSystemPrompt() },
              { role: "user", content: buildUserPrompt(prompt) }
            ]
          },
          { timeout: timeoutMs, maxRetries: 0 }
        );
      } catch (error) {
        return { ok: false, reason: classifyOpenAIError(error), detail: describeError(error) };
      }

      const content = response.choices[0]?.message?.content;
      if (!content || content.trim().length === 0) {
        return { ok: false, reason: "malformed_response", detail: "Model returned empty response" };
      }
      return { ok: true, text: content };
    }
  };
}

export function classifyOpenAIError(error: unknown): NarrativeFailureReason {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return "timeout";
  }
  if (error instanceof OpenAI.RateLimitError) {
    return "rate_limited";
  }
  return "unavailable";
}
