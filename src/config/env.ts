import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, "OPENAI_API_KEY is not configured"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  NARRATIVE_TIMEOUT_MS: positiveInt(5_000),
  NARRATIVE_CONCURRENCY: positiveInt(3),
  MAX_UPLOAD_BYTES: positiveInt(5 * 1024 * 1024),
  PORT: positiveInt(3000)
});

export interface AppConfig {
  openaiApiKey: string;
  openaiModel: string;
  narrativeTimeoutMs: number;
  narrativeConcurrency: number;
  maxUploadBytes: number;
  port: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }

  const parsed = result.data;
  return {
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiModel: parsed.OPENAI_MODEL,
    narrativeTimeoutMs: parsed.NARRATIVE_TIMEOUT_MS,
    narrativeConcurrency: parsed.NARRATIVE_CONCURRENCY,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    port: parsed.PORT
  };
}
