import dotenv from "dotenv";
import { createApp } from "./src/app";
import { ConfigError, loadConfig } from "./src/config/env";
import { loadSwaggerDocument } from "./src/docs";
import { createOpenAIClient, createOpenAINarrativeGenerator } from "./src/llm/client";

dotenv.config();

function bootstrap(): void {
  const config = loadConfig();

  const openai = createOpenAIClient(config.openaiApiKey);
  const generator = createOpenAINarrativeGenerator({
    completions: openai.chat.completions,
    model: config.openaiModel,
    timeoutMs: config.narrativeTimeoutMs
  });

  const app = createApp({
    batch: {
      generator,
      timeoutMs: config.narrativeTimeoutMs,
      concurrency: config.narrativeConcurrency
    },
    maxUploadBytes: config.maxUploadBytes,
    swaggerDocument: loadSwaggerDocument()
  });

  const server = app.listen(config.port, () => {
    console.log(`Donation use-case service listening on port ${config.port}`);
  });

  process.on("SIGTERM", () => {
    console.log("Received SIGTERM, shutting down.");
    server.close(() => process.exit(0));
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

try {
  bootstrap();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`Refusing to start: ${error.message}`);
  } else {
    console.error("Failed to start", error);
  }
  process.exit(1);
}
