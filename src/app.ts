import express, { Application, Request, Response, NextFunction } from "express";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import { createRouter, type RouteDeps } from "./routes";

export interface AppOptions extends RouteDeps {
  swaggerDocument?: Record<string, unknown> | null;
}

export function createApp({ swaggerDocument, ...routeDeps }: AppOptions): Application {
  const app: Application = express();

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));

  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.use(createRouter(routeDeps));

  // Basic error handler for uncaught errors within the request pipeline.
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error", err);
    res.status(500).json({ message: "Unexpected server error" });
  });

  return app;
}
