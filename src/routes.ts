import { Router, Request, Response, NextFunction, RequestHandler } from "express";
import multer from "multer";
import { IngestionError, parseCsvRows } from "./parsers/csv-rows";
import { runBatch, type BatchDeps } from "./usecases/orchestrator";
import { defaultRegistry } from "./usecases/registry";

export const MISSING_FILE_MESSAGE = "CSV file upload is required";
export const UPLOAD_TOO_LARGE_MESSAGE = "Uploaded file exceeds the size limit";
export const MALFORMED_UPLOAD_MESSAGE = "Malformed multipart upload";

export interface RouteDeps {
  batch: BatchDeps;
  maxUploadBytes: number;
}

export function createRouter({ batch, maxUploadBytes }: RouteDeps): Router {
  const router = Router();
  const registry = batch.registry ?? defaultRegistry;
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes, files: 1 } });

  router.get("/use-cases", (_req: Request, res: Response) => {
    const useCases = registry.list().map((entry) => ({
      name: entry.name,
      category: entry.category,
      remediation: entry.remediation ?? null
    }));
    res.json({ total: useCases.length, useCases });
  });

  router.post("/run-use-cases", receiveSingleFile(upload, "file"), async (req: Request, res: Response, next: NextFunction) => {
    if (!req.file) {
      return res.status(400).json({ message: MISSING_FILE_MESSAGE });
    }

    try {
      const rows = parseCsvRows(req.file.buffer);
      const resultSet = await runBatch(rows, batch);
      return res.json(resultSet);
    } catch (error) {
      if (error instanceof IngestionError) {
        return res.status(error.status).json({ message: error.message });
      }
      return next(error);
    }
  });

  return router;
}

function receiveSingleFile(upload: multer.Multer, field: string): RequestHandler {
  const single = upload.single(field);
  return (req: Request, res: Response, next: NextFunction) => {
    single(req, res, (error: unknown) => {
      if (!error) {
        next();
        return;
      }
      if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE") {
        res.status(413).json({ message: UPLOAD_TOO_LARGE_MESSAGE });
        return;
      }
      if (error instanceof multer.MulterError) {
        res.status(400).json({ message: error.message });
        return;
      }
      console.warn("Rejected malformed upload", error);
      res.status(400).json({ message: MALFORMED_UPLOAD_MESSAGE });
    });
  };
}
