import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import path from "node:path";
import { z, ZodError } from "zod";

import type { CompletionClient } from "./lib/ai/index.js";
import { UnsupportedFormatError } from "./lib/errors.js";
import { processTranscript } from "./lib/pipeline.js";
import { renderSpreadsheet } from "./lib/spreadsheet.js";

export interface AppDeps {
  completion: CompletionClient;
  uploadLimitBytes: number;
  publicDir?: string;
}

// Express 4 does not forward rejected promises to the error handler.
function asyncRoute(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function errorStatus(err: unknown): number {
  if (err instanceof UnsupportedFormatError || err instanceof ZodError) return 400;
  if (err instanceof multer.MulterError) return err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
  if (err instanceof SyntaxError && "status" in err && err.status === 400) return 400;
  return 500;
}

function errorMessage(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  if (deps.publicDir) app.use(express.static(deps.publicDir));

  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: deps.uploadLimitBytes } });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, completionConfigured: deps.completion.configured });
  });

  app.post("/api/transcripts/process", upload.single("file"), asyncRoute(async (req, res) => {
    if (!req.file) {
      res.status(400).json({ error: "file is required" });
      return;
    }

    const fileName = req.file.originalname || "transcript";
    const { outcome, spreadsheet } = await processTranscript(
      req.file.buffer,
      path.extname(fileName),
      deps.completion
    );

    res.json({
      fileName,
      outcome: outcome.kind,
      details: outcome.details,
      rawOutput: outcome.kind === "fallback" ? outcome.rawOutput : undefined,
      spreadsheet: {
        fileName: spreadsheet.fileName,
        mimeType: spreadsheet.mimeType,
        base64: spreadsheet.content.toString("base64")
      }
    });
  }));

  // Re-render a previewed record without calling the model again
  app.post("/api/spreadsheets", asyncRoute(async (req, res) => {
    const schema = z.object({
      details: z.record(z.unknown())
    });
    const body = schema.parse(req.body);

    const spreadsheet = await renderSpreadsheet(Object.freeze(body.details));
    res.attachment(spreadsheet.fileName);
    res.type(spreadsheet.mimeType);
    res.send(spreadsheet.content);
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = errorMessage(err);
    if (status >= 500) {
      console.error(err);
      res.status(status).json({ error: `An error occurred: ${message}` });
      return;
    }
    res.status(status).json({ error: message });
  });

  return app;
}
