// app.ts
import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { bomRouter } from "./api/bom.js";
import { logger } from "./lib/logger.js";
import { errorMessage } from "./lib/guards.js";

export function createApp() {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/bom", bomRouter);

  // Malformed JSON bodies surface here from express.json().
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Request body is not valid JSON" });
      return;
    }
    logger.error("[api] unhandled error", err);
    res.status(500).json({ error: errorMessage(err) || "Internal error" });
  });

  return app;
}
