// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import morgan from "morgan";
import { ZodError } from "zod";

import generationRoutes from "./routes/generationRoutes";
import { QuestionGenerator } from "./services/questionGenerator";
import { formatZodError } from "./utils/zodError";
import { errorMessage } from "./utils/errors";

type AppOptions = {
  generator?: QuestionGenerator;
  /** morgan format; pass null to disable request logging */
  requestLog?: string | null;
  /** cap on in-memory generation sessions */
  maxSessions?: number;
};

export default function createApp(opts: AppOptions = {}) {
  const app = express();
  const generator = opts.generator ?? new QuestionGenerator();

  // CORS: allow comma-separated origins in CORS_ORIGIN
  const allowed = (process.env.CORS_ORIGIN ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin || allowed.length === 0 || allowed.includes(origin)) return cb(null, true);
        return cb(new Error("Not allowed by CORS"));
      },
      credentials: true,
    })
  );

  app.use(helmet());
  app.use(express.json({ limit: "100kb" }));
  app.use(rateLimit({ windowMs: 60_000, limit: 30, standardHeaders: true, legacyHeaders: false }));
  const requestLog = opts.requestLog === undefined ? "dev" : opts.requestLog;
  if (requestLog) app.use(morgan(requestLog));

  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.use("/generation", generationRoutes(generator, { maxSessions: opts.maxSessions }));

  // zod handler
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof ZodError) {
      const details = formatZodError(err);
      console.error("[ZOD] validation failed:", JSON.stringify(details, null, 2));
      return res.status(400).json({ error: "Invalid input", ...details });
    }
    return next(err);
  });

  // default error handler
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error("[ERR]", errorMessage(err));
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
