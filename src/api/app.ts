import express, { NextFunction, Request, Response } from "express";
import cors from "cors";

import { Services } from "../services";
import healthRouter from "./routes/health";
import previewRouter from "./routes/preview";
import { createDeploymentsRouter } from "./routes/deployments";
import { createSubmissionsRouter } from "./routes/submissions";

// Inline data URIs make request bodies large
const JSON_BODY_LIMIT = "25mb";

function bodyParserStatus(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

export function createApp(services: Services): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: "*", credentials: false }));
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Routes
  app.use(healthRouter);
  app.use(previewRouter);
  app.use(createSubmissionsRouter(services.buildService));
  app.use("/deployments", createDeploymentsRouter(services));

  // Body parser failures (malformed JSON, oversized payloads)
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = bodyParserStatus(error);
    if (status === 400) {
      return res.status(400).json({ error: "Malformed JSON body" });
    }
    if (status === 413) {
      return res.status(413).json({ error: `Request body exceeds ${JSON_BODY_LIMIT}` });
    }
    next(error);
  });

  return app;
}
