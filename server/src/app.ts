import "express-async-errors"; // Must be imported before any route handlers
import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { createApiRouter } from "./routes/index";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { sanitizeBody } from "./middleware/sanitize";
import { env } from "./config/env";
import type { GenerationOrchestrator } from "./services/generation";

interface AppDependencies {
  /** Built once at startup; shared read-only by every request. */
  orchestrator: GenerationOrchestrator;
}

function createApp({ orchestrator }: AppDependencies): Express {
  const app = express();

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind nginx/load balancer.
  if (env.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Security headers
  app.use(helmet());

  app.use(cors({ origin: env.CORS_ORIGIN }));

  // Request logging (first, so parser errors are logged with a request id)
  app.use(requestLogger);

  // Body parsing; images travel base64-encoded, hence the raised limit
  app.use(express.json({ limit: env.BODY_LIMIT }));

  // Input sanitization (trim, strip HTML, enforce option field length limits)
  app.use(sanitizeBody);

  // API routes
  app.use("/api", createApiRouter(orchestrator));

  // Catch-all 404 for any /api route that was not matched above
  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({
      error: {
        message: "Not found",
        code: "NOT_FOUND",
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

export { createApp };
export type { AppDependencies };
