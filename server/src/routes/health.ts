/**
 * Health check endpoint.
 *
 * Reports which provider tiers can currently answer, plus in-memory
 * metrics. Used by load balancers and operational tooling.
 *
 * Response shape:
 *   {
 *     status: "ok" | "degraded",
 *     timestamp: string,
 *     uptime: number,
 *     providers: [{ tier, kind, model, available }],
 *     metrics: { requestCount, errorCount, generations, ... }
 *   }
 *
 * "degraded" (HTTP 503) means no tier is available, e.g. no API key.
 */

import { Router, Request, Response } from "express";
import type { GenerationOrchestrator } from "../services/generation";
import { monitoringService } from "../services/monitoringService";

function createHealthRouter(orchestrator: GenerationOrchestrator): Router {
  const healthRouter = Router();

  healthRouter.get("/", (_req: Request, res: Response) => {
    const providers = orchestrator.describePlan();
    const anyAvailable = providers.some((provider) => provider.available);

    res.status(anyAvailable ? 200 : 503).json({
      status: anyAvailable ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      providers,
      metrics: monitoringService.getMetrics(),
    });
  });

  return healthRouter;
}

export { createHealthRouter };
