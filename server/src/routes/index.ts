/**
 * API Route Index
 *
 * All routes are mounted under the /api prefix (set in app.ts).
 *
 * ┌─────────────────────────────────────┬────────┬──────────────────────────────────────────┐
 * │ Endpoint                            │ Method │ Description                              │
 * ├─────────────────────────────────────┼────────┼──────────────────────────────────────────┤
 * │ /api/health                         │ GET    │ Provider tier availability and metrics    │
 * ├─────────────────────────────────────┼────────┼──────────────────────────────────────────┤
 * │ /api/analyze                        │ POST   │ Summarize text or describe an image       │
 * └─────────────────────────────────────┴────────┴──────────────────────────────────────────┘
 *
 * Error responses follow the shape: { error: { message, code, requestId?, details? } }
 */

import { Router } from "express";
import type { GenerationOrchestrator } from "../services/generation";
import { createAnalyzeRouter } from "./analyze";
import { createHealthRouter } from "./health";

function createApiRouter(orchestrator: GenerationOrchestrator): Router {
  const router = Router();

  // Health check
  router.use("/health", createHealthRouter(orchestrator));

  // Summarization and image analysis
  router.use("/analyze", createAnalyzeRouter(orchestrator));

  return router;
}

export { createApiRouter };
