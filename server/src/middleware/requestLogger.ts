import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

/**
 * Request logging middleware with request ID correlation.
 *
 * Reuses an inbound X-Request-Id when the caller supplies one, otherwise
 * assigns a fresh UUID. The id is exposed as req.requestId and echoed in the
 * X-Request-Id response header; on finish a structured line is logged with
 * requestId, method, path, statusCode and durationMs.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.get("X-Request-Id");
  const requestId =
    inbound && /^[\w-]{1,64}$/.test(inbound) ? inbound : crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;

    monitoringService.recordRequest(durationMs);

    logger.info("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs,
    });
  });

  next();
}

export { requestLogger };
