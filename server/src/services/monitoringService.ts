/**
 * In-memory monitoring service.
 *
 * Tracks basic application metrics that accumulate in memory and reset on
 * restart. Called from request middleware (requestLogger, errorHandler) and
 * from the analyze route after each generation.
 *
 * Exposed counters:
 *   - requestCount / errorCount / avgResponseTimeMs
 *   - generations: successful results per provider tier
 *   - sentinelCount: image requests answered with the placeholder text
 *   - exhaustedCount: summaries that failed on every tier
 */

import type { ProviderTier } from "./generation/types";

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

function emptyTierCounts(): Record<ProviderTier, number> {
  return {
    "managed-library": 0,
    "raw-network-primary": 0,
    "raw-network-fallback": 0,
  };
}

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let generations = emptyTierCounts();
let sentinelCount = 0;
let exhaustedCount = 0;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Record a completed request with its response time.
 */
function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
}

/**
 * Record an error processed by the error handler.
 */
function recordError(): void {
  errorCount++;
}

/**
 * Record a generation result. A null tier means the sentinel was served.
 */
function recordGeneration(tier: ProviderTier | null): void {
  if (tier === null) {
    sentinelCount++;
    return;
  }
  generations[tier]++;
}

function recordExhaustion(): void {
  exhaustedCount++;
}

/**
 * Get a snapshot of all current metrics.
 */
function getMetrics(): {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  uptime: number;
  generations: Record<ProviderTier, number>;
  sentinelCount: number;
  exhaustedCount: number;
} {
  const avgResponseTimeMs =
    requestCount > 0
      ? Math.round((totalResponseTimeMs / requestCount) * 100) / 100
      : 0;

  return {
    requestCount,
    errorCount,
    avgResponseTimeMs,
    uptime: process.uptime(),
    generations: { ...generations },
    sentinelCount,
    exhaustedCount,
  };
}

/**
 * Reset all metrics to initial values (useful for testing).
 */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  generations = emptyTierCounts();
  sentinelCount = 0;
  exhaustedCount = 0;
}

export const monitoringService = {
  recordRequest,
  recordError,
  recordGeneration,
  recordExhaustion,
  getMetrics,
  resetMetrics,
};
