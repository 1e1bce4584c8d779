/**
 * Probe the raw generateContent endpoint.
 *
 * Sends one short summarization prompt to the preferred and the secondary
 * model over plain HTTP (bypassing the SDK) and reports each outcome. Useful
 * for checking an API key or a model name before starting the server.
 *
 * Usage:
 *   node dist/scripts/probeModels.js
 *
 * Exits 1 when no model answered.
 */

import { env } from "../config/env";
import { logger } from "../config/logger";
import { HttpClient } from "../services/generation/httpClient";
import { buildSummaryPrompt } from "../services/generation/promptBuilder";

const SAMPLE_TEXT =
  "Machine learning lets computers learn patterns from data instead of " +
  "following hand-written rules. A model is trained on examples, then used " +
  "to classify or predict on inputs it has not seen before.";

interface ProbeReport {
  model: string;
  ok: boolean;
  detail: string;
  durationMs: number;
}

async function probe(client: HttpClient, model: string): Promise<ProbeReport> {
  const prompt = buildSummaryPrompt(SAMPLE_TEXT, {
    length: "short",
    tone: "neutral",
    language: "",
  });
  const start = Date.now();
  const outcome = await client.generate({ prompt, model });
  const durationMs = Date.now() - start;

  return outcome.ok
    ? { model, ok: true, detail: outcome.text, durationMs }
    : { model, ok: false, detail: outcome.reason, durationMs };
}

async function main(): Promise<void> {
  if (!env.GEMINI_API_KEY) {
    logger.error("probe", "GEMINI_API_KEY is not set; nothing to probe.");
    process.exitCode = 1;
    return;
  }

  const client = new HttpClient({
    apiKey: env.GEMINI_API_KEY,
    baseUrl: env.GEMINI_API_BASE_URL,
    timeoutMs: env.GEMINI_TIMEOUT_MS,
  });

  const models = [...new Set([env.GEMINI_MODEL, env.GEMINI_FALLBACK_MODEL])];
  const reports: ProbeReport[] = [];

  // One at a time, mirroring the server's fallback order
  for (const model of models) {
    logger.info("probe", `Testing ${model}...`, { endpoint: client.endpointFor(model) });
    const report = await probe(client, model);
    reports.push(report);

    if (report.ok) {
      logger.info("probe", `SUCCESS with ${model}`, {
        durationMs: report.durationMs,
        response: report.detail,
      });
    } else {
      logger.warn("probe", `FAILED with ${model}`, {
        durationMs: report.durationMs,
        reason: report.detail,
      });
    }
  }

  if (!reports.some((report) => report.ok)) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  logger.error("probe", "Probe crashed", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
