/**
 * Content generation service — factory and re-exports.
 *
 * Builds the fixed three-tier fallback plan from configuration:
 *   1. managed-library       SDK client, preferred model (or the model it fell back to)
 *   2. raw-network-primary   REST client, preferred model
 *   3. raw-network-fallback  REST client, secondary model
 *
 * Call createGenerationOrchestrator() once at startup and inject the result
 * into the app; the clients it holds are immutable after construction.
 */

import type { EnvConfig } from "../../config/env";
import { HttpClient } from "./httpClient";
import { LibraryClient, type ModelFactory } from "./libraryClient";
import { GenerationOrchestrator } from "./orchestrator";
import type { ProviderAttempt } from "./types";

export type {
  AttemptFailure,
  GenerationRequest,
  GenerationResult,
  ImageInput,
  ProviderAttempt,
  ProviderClient,
  ProviderTier,
  StyleOptions,
} from "./types";
export type { PlanEntry } from "./orchestrator";
export { GenerationOrchestrator } from "./orchestrator";
export { GenerationExhaustedError, InvalidGenerationRequestError } from "./errors";
export { HttpClient } from "./httpClient";
export { LibraryClient } from "./libraryClient";
export { IMAGE_SENTINEL_TEXT } from "./result";
export {
  buildImagePrompt,
  buildSummaryPrompt,
  normalizeStyleOptions,
} from "./promptBuilder";

type GenerationConfig = Pick<
  EnvConfig,
  | "GEMINI_API_KEY"
  | "GEMINI_MODEL"
  | "GEMINI_FALLBACK_MODEL"
  | "GEMINI_API_BASE_URL"
  | "GEMINI_TIMEOUT_MS"
>;

export interface GenerationOverrides {
  createModel?: ModelFactory;
  fetchImpl?: typeof fetch;
}

/**
 * Assemble the tier plan in priority order.
 */
export function buildAttemptPlan(
  library: LibraryClient,
  http: HttpClient,
  config: Pick<EnvConfig, "GEMINI_MODEL" | "GEMINI_FALLBACK_MODEL">
): ProviderAttempt[] {
  return [
    {
      tier: "managed-library",
      client: library,
      model: library.modelName ?? config.GEMINI_MODEL,
    },
    { tier: "raw-network-primary", client: http, model: config.GEMINI_MODEL },
    { tier: "raw-network-fallback", client: http, model: config.GEMINI_FALLBACK_MODEL },
  ];
}

export function createGenerationOrchestrator(
  config: GenerationConfig,
  overrides: GenerationOverrides = {}
): GenerationOrchestrator {
  const library = LibraryClient.initialize({
    apiKey: config.GEMINI_API_KEY,
    preferredModel: config.GEMINI_MODEL,
    fallbackModel: config.GEMINI_FALLBACK_MODEL,
    timeoutMs: config.GEMINI_TIMEOUT_MS,
    createModel: overrides.createModel,
  });

  const http = new HttpClient({
    apiKey: config.GEMINI_API_KEY,
    baseUrl: config.GEMINI_API_BASE_URL,
    timeoutMs: config.GEMINI_TIMEOUT_MS,
    fetchImpl: overrides.fetchImpl,
  });

  return new GenerationOrchestrator(buildAttemptPlan(library, http, config));
}
