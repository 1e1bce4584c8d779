import type {
  GenerationRequest,
  GenerationResult,
  ProviderAttempt,
} from "./types";

export const IMAGE_SENTINEL_TEXT =
  "(Vision model unavailable or failed. No analysis produced.)";

/** Wrap a successful attempt into an immutable result record. */
export function createResult(
  attempt: ProviderAttempt,
  text: string,
  request: GenerationRequest
): GenerationResult {
  return Object.freeze({
    text,
    tier: attempt.tier,
    providerKind: attempt.client.kind,
    modelName: attempt.model,
    requestMode: request.mode,
    options: Object.freeze({ ...request.options }),
  });
}

/**
 * Placeholder success for image requests no tier could answer.
 * `modelName` reports the model the image tier would have used.
 */
export function createSentinelResult(
  modelName: string,
  request: GenerationRequest
): GenerationResult {
  return Object.freeze({
    text: IMAGE_SENTINEL_TEXT,
    tier: null,
    providerKind: null,
    modelName,
    requestMode: request.mode,
    options: Object.freeze({ ...request.options }),
  });
}
