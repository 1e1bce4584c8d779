/**
 * Fallback orchestration across provider tiers.
 *
 * Summaries walk the whole plan in order and fail hard only when every tier
 * is absent. Image descriptions only try the tiers that accept images and
 * degrade to a sentinel result instead of failing the request.
 *
 * Attempts never overlap: each tier's promise settles before the next
 * tier starts.
 */

import { logger } from "../../config/logger";
import { GenerationExhaustedError, InvalidGenerationRequestError } from "./errors";
import { buildImagePrompt, buildSummaryPrompt } from "./promptBuilder";
import { createResult, createSentinelResult } from "./result";
import type {
  AttemptFailure,
  GenerationRequest,
  GenerationResult,
  ImageContextRequest,
  ImageInput,
  ProviderAttempt,
  ProviderKind,
  ProviderTier,
  SummarizeRequest,
} from "./types";

const log = logger.scoped("orchestrator");

export interface PlanEntry {
  tier: ProviderTier;
  kind: ProviderKind;
  model: string;
  available: boolean;
}

type PlanOutcome =
  | { ok: true; attempt: ProviderAttempt; text: string; failures: AttemptFailure[] }
  | { ok: false; failures: AttemptFailure[] };

export class GenerationOrchestrator {
  private readonly plan: readonly ProviderAttempt[];
  private readonly imagePlan: readonly ProviderAttempt[];

  constructor(plan: readonly ProviderAttempt[]) {
    this.plan = Object.freeze([...plan]);
    this.imagePlan = this.plan.filter((attempt) => attempt.client.supportsImages);
  }

  describePlan(): PlanEntry[] {
    return this.plan.map((attempt) => ({
      tier: attempt.tier,
      kind: attempt.client.kind,
      model: attempt.model,
      available: attempt.client.available,
    }));
  }

  /** Entry point for callers holding either request kind. */
  async run(request: GenerationRequest): Promise<GenerationResult> {
    switch (request.mode) {
      case "summarize":
        return this.summarize(request);
      case "image_context":
        return this.describeImage(request);
    }
  }

  async summarize(request: SummarizeRequest): Promise<GenerationResult> {
    if (request.content.trim() === "") {
      throw new InvalidGenerationRequestError("text", "No text provided");
    }

    const prompt = buildSummaryPrompt(request.content, request.options);
    const outcome = await this.walk(this.plan, prompt);

    if (!outcome.ok) {
      const error = new GenerationExhaustedError(outcome.failures);
      log.error("Summarization exhausted every tier", {
        attempts: outcome.failures.length,
        lastModel: error.lastFailure?.modelName,
      });
      throw error;
    }

    return createResult(outcome.attempt, outcome.text, request);
  }

  async describeImage(request: ImageContextRequest): Promise<GenerationResult> {
    if (request.image.data.length === 0) {
      throw new InvalidGenerationRequestError("image", "Image file missing");
    }

    const prompt = buildImagePrompt(request.options);
    const outcome = await this.walk(this.imagePlan, prompt, request.image);

    if (!outcome.ok) {
      const modelName = this.imagePlan[0]?.model ?? this.plan[0]?.model ?? "none";
      log.warn("Image analysis unavailable; returning sentinel", {
        attempts: outcome.failures.length,
      });
      return createSentinelResult(modelName, request);
    }

    return createResult(outcome.attempt, outcome.text, request);
  }

  private async walk(
    attempts: readonly ProviderAttempt[],
    prompt: string,
    image?: ImageInput
  ): Promise<PlanOutcome> {
    const failures: AttemptFailure[] = [];

    for (const attempt of attempts) {
      const outcome = await attempt.client.generate({
        prompt,
        model: attempt.model,
        image,
      });

      if (outcome.ok) {
        log.info(`Generated via ${attempt.tier}`, { model: attempt.model });
        return { ok: true, attempt, text: outcome.text, failures };
      }

      log.warn(`Tier ${attempt.tier} failed`, {
        model: attempt.model,
        reason: outcome.reason,
      });
      failures.push({
        tier: attempt.tier,
        providerKind: attempt.client.kind,
        modelName: attempt.model,
        reason: outcome.reason,
      });
    }

    return { ok: false, failures };
  }
}
