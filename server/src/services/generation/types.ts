/**
 * Provider-agnostic content generation types.
 *
 * Generation runs through an ordered list of provider attempts (tiers).
 * Each tier pairs a ProviderClient with a model name; clients report a
 * failed call as an absent outcome instead of throwing, so moving on to the
 * next tier is an ordinary branch in the orchestrator.
 */

// ---------------------------------------------------------------------------
// Style options
// ---------------------------------------------------------------------------

export const SUMMARY_LENGTHS = ["short", "medium", "detailed"] as const;
export const SUMMARY_TONES = ["neutral", "bullet", "technical"] as const;

export type SummaryLength = (typeof SUMMARY_LENGTHS)[number];
export type SummaryTone = (typeof SUMMARY_TONES)[number];

export interface StyleOptions {
  length: SummaryLength;
  tone: SummaryTone;
  /** Target language name; empty means "respond in the input's language". */
  language: string;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type RequestMode = "summarize" | "image_context";

export interface ImageInput {
  data: Buffer;
  mimeType: string;
}

export interface SummarizeRequest {
  mode: "summarize";
  content: string;
  options: StyleOptions;
}

export interface ImageContextRequest {
  mode: "image_context";
  image: ImageInput;
  options: StyleOptions;
}

export type GenerationRequest = SummarizeRequest | ImageContextRequest;

// ---------------------------------------------------------------------------
// Provider clients
// ---------------------------------------------------------------------------

export type ProviderKind = "managed-library" | "raw-network";

export type ProviderTier =
  | "managed-library"
  | "raw-network-primary"
  | "raw-network-fallback";

export interface GenerateCall {
  prompt: string;
  model: string;
  image?: ImageInput;
}

export type GenerateOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: string; cause?: unknown };

export interface ProviderClient {
  readonly kind: ProviderKind;
  /** False when the client can never succeed in this process (no key, failed init). */
  readonly available: boolean;
  /** Only these clients are tried for image requests. */
  readonly supportsImages: boolean;

  /**
   * Run one generation call. Resolves with an absent outcome on any
   * call-level failure; never rejects.
   */
  generate(call: GenerateCall): Promise<GenerateOutcome>;
}

/** One configured (tier, client, model) trial in the fallback plan. */
export interface ProviderAttempt {
  tier: ProviderTier;
  client: ProviderClient;
  model: string;
}

export interface AttemptFailure {
  tier: ProviderTier;
  providerKind: ProviderKind;
  modelName: string;
  reason: string;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface GenerationResult {
  readonly text: string;
  /** Tier that answered; null for the image sentinel. */
  readonly tier: ProviderTier | null;
  readonly providerKind: ProviderKind | null;
  readonly modelName: string;
  readonly requestMode: RequestMode;
  readonly options: Readonly<StyleOptions>;
}
