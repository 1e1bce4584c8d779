/**
 * Gemini provider that calls the generateContent REST endpoint directly via
 * fetch (no SDK). Text-only: image calls are absent without a request.
 */

import { describeError } from "../../config/logger";
import { readField } from "../../utils/fields";
import type {
  GenerateCall,
  GenerateOutcome,
  ProviderClient,
} from "./types";

export interface HttpClientConfig {
  apiKey: string;
  /** e.g. https://generativelanguage.googleapis.com/v1beta */
  baseUrl: string;
  timeoutMs: number;
  /** Override for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

/** Characters of a non-2xx body kept in the failure reason. */
const ERROR_BODY_PREVIEW = 200;

/**
 * Pull candidates[0].content.parts[0].text out of a parsed response body.
 * Returns null when any step of the path is missing or mistyped.
 */
export function extractCandidateText(body: unknown): string | null {
  const candidates = readField(body, "candidates");
  if (!Array.isArray(candidates) || candidates.length === 0) {
    return null;
  }
  const parts = readField(readField(candidates[0], "content"), "parts");
  if (!Array.isArray(parts) || parts.length === 0) {
    return null;
  }
  const text = readField(parts[0], "text");
  return typeof text === "string" ? text : null;
}

export class HttpClient implements ProviderClient {
  readonly kind = "raw-network";
  readonly supportsImages = false;

  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: HttpClientConfig) {
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get available(): boolean {
    return this.config.apiKey.length > 0;
  }

  endpointFor(model: string): string {
    return `${this.config.baseUrl}/models/${encodeURIComponent(model)}:generateContent`;
  }

  async generate(call: GenerateCall): Promise<GenerateOutcome> {
    if (call.image) {
      return { ok: false, reason: "Image input is not supported over raw HTTP" };
    }
    if (!this.available) {
      return { ok: false, reason: "No API key configured" };
    }

    let response: Response;

    try {
      response = await this.fetchImpl(this.endpointFor(call.model), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.config.apiKey,
        },
        body: JSON.stringify({ contents: [{ parts: [{ text: call.prompt }] }] }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      return {
        ok: false,
        reason: `HTTP request failed (${call.model}): ${describeError(err)}`,
        cause: err,
      };
    }

    if (!response.ok) {
      const preview = await readPreview(response);
      return {
        ok: false,
        reason: `HTTP model ${call.model} error ${response.status}: ${preview}`,
      };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      return {
        ok: false,
        reason: `Invalid JSON from ${call.model}: ${describeError(err)}`,
        cause: err,
      };
    }

    const text = extractCandidateText(body)?.trim();
    if (!text) {
      return { ok: false, reason: `Unexpected response shape from ${call.model}` };
    }
    return { ok: true, text };
  }
}

async function readPreview(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, ERROR_BODY_PREVIEW);
  } catch (err) {
    return `<unreadable body: ${describeError(err)}>`;
  }
}
