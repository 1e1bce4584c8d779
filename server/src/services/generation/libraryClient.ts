/**
 * Gemini provider backed by the @google/generative-ai SDK.
 *
 * The model handle is created once at startup. The preferred model is tried
 * first and the secondary model second; if neither can be created (or no API
 * key is configured) the client stays unavailable for the rest of the
 * process and every generate() call is absent without touching the network.
 */

import { GoogleGenerativeAI, type Part } from "@google/generative-ai";
import { describeError, logger } from "../../config/logger";
import type {
  GenerateCall,
  GenerateOutcome,
  ProviderClient,
} from "./types";

const log = logger.scoped("gemini-sdk");

/** The slice of GenerativeModel this client relies on. */
export interface ModelHandle {
  generateContent(
    request: string | Array<string | Part>
  ): Promise<{ response: { text(): string } }>;
}

export type ModelFactory = (
  modelName: string,
  requestOptions: { timeout: number }
) => ModelHandle;

export interface LibraryClientConfig {
  apiKey: string;
  preferredModel: string;
  fallbackModel: string;
  /** Per-call timeout handed to the SDK. */
  timeoutMs: number;
  /** Override for tests; defaults to GoogleGenerativeAI#getGenerativeModel. */
  createModel?: ModelFactory;
}

function sdkModelFactory(apiKey: string): ModelFactory {
  const genAI = new GoogleGenerativeAI(apiKey);
  return (modelName, requestOptions) =>
    genAI.getGenerativeModel({ model: modelName }, requestOptions);
}

export class LibraryClient implements ProviderClient {
  readonly kind = "managed-library";
  readonly supportsImages = true;

  private constructor(
    private readonly handle: ModelHandle | null,
    /** Model the handle was created for; null when unavailable. */
    readonly modelName: string | null
  ) {}

  get available(): boolean {
    return this.handle !== null;
  }

  static initialize(config: LibraryClientConfig): LibraryClient {
    if (!config.apiKey) {
      log.warn("No API key configured; SDK client disabled");
      return new LibraryClient(null, null);
    }

    const createModel = config.createModel ?? sdkModelFactory(config.apiKey);
    const candidates = [config.preferredModel, config.fallbackModel];

    for (const modelName of candidates) {
      try {
        const handle = createModel(modelName, { timeout: config.timeoutMs });
        log.info(`Initialized model ${modelName}`);
        return new LibraryClient(handle, modelName);
      } catch (err) {
        log.warn(`Model init failed (${modelName})`, { error: describeError(err) });
      }
    }

    log.error("Every model init failed; falling back to raw HTTP only", {
      models: candidates,
    });
    return new LibraryClient(null, null);
  }

  /** The handle is bound to `modelName`; `call.model` is not consulted. */
  async generate(call: GenerateCall): Promise<GenerateOutcome> {
    if (!this.handle) {
      return { ok: false, reason: "SDK client unavailable" };
    }

    const request: string | Array<string | Part> = call.image
      ? [
          call.prompt,
          {
            inlineData: {
              data: call.image.data.toString("base64"),
              mimeType: call.image.mimeType,
            },
          },
        ]
      : call.prompt;

    try {
      const result = await this.handle.generateContent(request);
      // text() throws when the response was blocked or has no candidates
      const text = result.response.text().trim();
      if (!text) {
        return { ok: false, reason: "SDK returned an empty response" };
      }
      return { ok: true, text };
    } catch (err) {
      return {
        ok: false,
        reason: `SDK call failed: ${describeError(err)}`,
        cause: err,
      };
    }
  }
}
