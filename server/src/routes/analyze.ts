/**
 * Analyze route.
 *
 * POST /api/analyze
 *   { mode?: "summarize", text, options? }
 *     -> 200 { summary, tokensUsed, meta: { model, mode, source, options } }
 *     -> 502 GENERATION_FAILED when every provider tier failed
 *   { mode: "image_context", image, mimeType?, options? }
 *     -> 200 { analysis, tokensUsed, meta: { model, mode, source, imageSize, options } }
 *        (provider failure yields the placeholder analysis, never an error)
 *
 * `image` is a data URL (data:image/png;base64,...) or bare base64.
 * `options` may be an object or a JSON-encoded string.
 */

import { Router, Request, Response } from "express";
import { logger, describeError } from "../config/logger";
import {
  GenerationExhaustedError,
  normalizeStyleOptions,
  type GenerationOrchestrator,
  type GenerationResult,
  type ImageInput,
} from "../services/generation";
import { sanitizeObject } from "../middleware/sanitize";
import { readImageSize } from "../services/imageMetadata";
import { monitoringService } from "../services/monitoringService";
import { readField, readString } from "../utils/fields";

const DEFAULT_IMAGE_MIME = "image/png";

const DATA_URL_RE = /^data:([\w.+-]+\/[\w.+-]+);base64,([\s\S]*)$/;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function sendValidationError(res: Response, field: string, message: string): void {
  res.status(400).json({
    error: {
      message,
      code: "VALIDATION_ERROR",
      details: [{ field, message }],
    },
  });
}

/**
 * Options arrive as an object (JSON clients) or as a JSON string (form-style
 * clients). An unparsable string yields the defaults.
 */
function parseOptions(raw: unknown): unknown {
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    // The body sanitizer only saw the encoded string
    return typeof parsed === "object" && parsed !== null ? sanitizeObject(parsed) : parsed;
  } catch (err) {
    logger.debug("analyze", "Ignoring unparsable options string", {
      error: describeError(err),
    });
    return {};
  }
}

function decodeImage(body: unknown): ImageInput | null {
  const raw = readString(body, "image");
  if (!raw) {
    return null;
  }

  const dataUrl = DATA_URL_RE.exec(raw.trim());
  const mimeType = dataUrl?.[1] ?? (readString(body, "mimeType") || DEFAULT_IMAGE_MIME);
  // Line-wrapped base64 is accepted; whitespace is dropped before matching
  const payload = (dataUrl?.[2] ?? raw).replace(/\s+/g, "");

  if (!BASE64_RE.test(payload)) {
    return null;
  }
  const data = Buffer.from(payload, "base64");
  return data.length > 0 ? { data, mimeType } : null;
}

function responseMeta(result: GenerationResult) {
  return {
    model: result.modelName,
    mode: result.requestMode,
    source: result.tier ?? "unavailable",
    options: result.options,
  };
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

function createAnalyzeRouter(orchestrator: GenerationOrchestrator): Router {
  const analyzeRouter = Router();

  analyzeRouter.post("/", async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const mode = readString(body, "mode") || "summarize";
    const options = normalizeStyleOptions(parseOptions(readField(body, "options")));

    if (mode === "summarize") {
      const text = (readString(body, "text") ?? "").trim();
      if (!text) {
        sendValidationError(res, "text", "No text provided");
        return;
      }

      let result: GenerationResult;
      try {
        result = await orchestrator.run({ mode: "summarize", content: text, options });
      } catch (err) {
        if (err instanceof GenerationExhaustedError) {
          monitoringService.recordExhaustion();
        }
        throw err;
      }

      monitoringService.recordGeneration(result.tier);
      res.status(200).json({
        summary: result.text,
        tokensUsed: null,
        meta: responseMeta(result),
      });
      return;
    }

    if (mode === "image_context") {
      const image = decodeImage(body);
      if (!image) {
        sendValidationError(res, "image", "Image file missing");
        return;
      }

      const result = await orchestrator.run({ mode: "image_context", image, options });

      monitoringService.recordGeneration(result.tier);
      res.status(200).json({
        analysis: result.text,
        tokensUsed: null,
        meta: { ...responseMeta(result), imageSize: readImageSize(image.data) },
      });
      return;
    }

    res.status(400).json({
      error: {
        message: `Unsupported mode: "${mode}". Supported modes: summarize, image_context`,
        code: "UNSUPPORTED_MODE",
      },
    });
  });

  return analyzeRouter;
}

export { createAnalyzeRouter };
