/**
 * Input sanitization middleware.
 *
 * Short option fields are trimmed, stripped of HTML tags and truncated:
 *     mode      -> 32 chars
 *     length    -> 16 chars
 *     tone      -> 16 chars
 *     language  -> 64 chars
 *     mimeType  -> 64 chars
 *
 * Every other value (the text to summarize, base64 image payloads) is
 * passed through untouched so the model sees exactly what was sent.
 *
 * Apply after body parsing and before route handlers.
 */

import { Request, Response, NextFunction } from "express";

// ---------------------------------------------------------------------------
// Known field length limits
// ---------------------------------------------------------------------------

const FIELD_MAX_LENGTHS: Record<string, number> = {
  mode: 32,
  length: 16,
  tone: 16,
  language: 64,
  mimeType: 64,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Strip all HTML/XML tags from a string using a simple regex. */
function stripHtmlTags(value: string): string {
  return value.replace(/<[^>]*>/g, "");
}

function sanitizeField(value: string, maxLen: number): string {
  const sanitized = stripHtmlTags(value.trim()).trim();
  return sanitized.length > maxLen ? sanitized.slice(0, maxLen) : sanitized;
}

/**
 * Recursively sanitize known string fields in a plain object or array.
 */
function sanitizeValue(key: string, value: unknown): unknown {
  if (typeof value === "string") {
    const maxLen = FIELD_MAX_LENGTHS[key];
    return maxLen ? sanitizeField(value, maxLen) : value;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => sanitizeValue(String(index), item));
  }

  if (value !== null && typeof value === "object") {
    return sanitizeObject(value);
  }

  return value;
}

function sanitizeObject(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    result[key] = sanitizeValue(key, val);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/**
 * Express middleware that sanitizes `req.body` in place.
 * Should be mounted after `express.json()`.
 */
export function sanitizeBody(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  if (req.body && typeof req.body === "object" && !Buffer.isBuffer(req.body)) {
    req.body = sanitizeObject(req.body);
  }
  next();
}

export { sanitizeObject };
