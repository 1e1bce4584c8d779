/**
 * Prompt construction for summarization and image description.
 *
 * Style options arrive from request bodies in arbitrary shapes, so
 * normalizeStyleOptions() substitutes the defaults for anything outside the
 * recognized sets instead of rejecting the request.
 */

import { readField } from "../../utils/fields";
import {
  SUMMARY_LENGTHS,
  SUMMARY_TONES,
  type StyleOptions,
  type SummaryLength,
  type SummaryTone,
} from "./types";

// ---------------------------------------------------------------------------
// Style vocabulary
// ---------------------------------------------------------------------------

const LENGTH_DESCRIPTIONS: Record<SummaryLength, string> = {
  short: "2-3 concise sentences",
  medium: "a tight single paragraph",
  detailed: "a detailed yet concise multi-paragraph summary",
};

const TONE_DESCRIPTIONS: Record<SummaryTone, string> = {
  neutral: "neutral, factual prose",
  bullet: "concise bullet points",
  technical: "precise technical language",
};

export const DEFAULT_STYLE_OPTIONS: Readonly<StyleOptions> = Object.freeze({
  length: "medium",
  tone: "neutral",
  language: "",
});

const SUMMARY_PREAMBLE =
  "You are a careful assistant that preserves facts, figures, and names.";
const SUMMARY_CLOSING =
  "Highlight critical numbers. If there is uncertainty, mention it briefly.";
const IMAGE_PREAMBLE =
  "You are an assistant describing the provided image. " +
  "Identify notable objects, text, and context succinctly.";

// ---------------------------------------------------------------------------
// Option normalization
// ---------------------------------------------------------------------------

function pickOne<T extends string>(
  allowed: readonly T[],
  value: unknown,
  fallback: T
): T {
  if (typeof value !== "string") {
    return fallback;
  }
  const lowered = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate === lowered) ?? fallback;
}

/**
 * Coerce an untrusted options object into StyleOptions.
 * Unknown length/tone values resolve to "medium"/"neutral".
 */
export function normalizeStyleOptions(raw: unknown): StyleOptions {
  const language = readField(raw, "language");

  return {
    length: pickOne(SUMMARY_LENGTHS, readField(raw, "length"), DEFAULT_STYLE_OPTIONS.length),
    tone: pickOne(SUMMARY_TONES, readField(raw, "tone"), DEFAULT_STYLE_OPTIONS.tone),
    language: typeof language === "string" ? language.trim() : "",
  };
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function buildSummaryPrompt(content: string, options: StyleOptions): string {
  const style = LENGTH_DESCRIPTIONS[options.length] ?? LENGTH_DESCRIPTIONS.medium;
  const tone = TONE_DESCRIPTIONS[options.tone] ?? TONE_DESCRIPTIONS.neutral;
  const languagePart = options.language ? ` in ${options.language}` : "";

  return (
    `${SUMMARY_PREAMBLE} ` +
    `Summarize the following text as ${style} using ${tone}${languagePart}. ` +
    `${SUMMARY_CLOSING}\n\n` +
    content.trim()
  );
}

/** Image prompts ignore length and tone; only the language carries over. */
export function buildImagePrompt(options: StyleOptions): string {
  if (!options.language) {
    return IMAGE_PREAMBLE;
  }
  return `${IMAGE_PREAMBLE} Respond in ${options.language}.`;
}
