/**
 * Centralized environment configuration.
 * Parses environment variables once at startup and exports typed config.
 * Import this module early to fail fast on malformed configuration.
 */

import dotenv from "dotenv";

// Auto-load .env from the working directory
dotenv.config();

interface EnvConfig {
  /** Gemini API key (GEMINI_API_KEY, falling back to GOOGLE_API_KEY) */
  GEMINI_API_KEY: string;
  /** Preferred model for every tier that takes one (default: gemini-2.0-flash) */
  GEMINI_MODEL: string;
  /** Secondary model used when the preferred one is unavailable (default: gemini-1.5-flash) */
  GEMINI_FALLBACK_MODEL: string;
  /** Base URL of the generateContent REST endpoint */
  GEMINI_API_BASE_URL: string;
  /** Timeout for a single raw HTTP attempt, in milliseconds (default: 40000) */
  GEMINI_TIMEOUT_MS: number;
  /** Server port (default: 5000) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** CORS origin (default: *) */
  CORS_ORIGIN: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) when behind nginx/load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Maximum JSON body size accepted by the parser; images travel base64-encoded (default: 10mb) */
  BODY_LIMIT: string;
}

/**
 * Numeric variables that must parse to a positive integer when set.
 */
const NUMERIC_VARS = ["GEMINI_TIMEOUT_MS", "PORT"] as const;

/**
 * Validates that every numeric variable that is set holds a positive integer.
 * Throws a descriptive error listing all invalid variables.
 */
function validateEnv(): void {
  const invalid: string[] = [];

  for (const varName of NUMERIC_VARS) {
    const raw = process.env[varName];
    if (raw === undefined || raw.trim() === "") {
      continue;
    }
    if (!/^\d+$/.test(raw.trim()) || parseInt(raw, 10) <= 0) {
      invalid.push(`${varName}=${raw}`);
    }
  }

  if (invalid.length > 0) {
    const message = [
      "",
      "=== Invalid Environment Variables ===",
      "",
      ...invalid.map((v) => `  - ${v} (expected a positive integer)`),
      "",
      "Please fix these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }
}

function firstNonEmpty(...values: Array<string | undefined>): string {
  for (const value of values) {
    if (value && value.trim() !== "") {
      return value.trim();
    }
  }
  return "";
}

/**
 * Load and validate environment configuration.
 * Call this after dotenv.config() has been invoked.
 */
function loadEnvConfig(): EnvConfig {
  validateEnv();

  return {
    GEMINI_API_KEY: firstNonEmpty(
      process.env.GEMINI_API_KEY,
      process.env.GOOGLE_API_KEY
    ),
    GEMINI_MODEL:
      firstNonEmpty(process.env.GEMINI_MODEL, process.env.MODEL) ||
      "gemini-2.0-flash",
    GEMINI_FALLBACK_MODEL:
      firstNonEmpty(process.env.GEMINI_FALLBACK_MODEL) || "gemini-1.5-flash",
    GEMINI_API_BASE_URL: (
      firstNonEmpty(process.env.GEMINI_API_BASE_URL) ||
      "https://generativelanguage.googleapis.com/v1beta"
    ).replace(/\/+$/, ""),
    GEMINI_TIMEOUT_MS: parseInt(process.env.GEMINI_TIMEOUT_MS || "40000", 10),
    PORT: parseInt(process.env.PORT || "5000", 10),
    NODE_ENV: process.env.NODE_ENV || "development",
    CORS_ORIGIN: process.env.CORS_ORIGIN || "*",
    LOG_LEVEL: (process.env.LOG_LEVEL || "info").toLowerCase(),
    TRUST_PROXY:
      process.env.TRUST_PROXY === "true" || process.env.TRUST_PROXY === "1",
    BODY_LIMIT: process.env.BODY_LIMIT || "10mb",
  };
}

// Validate and export config as a singleton
const env = loadEnvConfig();

/**
 * Returns true when a Gemini API key is configured. Without one, every
 * provider tier reports itself unavailable.
 */
function isGeminiConfigured(): boolean {
  return env.GEMINI_API_KEY.length > 0;
}

export { env, isGeminiConfigured, loadEnvConfig };
export type { EnvConfig };
