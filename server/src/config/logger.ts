/**
 * Lightweight structured logger.
 *
 * - Production (NODE_ENV=production): JSON lines for machine consumption
 * - Development: `[component] LEVEL message {extra}` lines
 *
 * Log levels (in order of severity): debug < info < warn < error
 * Set LOG_LEVEL env var to control minimum verbosity (default: "info").
 *
 * Usage:
 *   import { logger } from "../config/logger";
 *   logger.info("server", "Server started", { port: 5000 });
 *
 *   const log = logger.scoped("orchestrator");
 *   log.warn("Tier failed", { tier, model, reason });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

type LogExtra = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

/** Logger bound to a single component name. */
interface ScopedLogger {
  debug(message: string, extra?: LogExtra): void;
  info(message: string, extra?: LogExtra): void;
  warn(message: string, extra?: LogExtra): void;
  error(message: string, extra?: LogExtra): void;
}

// ---------------------------------------------------------------------------
// Level hierarchy
// ---------------------------------------------------------------------------

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

// Read per call so tests can change LOG_LEVEL at runtime
function getLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr =
    Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

/**
 * Render an unknown thrown value as a loggable message.
 */
function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

// ---------------------------------------------------------------------------
// Core log function
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  component: string,
  message: string,
  extra?: LogExtra
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const formatted = isProduction() ? JSON.stringify(entry) : formatPretty(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const logger = {
  debug(component: string, message: string, extra?: LogExtra): void {
    log("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: LogExtra): void {
    log("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: LogExtra): void {
    log("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: LogExtra): void {
    log("error", component, message, extra);
  },

  scoped(component: string): ScopedLogger {
    return {
      debug: (message, extra) => log("debug", component, message, extra),
      info: (message, extra) => log("info", component, message, extra),
      warn: (message, extra) => log("warn", component, message, extra),
      error: (message, extra) => log("error", component, message, extra),
    };
  },
};

export { logger, describeError };
export type { LogLevel, LogEntry, ScopedLogger };
