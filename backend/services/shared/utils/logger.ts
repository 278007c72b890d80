// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME, LOG_LEVEL)` at bootstrap
 * BEFORE building its app, so request loggers (pino-http) pick up the
 * service-tagged instance.
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger("calc", config.logLevel);
 */

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === v);
}

const envLevel = (process.env.LOG_LEVEL || "").trim();

// NOTE: Avoid stamping "service":"unknown". Start with NO base.service.
//       After initLogger(), we recreate the logger with base.service set.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: isLogLevel(envLevel) ? envLevel : "info",
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string, level?: LevelWithSilent): Logger {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: level ?? pinoOptions.level,
    base: { service: SERVICE_NAME },
  });
  return logger;
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

// ───────────────────────────── Request context helper ─────────────────────────
export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  subject: string | null;
  ip: string | undefined;
  service: string | undefined;
};

export function extractLogContext(req: Request): LogContext {
  return {
    requestId: req.id === undefined ? null : String(req.id),
    path: req.originalUrl,
    method: req.method,
    subject: req.auth?.state === "authenticated" ? req.auth.subject : null,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
