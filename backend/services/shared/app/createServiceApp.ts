// backend/services/shared/app/createServiceApp.ts

/**
 * Shared app builder.
 *
 * Stack order:
 *   requestId → http logger → CORS → health (open) → auth gate (optional) →
 *   json parser → routes → 404 → error formatter.
 *
 * Notes:
 * - Health stays open; the auth gate runs after it and before the body
 *   parser, so a protected call without a credential never gets parsed.
 * - Routes are one-liners that import handlers only.
 */

import express, { type Express, type RequestHandler } from "express";
import type { Logger } from "pino";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { coreMiddleware } from "../middleware/core";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g. "calc"). Used in logs. */
  serviceName: string;
  logger: Logger;
  /** Public health path (e.g. "/saude"). */
  healthPath: string;
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Optional bearer gate (health stays open either way). */
  authGate?: RequestHandler;
  corsOrigins?: readonly string[];
  bodyLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, logger, healthPath, mountRoutes, authGate } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ─────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName, logger));

  const core = coreMiddleware({
    corsOrigins: opts.corsOrigins ?? [],
    bodyLimit: opts.bodyLimit,
  });
  app.use(core.cors);

  // ── Health (public, no auth) ──────────────────────────────────────────────
  app.use(createHealthRouter({ path: healthPath }));

  // ── Guards ────────────────────────────────────────────────────────────────
  if (authGate) app.use(authGate);

  // ── Body parser + routes ──────────────────────────────────────────────────
  app.use(core.json);
  const api = express.Router();
  mountRoutes(api);
  app.use(api);

  // ── Tails: 404 + error formatter ──────────────────────────────────────────
  app.use(notFoundProblemJson());
  app.use(errorProblemJson(logger));

  return app;
}
