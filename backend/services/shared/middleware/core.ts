// backend/services/shared/middleware/core.ts
import express, { type RequestHandler } from "express";
import cors from "cors";

export type CoreMiddlewareOptions = {
  /** Allowed CORS origins; empty → no CORS headers at all. */
  corsOrigins: readonly string[];
  /** JSON body limit (express `limit` syntax). */
  bodyLimit?: string;
};

export type CoreMiddleware = {
  cors: RequestHandler;
  json: RequestHandler;
};

export function coreMiddleware(opts: CoreMiddlewareOptions): CoreMiddleware {
  const origins = [...opts.corsOrigins];
  return {
    cors: cors({ origin: origins.length ? origins : false, credentials: true }),
    json: express.json({ limit: opts.bodyLimit ?? "1mb" }),
  };
}
