// backend/services/shared/middleware/requestId.ts

/**
 * Shared Request ID middleware.
 *
 * Notes:
 * - Order matters. This must run **before** the http logger and any guard,
 *   otherwise their log records lack the request ID.
 * - Never overwrite a caller-supplied ID; mint a UUID only when none of the
 *   recognized headers is present.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

const ID_HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"];

export function pickRequestId(headers: IncomingHttpHeaders): string | undefined {
  for (const name of ID_HEADERS) {
    const raw = headers[name];
    const v = (Array.isArray(raw) ? raw[0] : raw)?.trim();
    if (v) return v;
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = pickRequestId(req.headers) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
