// backend/services/shared/middleware/authGate.ts

/**
 * Bearer auth gate.
 *
 * Behavior:
 * - Paths listed in `protectedPaths` require a valid access token; the
 *   verified identity lands on `req.auth`.
 * - Any other path passes through with `req.auth = { state: "unauthenticated" }`.
 * - Every rejection is the same generic 401. The specific AuthError reason is
 *   logged at warn, never returned.
 *
 * Notes:
 * - Express routing is case-insensitive and ignores a trailing slash by
 *   default, so the path check normalizes the same way.
 * - Mounted before body parsers: a protected request without a credential is
 *   rejected before its body is read.
 */

import type { RequestHandler } from "express";
import type { Logger } from "pino";
import {
  AuthError,
  verifyAccessToken,
  type TokenKeyOptions,
} from "../security/accessToken";
import { unauthorized } from "../http/errors";
import { extractLogContext } from "../utils/logger";

export type AuthGateOptions = TokenKeyOptions & {
  protectedPaths: readonly string[];
  logger: Logger;
};

export function normalizeRoutePath(p: string): string {
  const trimmed = p.toLowerCase().replace(/\/+$/, "");
  return trimmed || "/";
}

export function authGate(opts: AuthGateOptions): RequestHandler {
  const { protectedPaths, logger, ...keyOpts } = opts;
  if (!keyOpts.secret) throw new Error("authGate: secret is required");
  const guarded = new Set(protectedPaths.map(normalizeRoutePath));

  return (req, res, next) => {
    if (!guarded.has(normalizeRoutePath(req.path))) {
      req.auth = { state: "unauthenticated" };
      return next();
    }

    try {
      req.auth = verifyAccessToken(req.headers.authorization, keyOpts);
    } catch (err) {
      if (!(err instanceof AuthError)) return next(err);
      logger.warn(
        { ...extractLogContext(req), reason: err.reason },
        "auth rejected"
      );
      unauthorized(res);
      return;
    }
    next();
  };
}
