// backend/services/shared/health.ts
import express from "express";

export type HealthBody = { status: "ok" };

type Options = {
  /** Public health path (e.g. "/saude"). */
  path: string;
};

/**
 * Exposes (public, no auth):
 *   GET <path>     -> liveness, body { status: "ok" }
 *   GET /healthz   -> k8s-style alias, same body
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();
  const body: HealthBody = { status: "ok" };

  const liveness = (_req: express.Request, res: express.Response) => {
    res.json(body);
  };

  router.get(opts.path, liveness);
  if (opts.path !== "/healthz") router.get("/healthz", liveness);

  return router;
}
