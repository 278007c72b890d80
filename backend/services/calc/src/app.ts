// backend/services/calc/src/app.ts
import type { Express } from "express";
import type { Logger } from "pino";
import { createServiceApp } from "@shared/app/createServiceApp";
import { authGate } from "@shared/middleware/authGate";
import { logger as sharedLogger } from "@shared/utils/logger";
import type { TokenKeyOptions } from "@shared/security/accessToken";
import type { CalcConfig } from "./config";
import calcRoutes, { CALC_PROTECTED_PATHS } from "./routes/calcRoutes";
import { tokenRoutes } from "./routes/tokenRoutes";

export type CalcAppOptions = {
  logger?: Logger;
  /** Epoch millis clock shared by issuance and verification. */
  now?: () => number;
};

export function createCalcApp(
  config: CalcConfig,
  opts: CalcAppOptions = {}
): Express {
  const logger = opts.logger ?? sharedLogger;
  const keys: TokenKeyOptions = {
    secret: config.jwtSecret,
    algorithm: config.jwtAlgorithm,
    now: opts.now,
  };

  return createServiceApp({
    serviceName: config.serviceName,
    logger,
    healthPath: "/saude",
    corsOrigins: config.corsOrigins,
    authGate: authGate({ ...keys, protectedPaths: CALC_PROTECTED_PATHS, logger }),
    mountRoutes: (api) => {
      api.use(tokenRoutes({ ...keys, ttlSec: config.tokenTtlSec }));
      api.use(calcRoutes);
    },
  });
}
