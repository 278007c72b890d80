// backend/services/calc/src/config.ts
import {
  NODE_ENVS,
  optionalEnv,
  optionalList,
  requireEnum,
  requireEnv,
  requireNumber,
  type EnvSource,
  type NodeEnv,
} from "@shared/env";
import { isLogLevel } from "@shared/utils/logger";
import {
  TOKEN_ALGORITHMS,
  type TokenAlgorithm,
} from "@shared/security/accessToken";
import type { LevelWithSilent } from "pino";

export const SERVICE_NAME = "calc";

const DEFAULT_TOKEN_TTL_MIN = 30;

export type CalcConfig = Readonly<{
  serviceName: typeof SERVICE_NAME;
  nodeEnv: NodeEnv;
  logLevel: LevelWithSilent;
  port: number;
  jwtSecret: string;
  jwtAlgorithm: TokenAlgorithm;
  tokenTtlSec: number;
  corsOrigins: readonly string[];
}>;

/** Read and validate everything up front; any problem throws before the server starts. */
export function loadConfig(env: EnvSource = process.env): CalcConfig {
  const logLevel = requireEnv("LOG_LEVEL", env);
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid env var LOG_LEVEL="${logLevel}"`);
  }

  const ttlMin =
    optionalEnv("CALC_TOKEN_TTL_MIN", env) === undefined
      ? DEFAULT_TOKEN_TTL_MIN
      : requireNumber("CALC_TOKEN_TTL_MIN", env);
  if (ttlMin <= 0) {
    throw new Error("Env var CALC_TOKEN_TTL_MIN must be greater than 0");
  }

  return Object.freeze({
    serviceName: SERVICE_NAME,
    nodeEnv: requireEnum("NODE_ENV", NODE_ENVS, env),
    logLevel,
    port: requireNumber("CALC_PORT", env),
    jwtSecret: requireEnv("CALC_JWT_SECRET", env),
    jwtAlgorithm:
      optionalEnv("CALC_JWT_ALGORITHM", env) === undefined
        ? "HS256"
        : requireEnum("CALC_JWT_ALGORITHM", TOKEN_ALGORITHMS, env),
    tokenTtlSec: ttlMin * 60,
    corsOrigins: Object.freeze(optionalList("CALC_CORS_ORIGINS", env)),
  });
}
