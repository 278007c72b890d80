// backend/services/shared/middleware/problemJson.ts

/**
 * Tails for every service app: 404 formatter + final error formatter.
 * Both emit RFC 7807 Problem+JSON.
 *
 * Notes:
 * - 4xx errors raised by express itself (e.g. body-parser's malformed JSON or
 *   oversized body) keep their status and message; they carry `expose: true`.
 * - Everything else becomes a generic 500. The real error goes to the logs
 *   only, tagged with the request id.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "pino";
import { extractLogContext } from "../utils/logger";
import {
  internalError,
  notFound,
  sendProblem,
} from "../http/errors";

type ExposedHttpError = {
  status: number;
  message: string;
  type?: string;
};

/** http-errors convention: `expose` marks a message that is safe for clients. */
function asExposedClientError(err: unknown): ExposedHttpError | null {
  if (!(err instanceof Error)) return null;
  const status = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
  const expose = Reflect.get(err, "expose");
  const type = Reflect.get(err, "type");
  if (
    typeof status === "number" &&
    status >= 400 &&
    status < 500 &&
    expose === true
  ) {
    return {
      status,
      message: err.message,
      type: typeof type === "string" ? type : undefined,
    };
  }
  return null;
}

/** Statuses express/body-parser raise with `expose: true`. */
const CLIENT_ERROR_NAMES: Record<number, { title: string; code: string }> = {
  400: { title: "Bad Request", code: "BAD_REQUEST" },
  403: { title: "Forbidden", code: "FORBIDDEN" },
  404: { title: "Not Found", code: "NOT_FOUND" },
  413: { title: "Payload Too Large", code: "PAYLOAD_TOO_LARGE" },
  415: { title: "Unsupported Media Type", code: "UNSUPPORTED_MEDIA_TYPE" },
};

export function clientErrorName(status: number): { title: string; code: string } {
  return (
    CLIENT_ERROR_NAMES[status] ?? { title: "Client Error", code: `HTTP_${status}` }
  );
}

export function notFoundProblemJson(): RequestHandler {
  return (_req, res) => {
    notFound(res);
  };
}

export function errorProblemJson(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);

    const client = asExposedClientError(err);
    if (client) {
      logger.warn(
        { ...extractLogContext(req), status: client.status, type: client.type },
        "request rejected"
      );
      sendProblem(res, {
        status: client.status,
        ...clientErrorName(client.status),
        detail: client.message,
      });
      return;
    }

    logger.error({ ...extractLogContext(req), err }, "unhandled request error");
    internalError(res);
  };
}
