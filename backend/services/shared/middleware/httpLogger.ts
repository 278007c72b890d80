// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "pino";

/** Health-check paths are never auto-logged. */
const QUIET_PATHS = new Set(["/saude", "/healthz", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string, logger: Logger) {
  return pinoHttp({
    logger,
    // requestIdMiddleware runs first; reuse its id so logs and responses agree.
    genReqId: (req) => req.id ?? randomUUID(),
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) =>
        QUIET_PATHS.has((req.url ?? "").split("?")[0] ?? ""),
    },
    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
