// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // allow 0 for an ephemeral port
  serviceName: string;
  logger: Logger;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

/** Listen, log the bound port, and close cleanly on SIGINT/SIGTERM. */
export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, logger } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const onSigterm = () => shutdown("SIGTERM");
    const onSigint = () => shutdown("SIGINT");

    const stop = () =>
      new Promise<void>((done, fail) => {
        process.off("SIGTERM", onSigterm);
        process.off("SIGINT", onSigint);
        server.close((err) => (err ? fail(err) : done()));
      });

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal, service: serviceName }, "shutting down service");
      stop().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err, service: serviceName }, "shutdown failed");
          process.exit(1);
        }
      );
    };

    server.once("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      reject(err);
    });

    server.once("listening", () => {
      const addr = server.address();
      const boundPort =
        addr !== null && typeof addr === "object" ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");

      process.once("SIGTERM", onSigterm);
      process.once("SIGINT", onSigint);

      resolve({ server, boundPort, stop });
    });
  });
}
