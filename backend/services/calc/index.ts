// backend/services/calc/index.ts
import { loadedEnvFiles } from "./src/bootstrap";
import { initLogger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { loadConfig } from "./src/config";
import { createCalcApp } from "./src/app";

const config = loadConfig();
const logger = initLogger(config.serviceName, config.logLevel);

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "unhandled promise rejection");
});
process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "uncaught exception");
  process.exit(1);
});

async function start() {
  logger.info(
    { nodeEnv: config.nodeEnv, envFiles: loadedEnvFiles },
    "calc starting"
  );
  const app = createCalcApp(config, { logger });
  await startHttpService({
    app,
    port: config.port,
    serviceName: config.serviceName,
    logger,
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, "calc failed to start");
  process.exit(1);
});
