import { loadConfig } from "./config";
import { createAppContext } from "./context";
import { createLogger, setLogLevel } from "./lib/logger";
import { createApp } from "./routes";
import { errorMessage } from "./services/errors";

const logger = createLogger("ris.server");

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const context = await createAppContext(config);
  const server = createApp(context);

  server.listen(config.port, () => {
    logger.info(`Serving on port ${config.port} with engines: ${context.coordinator.engineNames.join(", ")}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close();
    context
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error(`Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
