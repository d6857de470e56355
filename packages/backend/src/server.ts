import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { shutdownRuntime } from "./runtime/graphRuntime.js";
import { logger } from "./utils/logger.js";

const server = createApp().listen(appConfig.PORT, () => {
  logger.info(`Graph import service is running on http://localhost:${appConfig.PORT}`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, "Shutting down");
  server.close();
  shutdownRuntime()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
