/**
 * Binwise Backend Server (Entry Point)
 *
 * Thin shell: context creation, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext, runtimeConfig } from "./app/context";
import { createApp } from "./app/http";
import { logger as rootLogger } from "./utils/logger";

try {
  // Tables are loaded and frozen here, before the server accepts requests
  const ctx = createContext();
  const { logger } = ctx;
  const app = createApp(ctx);

  const port = runtimeConfig.port;
  const bindHost = runtimeConfig.bindHost;
  const server = app.listen(port, bindHost, () => {
    logger.info(
      { port, host: bindHost, classifier: ctx.classifier.getOracleName(), minConfidence: runtimeConfig.minConfidence },
      "Binwise backend listening",
    );
  });

  const shutdown = () => {
    if (ctx.isShuttingDown()) return;
    logger.info("Received termination signal, initiating graceful shutdown");
    ctx.setShuttingDown(true);

    server.close(() => {
      logger.info("HTTP server closed, graceful shutdown complete");
      process.exit(0);
    });

    // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
    setTimeout(() => {
      logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, runtimeConfig.gracefulShutdownMs).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
} catch (error) {
  rootLogger.fatal({ err: error }, "Fatal error during server startup");
  process.exit(1);
}
