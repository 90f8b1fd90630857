/**
 * Line Backend Server (Entry Point)
 *
 * Thin shell: context creation, live feed attachment, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext, runtimeConfig } from "./app/context";
import { createApp } from "./app/http";
import { LiveFeedServer } from "./api/liveFeed";

const ctx = createContext();
const { logger, db, lineService, hub, shiftRollover } = ctx;

const app = createApp(ctx);

const server = app.listen(runtimeConfig.port, runtimeConfig.host, () => {
  logger.info(
    { port: runtimeConfig.port, host: runtimeConfig.host, line: runtimeConfig.lineName },
    "Line backend listening",
  );
});

const liveFeed = new LiveFeedServer(lineService, logger.child({ component: "live-feed" }), {
  heartbeatMs: runtimeConfig.wsHeartbeatMs,
});
liveFeed.attach(server);
shiftRollover.start();

let shutdownStarted = false;

const shutdown = async (signal: NodeJS.Signals) => {
  if (shutdownStarted) return;
  shutdownStarted = true;
  logger.info({ signal }, "Received termination signal, initiating graceful shutdown");

  ctx.setShuttingDown(true);

  // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
  setTimeout(() => {
    logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, runtimeConfig.gracefulShutdownMs).unref();

  shiftRollover.stop();

  // Let in-flight mutations commit before the database goes away.
  await lineService.idle();

  try {
    await liveFeed.close();
    logger.info("Live feed closed");
  } catch (error) {
    logger.error({ err: error }, "Error closing live feed");
  }
  hub.closeAll();

  server.close(() => {
    logger.info("HTTP server closed");
    ctx.hardware.allOff();
    db.close();
    logger.info("Database connection closed, graceful shutdown complete");
    process.exit(0);
  });
  server.closeAllConnections();
};

const onSignal = (signal: NodeJS.Signals) => {
  shutdown(signal).catch((error: unknown) => {
    logger.fatal({ err: error }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
