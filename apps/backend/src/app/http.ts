/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { createErrorHandler } from "../middleware/errorHandler";
import { registerLineRoutes } from "../routes/line";
import { registerEventRoutes } from "../routes/events";
import { registerAdminRoutes } from "../routes/admin";

const startedAt = Date.now();

export function createApp(ctx: AppContext): Express {
  const app = express();
  const { logger } = ctx;

  // Trust the first proxy hop so req.ip reflects the kiosk, not the proxy.
  app.set("trust proxy", 1);
  // Restore payloads carry the whole ledger.
  app.use(express.json({ limit: "50mb" }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    if (ctx.isShuttingDown() && req.method !== "GET") {
      res.status(503).json({ error: "Server is shutting down", code: "SHUTTING_DOWN" });
      return;
    }
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: ctx.isShuttingDown() ? "shutting_down" : "ok",
      line_name: ctx.config.lineName,
      hardware_driver: ctx.hardware.getDriverName(),
      hardware_failures: ctx.hardware.getFailureCount(),
      uptime_ms: Date.now() - startedAt,
      feed: ctx.lineService.hubStats(),
    });
  });

  registerLineRoutes(app, ctx);
  registerEventRoutes(app, ctx);
  registerAdminRoutes(app, ctx);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: "NOT_FOUND" });
  });
  app.use(createErrorHandler(logger));

  return app;
}
