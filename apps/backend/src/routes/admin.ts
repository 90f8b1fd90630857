/**
 * Admin Routes
 *
 * Full-state backup and destructive restore. Both require the admin API key.
 */

import type { Express, NextFunction, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { createAdminAuth } from "../middleware/adminAuth";

export function registerAdminRoutes(app: Express, ctx: AppContext): void {
  const { lineService, logger, config } = ctx;
  const requireAdmin = createAdminAuth(config.adminApiKey, logger);

  app.get("/api/backup", requireAdmin, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const dump = await lineService.exportState();
      logger.info({ jobs: dump.jobs.length, scans: dump.scans.length }, "Line state exported");
      res.json(dump);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/restore
   * Body: a dump produced by GET /api/backup. Replaces all persisted state.
   */
  app.post("/api/restore", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = await lineService.importState(req.body);
      res.json({ success: true, status });
    } catch (error) {
      next(error);
    }
  });
}
