/**
 * Line Routes
 *
 * Operator and display endpoints: job lifecycle, scanning, supervisor PIN,
 * status snapshot, hourly production and job history.
 */

import type { Express, NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { clientErrorSchema, parseOrThrow, pinRequestSchema, scanRequestSchema } from "../domain/validation";

const hourlyQuerySchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD")
    .optional(),
});

const jobsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(200).default(20),
});

const jobIdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export function registerLineRoutes(app: Express, ctx: AppContext): void {
  const { lineService, logger } = ctx;

  /**
   * GET /api/status
   * Point-in-time snapshot: active job, recent scans, shift totals, lock state.
   */
  app.get("/api/status", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(lineService.getStatus());
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/hourly_stats", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { date } = parseOrThrow(hourlyQuerySchema, req.query);
      res.json(lineService.getHourlyStats(date));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/job/start
   * Body: { job_id?, expected_barcode, pieces_per_shipper?, target_quantity? }
   * 409 while another job is active.
   */
  app.post("/api/job/start", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await lineService.startJob(req.body);
      res.status(201).json({ success: true, job });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/scan
   * Body: { barcode }
   * 400 without a barcode or active job, 423 while the line is locked.
   */
  app.post("/api/scan", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = scanRequestSchema.safeParse(req.body);
      const outcome = await lineService.processScan(body.success ? body.data.barcode : "");
      res.json({ success: true, ...outcome });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/verify_pin", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { pin } = parseOrThrow(pinRequestSchema, req.body);
      const lock = await lineService.verifyPin(pin);
      res.json({ success: true, lock });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/job/end
   * Body: { pin }
   * Shares the PIN attempt counter with /api/verify_pin.
   */
  app.post("/api/job/end", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { pin } = parseOrThrow(pinRequestSchema, req.body);
      const result = await lineService.endJob(pin);
      res.json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/jobs", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { page, page_size } = parseOrThrow(jobsQuerySchema, req.query);
      res.json(lineService.listJobs(page, page_size));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/job/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseOrThrow(jobIdParamSchema, req.params);
      res.json(lineService.getJobDetail(id));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/log_error
   * Kiosk-side errors, recorded in the server log.
   */
  app.post("/api/log_error", (req: Request, res: Response, next: NextFunction) => {
    try {
      const report = parseOrThrow(clientErrorSchema, req.body);
      logger.warn({ client: report, ip: req.ip }, "Client error reported");
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });
}
