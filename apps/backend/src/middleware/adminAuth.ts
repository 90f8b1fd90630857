/**
 * Admin Authentication Middleware
 *
 * Bearer token authentication for the backup/restore endpoints.
 *
 * Usage:
 *   const requireAdmin = createAdminAuth(runtimeConfig.adminApiKey, logger);
 *   app.get("/api/backup", requireAdmin, handler);
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { secretsMatch } from "../utils/secretCompare";

/**
 * Extract Bearer token from Authorization header.
 * Returns null if header is missing or malformed.
 */
function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) return null;

  const parts = authHeader.split(" ");
  if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") {
    return null;
  }

  return parts[1];
}

/**
 * Require `Authorization: Bearer <ADMIN_API_KEY>`.
 * Fails closed with 503 when no key is configured; 401 on a missing or wrong
 * token. Token values are never logged.
 */
export function createAdminAuth(configuredKey: string, logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!configuredKey) {
      logger.warn({ path: req.path, method: req.method, ip: req.ip }, "Admin auth rejected: ADMIN_API_KEY not configured");
      res.status(503).json({
        error: "Admin API authentication is not configured on this server",
        code: "ADMIN_AUTH_NOT_CONFIGURED",
      });
      return;
    }

    const providedToken = extractBearerToken(req);
    if (!providedToken) {
      logger.warn({ path: req.path, method: req.method, ip: req.ip }, "Admin auth rejected: missing or malformed Authorization header");
      res.status(401).json({
        error: "Missing or malformed Authorization header. Expected: Bearer <token>",
        code: "UNAUTHORIZED",
      });
      return;
    }

    if (!secretsMatch(providedToken, configuredKey)) {
      logger.warn({ path: req.path, method: req.method, ip: req.ip }, "Admin auth rejected: invalid token");
      res.status(401).json({ error: "Invalid admin API key", code: "UNAUTHORIZED" });
      return;
    }

    next();
  };
}
