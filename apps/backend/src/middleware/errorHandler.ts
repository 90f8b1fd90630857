import type { ErrorRequestHandler, Request, Response } from "express";
import type { Logger } from "pino";
import { LineError, RateLimitedError } from "../domain/errors";

interface ErrorBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
}

const isMalformedJson = (error: unknown): boolean =>
  error instanceof SyntaxError && "status" in error && error.status === 400;

export function sendLineError(res: Response, error: LineError): void {
  if (error instanceof RateLimitedError) {
    res.setHeader("Retry-After", String(error.retryAfterSeconds));
  }
  const body: ErrorBody = { error: error.message, code: error.code };
  if (error.details) body.details = error.details;
  res.status(error.statusCode).json(body);
}

/**
 * Terminal error middleware. LineErrors map to their own status; anything
 * else is logged and answered with an opaque 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof LineError) {
      const level = error.statusCode >= 500 ? "error" : "info";
      logger[level](
        { err: error, code: error.code, path: req.path, method: req.method },
        "Request failed",
      );
      sendLineError(res, error);
      return;
    }

    if (isMalformedJson(error)) {
      res.status(400).json({ error: "Malformed JSON body", code: "INVALID_INPUT" } satisfies ErrorBody);
      return;
    }

    logger.error({ err: error, path: req.path, method: req.method }, "Unhandled request error");
    res.status(500).json({ error: "Internal server error", code: "INTERNAL_ERROR" } satisfies ErrorBody);
  };
}
