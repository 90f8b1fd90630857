/**
 * Line error hierarchy. Every error raised by the verification core carries
 * the HTTP status and machine-readable code the transport layer answers with.
 */

export type ErrorDetails = Record<string, unknown>;

export class LineError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: ErrorDetails;

  constructor(message: string, statusCode: number, code: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends LineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 422, "VALIDATION_ERROR", details);
  }
}

export class InvalidInputError extends LineError {
  constructor(message: string) {
    super(message, 400, "INVALID_INPUT");
  }
}

export class ConflictError extends LineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 409, "CONFLICT", details);
  }
}

export class NoActiveJobError extends LineError {
  constructor(message = "No active job") {
    super(message, 400, "NO_ACTIVE_JOB");
  }
}

export class LineLockedError extends LineError {
  constructor(message = "Line is locked. Supervisor PIN required.") {
    super(message, 423, "LINE_LOCKED");
  }
}

export class RateLimitedError extends LineError {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super(`Too many failed PIN attempts. Try again in ${retryAfterSeconds} seconds.`, 429, "RATE_LIMITED", {
      retry_after_seconds: retryAfterSeconds,
    });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class NotFoundError extends LineError {
  constructor(resource: string, id?: string | number) {
    super(id === undefined ? `${resource} not found` : `${resource} ${id} not found`, 404, "NOT_FOUND");
  }
}

export class InvalidPinError extends LineError {
  public readonly attemptsRemaining: number;

  constructor(attemptsRemaining: number) {
    super("Invalid PIN", 403, "INVALID_PIN", { attempts_remaining: attemptsRemaining });
    this.attemptsRemaining = attemptsRemaining;
  }
}

export class PersistenceError extends LineError {
  constructor(message: string, cause: unknown) {
    super(message, 500, "PERSISTENCE_ERROR", undefined, { cause });
  }
}
