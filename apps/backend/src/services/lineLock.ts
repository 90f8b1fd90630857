import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import type { Clock } from "../platform/clock";
import { toIso } from "../platform/clock";
import type { HardwareSignal } from "./hardware/hardwareSignal";
import { InvalidPinError, RateLimitedError } from "../domain/errors";
import { parseOrThrow, pinSchema } from "../domain/validation";
import { secretsMatch } from "../utils/secretCompare";

export type LineLockStatus = "UNLOCKED" | "LOCKED" | "PIN_LOCKED_OUT";

export interface LineLockSnapshot {
  state: LineLockStatus;
  line_halted: boolean;
  failed_pin_attempts: number;
  attempts_remaining: number;
  lockout_until: string | null;
  retry_after_seconds: number | null;
}

export interface LineLockOptions {
  supervisorPin: string;
  maxAttempts: number;
  lockoutMs: number;
}

/**
 * Safety lock engaged by a mismatched scan, released by the supervisor PIN.
 *
 * Wrong PINs share one counter across every PIN-gated action. Reaching
 * `maxAttempts` starts a lockout during which PINs are refused without being
 * compared; the counter resets when the lockout ends. State lives in memory
 * only, so a restart clears it.
 *
 * Emits `change` with a LineLockSnapshot on every transition.
 */
export class LineLockGuard extends EventEmitter {
  private halted = false;
  private failedAttempts = 0;
  private lockoutUntil: number | null = null;

  constructor(
    private readonly clock: Clock,
    private readonly hardware: HardwareSignal,
    private readonly logger: Logger,
    private readonly options: LineLockOptions,
  ) {
    super();
  }

  status(): LineLockStatus {
    this.expireLockout();
    if (this.lockoutUntil !== null) return "PIN_LOCKED_OUT";
    return this.halted ? "LOCKED" : "UNLOCKED";
  }

  /** Only a halted line refuses scans; a PIN lockout alone does not. */
  blocksScanning(): boolean {
    return this.halted;
  }

  snapshot(): LineLockSnapshot {
    const state = this.status();
    return {
      state,
      line_halted: this.halted,
      failed_pin_attempts: this.failedAttempts,
      attempts_remaining: Math.max(0, this.options.maxAttempts - this.failedAttempts),
      lockout_until: this.lockoutUntil === null ? null : toIso(this.lockoutUntil),
      retry_after_seconds: this.lockoutUntil === null ? null : this.retryAfterSeconds(this.lockoutUntil),
    };
  }

  /** Halt the line after a mismatch. Idempotent while already halted. */
  engage(reason: string): void {
    if (this.halted) return;
    this.halted = true;
    this.hardware.haltLine();
    this.logger.warn({ reason }, "Line locked");
    this.notify();
  }

  /**
   * Check `candidate` against the supervisor PIN, counting failures.
   * Throws RateLimitedError during a lockout, ValidationError on a malformed
   * PIN (no attempt spent) and InvalidPinError on mismatch.
   */
  authorize(candidate: string, action: string): void {
    this.expireLockout();
    if (this.lockoutUntil !== null) {
      throw new RateLimitedError(this.retryAfterSeconds(this.lockoutUntil));
    }

    const pin = parseOrThrow(pinSchema, candidate);
    if (!secretsMatch(pin, this.options.supervisorPin)) {
      this.failedAttempts += 1;
      const remaining = Math.max(0, this.options.maxAttempts - this.failedAttempts);
      this.logger.warn({ action, failedAttempts: this.failedAttempts, remaining }, "Invalid supervisor PIN");

      if (this.failedAttempts >= this.options.maxAttempts) {
        this.lockoutUntil = this.clock.now() + this.options.lockoutMs;
        this.logger.warn(
          { action, lockoutUntil: toIso(this.lockoutUntil) },
          "PIN entry locked out after repeated failures",
        );
        this.notify();
      }
      throw new InvalidPinError(remaining);
    }

    this.failedAttempts = 0;
  }

  /** Supervisor unlock: authorize, then resume the line if it was halted. */
  verifyPin(candidate: string): LineLockSnapshot {
    this.authorize(candidate, "verify_pin");
    if (this.halted) {
      this.halted = false;
      this.hardware.resumeLine();
      this.logger.info("Line unlocked by supervisor");
      this.notify();
    }
    return this.snapshot();
  }

  /** Clear the lock after the job that caused it closed. */
  release(): void {
    this.hardware.allOff();
    if (!this.halted) return;
    this.halted = false;
    this.logger.info("Line lock cleared on job end");
    this.notify();
  }

  private retryAfterSeconds(until: number): number {
    return Math.max(1, Math.ceil((until - this.clock.now()) / 1000));
  }

  private expireLockout(): void {
    if (this.lockoutUntil !== null && this.clock.now() >= this.lockoutUntil) {
      this.lockoutUntil = null;
      this.failedAttempts = 0;
      this.logger.info("PIN lockout expired");
    }
  }

  private notify(): void {
    this.emit("change", this.snapshot());
  }
}
