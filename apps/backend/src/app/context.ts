/**
 * AppContext: composition root for the line backend.
 *
 * Wires database, repository, clock, hardware, lock guard, ledger, engine,
 * hub and service together so server.ts stays a thin HTTP adapter and tests
 * can build the same graph against an in-memory database.
 */

import pino, { type Logger } from "pino";
import type { Database } from "better-sqlite3";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";
import { SystemClock, type Clock } from "../platform/clock";
import { LineRepository } from "../repositories/lineRepository";
import { BroadcastHub } from "../services/broadcast/broadcastHub";
import { createHardwareSignal, type HardwareSignal } from "../services/hardware/hardwareSignal";
import { SafeHardwareSignal } from "../services/hardware/safeSignal";
import { JobLedger } from "../services/jobLedger";
import type { LineEventBody } from "../services/lineEvents";
import { LineLockGuard } from "../services/lineLock";
import { LineService } from "../services/lineService";
import { ShiftRolloverJob } from "../services/shiftRolloverJob";
import { VerificationEngine } from "../services/verificationEngine";

export { runtimeConfig };

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  db: Database;
  clock: Clock;
  repo: LineRepository;
  hardware: SafeHardwareSignal;
  lineLock: LineLockGuard;
  ledger: JobLedger;
  engine: VerificationEngine;
  hub: BroadcastHub<LineEventBody>;
  lineService: LineService;
  shiftRollover: ShiftRolloverJob;
  isShuttingDown(): boolean;
  setShuttingDown(value: boolean): void;
}

export interface ContextOverrides {
  config?: RuntimeConfig;
  logger?: Logger;
  clock?: Clock;
  /** Raw driver; always wrapped so it cannot throw into the line. */
  hardware?: HardwareSignal;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(config: RuntimeConfig = runtimeConfig): Logger {
  if (config.logPretty) {
    return pino({
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: true, ignore: "pid,hostname" },
      },
    });
  }

  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level: config.logLevel }, destination);
}

// -----------------------------------------------------------------------------
// createContext
// -----------------------------------------------------------------------------

export function createContext(overrides: ContextOverrides = {}): AppContext {
  const config = overrides.config ?? runtimeConfig;
  const logger = overrides.logger ?? createLogger(config);
  const clock = overrides.clock ?? new SystemClock();

  const db = openDatabase(config.sqlitePath);
  logger.info({ sqlitePath: config.sqlitePath }, "Database opened");
  runMigrations(db, logger.child({ component: "migrate" }));

  const repo = new LineRepository(db);

  const hardwareLogger = logger.child({ component: "hardware" });
  const hardware = overrides.hardware
    ? new SafeHardwareSignal(overrides.hardware, hardwareLogger)
    : createHardwareSignal(config.hardwareSignals, hardwareLogger);

  const lineLock = new LineLockGuard(clock, hardware, logger.child({ component: "line-lock" }), {
    supervisorPin: config.supervisorPin,
    maxAttempts: config.pinMaxAttempts,
    lockoutMs: config.pinLockoutMs,
  });

  const ledger = new JobLedger(repo, clock, logger.child({ component: "ledger" }), {
    recentScansWindow: config.recentScansWindow,
    shiftStartHour: config.shiftStartHour,
    shiftEndHour: config.shiftEndHour,
  });
  ledger.load();

  const engine = new VerificationEngine(ledger, lineLock, hardware, logger.child({ component: "verification" }));
  const hub = new BroadcastHub<LineEventBody>(
    clock,
    logger.child({ component: "broadcast" }),
    config.subscriberQueueCapacity,
  );

  const lineService = new LineService({
    ledger,
    engine,
    guard: lineLock,
    hub,
    hardware,
    clock,
    logger: logger.child({ component: "line" }),
    lineName: config.lineName,
  });

  const shiftRollover = new ShiftRolloverJob(
    lineService,
    logger.child({ component: "shift-rollover" }),
    config.shiftRolloverIntervalMs,
  );

  let shuttingDown = false;

  return {
    config,
    logger,
    db,
    clock,
    repo,
    hardware,
    lineLock,
    ledger,
    engine,
    hub,
    lineService,
    shiftRollover,
    isShuttingDown: () => shuttingDown,
    setShuttingDown: (value: boolean) => {
      shuttingDown = value;
    },
  };
}
