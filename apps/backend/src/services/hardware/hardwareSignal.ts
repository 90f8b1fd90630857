import type { Logger } from "pino";
import { SafeHardwareSignal } from "./safeSignal";
import { NoopHardwareSignal, SimulatedHardwareSignal } from "./simulatedSignal";

export type HardwareSignalMode = "simulated" | "off";

/**
 * Abstraction over the line's indicator lights, buzzer and conveyor relay.
 * Implementations: SimulatedHardwareSignal (logs), NoopHardwareSignal.
 * Callers always go through SafeHardwareSignal, so a driver may throw.
 */
export interface HardwareSignal {
  /** Green light pulse after a matching scan. */
  signalPass(): void;

  /** Red light and buzzer after a mismatch. */
  signalFail(): void;

  /** Stop the conveyor until a supervisor clears the lock. */
  haltLine(): void;

  resumeLine(): void;

  /** Every output low; used when a job closes. */
  allOff(): void;

  getDriverName(): string;
}

export function createHardwareSignal(mode: HardwareSignalMode, logger: Logger): SafeHardwareSignal {
  const driver = mode === "simulated" ? new SimulatedHardwareSignal(logger) : new NoopHardwareSignal();
  return new SafeHardwareSignal(driver, logger);
}
