import type { Logger } from "pino";
import type { HardwareSignal } from "./hardwareSignal";

type SignalName = "signalPass" | "signalFail" | "haltLine" | "resumeLine" | "allOff";

/**
 * Wraps a driver so hardware faults are logged instead of failing the scan
 * that triggered them. The scan is already committed when signals fire.
 */
export class SafeHardwareSignal implements HardwareSignal {
  private failures = 0;

  constructor(
    private readonly driver: HardwareSignal,
    private readonly logger: Logger,
  ) {}

  signalPass(): void {
    this.invoke("signalPass");
  }

  signalFail(): void {
    this.invoke("signalFail");
  }

  haltLine(): void {
    this.invoke("haltLine");
  }

  resumeLine(): void {
    this.invoke("resumeLine");
  }

  allOff(): void {
    this.invoke("allOff");
  }

  getDriverName(): string {
    return this.driver.getDriverName();
  }

  getFailureCount(): number {
    return this.failures;
  }

  private invoke(signal: SignalName): void {
    try {
      this.driver[signal]();
    } catch (error) {
      this.failures += 1;
      this.logger.error({ err: error, signal, driver: this.driver.getDriverName() }, "Hardware signal failed");
    }
  }
}
