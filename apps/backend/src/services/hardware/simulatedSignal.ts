import type { Logger } from "pino";
import type { HardwareSignal } from "./hardwareSignal";

export class SimulatedHardwareSignal implements HardwareSignal {
  constructor(private readonly logger: Logger) {}

  signalPass(): void {
    this.logger.info({ output: "green" }, "PASS signal");
  }

  signalFail(): void {
    this.logger.info({ output: "red+buzzer" }, "FAIL signal");
  }

  haltLine(): void {
    this.logger.info({ output: "conveyor", halted: true }, "Line halted");
  }

  resumeLine(): void {
    this.logger.info({ output: "conveyor", halted: false }, "Line resumed");
  }

  allOff(): void {
    this.logger.info("All outputs off");
  }

  getDriverName(): string {
    return "simulated";
  }
}

export class NoopHardwareSignal implements HardwareSignal {
  signalPass(): void {}
  signalFail(): void {}
  haltLine(): void {}
  resumeLine(): void {}
  allOff(): void {}

  getDriverName(): string {
    return "off";
  }
}
