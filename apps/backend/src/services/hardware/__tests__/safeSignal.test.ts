/// <reference types="vitest" />
import pino from "pino";
import { describe, it, expect } from "vitest";
import { SafeHardwareSignal } from "../safeSignal";
import { RecordingHardwareSignal } from "../../../test/mocks/recordingHardware";

describe("SafeHardwareSignal", () => {
  it("driver fault → swallowed, logged and counted", () => {
    const driver = new RecordingHardwareSignal();
    driver.failOn = "haltLine";
    const safe = new SafeHardwareSignal(driver, pino({ level: "silent" }));

    safe.signalFail();
    safe.haltLine();
    safe.haltLine();

    expect(driver.calls).toEqual(["signalFail", "haltLine", "haltLine"]);
    expect(safe.getFailureCount()).toBe(2);
  });

  it("reports the wrapped driver's name", () => {
    const safe = new SafeHardwareSignal(new RecordingHardwareSignal(), pino({ level: "silent" }));

    expect(safe.getDriverName()).toBe("recording");
    expect(safe.getFailureCount()).toBe(0);
  });
});
