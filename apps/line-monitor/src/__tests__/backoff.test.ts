/// <reference types="vitest" />
import { describe, it, expect } from "vitest";
import { ReconnectBackoff } from "../backoff";

describe("ReconnectBackoff", () => {
  it("doubles from 1s and caps at 30s", () => {
    const backoff = new ReconnectBackoff();

    const delays = Array.from({ length: 7 }, () => backoff.next());

    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
    expect(backoff.attempts).toBe(7);
  });

  it("reset → starts over", () => {
    const backoff = new ReconnectBackoff(500, 4000, 3);
    backoff.next();
    backoff.next();

    backoff.reset();

    expect(backoff.next()).toBe(500);
  });
});
