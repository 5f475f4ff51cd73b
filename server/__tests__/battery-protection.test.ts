import { describe, it, expect } from "vitest";
import { shouldForceStop } from "../control/battery-protection";

const NOW = new Date("2026-06-01T12:00:00.000Z");
const CONFIG = { socLimit: 80, maxAgeSec: 900 };

function status(overrides: Partial<Parameters<typeof shouldForceStop>[0]> = {}) {
  return {
    carSoc: 85,
    carStatusValid: true,
    carStatusTimestamp: "2026-06-01T11:55:00.000Z",
    ...overrides,
  };
}

describe("shouldForceStop", () => {
  it("stops when a fresh, valid SoC is above the limit", () => {
    expect(shouldForceStop(status(), NOW, CONFIG)).toEqual({ stop: true, soc: 85, reason: "limit-reached" });
  });

  it("stops when the SoC equals the limit", () => {
    expect(shouldForceStop(status({ carSoc: 80 }), NOW, CONFIG).stop).toBe(true);
  });

  it("does not stop below the limit", () => {
    expect(shouldForceStop(status({ carSoc: 79.5 }), NOW, CONFIG)).toEqual({
      stop: false,
      soc: 79.5,
      reason: "below-limit",
    });
  });

  it("ignores data marked invalid but still reports the SoC", () => {
    expect(shouldForceStop(status({ carStatusValid: false }), NOW, CONFIG)).toEqual({
      stop: false,
      soc: 85,
      reason: "status-invalid",
    });
  });

  it("does not stop without a SoC", () => {
    expect(shouldForceStop(status({ carSoc: null }), NOW, CONFIG)).toEqual({
      stop: false,
      soc: null,
      reason: "soc-missing",
    });
  });

  it("does not stop on a SoC outside 0..100", () => {
    expect(shouldForceStop(status({ carSoc: 120 }), NOW, CONFIG)).toEqual({
      stop: false,
      soc: 120,
      reason: "soc-out-of-range",
    });
    expect(shouldForceStop(status({ carSoc: -1 }), NOW, CONFIG).reason).toBe("soc-out-of-range");
  });

  it("does not stop without a timestamp", () => {
    expect(shouldForceStop(status({ carStatusTimestamp: null }), NOW, CONFIG).reason).toBe("timestamp-missing");
  });

  it("does not stop on an unparseable timestamp", () => {
    expect(shouldForceStop(status({ carStatusTimestamp: "gestern" }), NOW, CONFIG)).toEqual({
      stop: false,
      soc: 85,
      reason: "timestamp-invalid",
    });
  });

  it("treats data older than maxAgeSec as stale", () => {
    const stale = shouldForceStop(status({ carStatusTimestamp: "2026-06-01T11:44:59.000Z" }), NOW, CONFIG);
    expect(stale).toEqual({ stop: false, soc: 85, reason: "stale" });

    const edge = shouldForceStop(status({ carStatusTimestamp: "2026-06-01T11:45:00.000Z" }), NOW, CONFIG);
    expect(edge.stop).toBe(true);
  });

  it("honours timezone offsets in the timestamp", () => {
    const result = shouldForceStop(status({ carStatusTimestamp: "2026-06-01T13:58:00+02:00" }), NOW, CONFIG);

    expect(result.stop).toBe(true);
  });
});
