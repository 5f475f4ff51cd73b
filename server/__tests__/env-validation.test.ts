import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock logger to avoid side effects
vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

import { log } from "../core/logger";
import { validateEnvironment } from "../core/env-validation";

const ALL_SET = {
  PORT: "3000",
  GRID_METER_HOST: "10.0.0.5",
  PV_INVERTER_HOST: "10.0.0.6",
  WALLBOX_HOST: "10.0.0.7",
  VEHICLE_STATUS_URL: "http://vehicle.local/battery",
  SOC_PROTECTION_ENABLED: "false",
  LOG_LEVEL: "info",
  DEMO_AUTOSTART: "false",
};

describe("validateEnvironment", () => {
  beforeEach(() => {
    vi.mocked(log).mockClear();
  });

  it("should produce no warnings when all vars are set", () => {
    const result = validateEnvironment(ALL_SET);

    expect(result.valid).toBe(true);
    expect(result.missing).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
    expect(result.messages).toHaveLength(0);
  });

  it("should fail when device hosts are missing", () => {
    const result = validateEnvironment({ PORT: "3000" });

    expect(result.valid).toBe(false);
    expect(result.missing).toEqual([
      "GRID_METER_HOST – Tasmota-Lesekopf am Stromzähler",
      "PV_INVERTER_HOST – PV-Wechselrichter (Modbus TCP)",
      "WALLBOX_HOST – go-e Wallbox (HTTP-API v2 + Modbus TCP)",
    ]);
    expect(log).toHaveBeenCalledWith("error", "system", "❌ Fehlende Pflicht-Environment-Variablen:");
  });

  it("should not require device hosts in demo mode", () => {
    const result = validateEnvironment({ DEMO_AUTOSTART: "true" });

    expect(result.valid).toBe(true);
    expect(result.missing).toHaveLength(0);
    expect(result.messages).toContainEqual({
      level: "debug",
      message: "GRID_METER_HOST nicht gesetzt – Tasmota-Lesekopf am Stromzähler",
    });
  });

  it("should warn about VEHICLE_STATUS_URL when not set", () => {
    const { VEHICLE_STATUS_URL: _unused, ...env } = ALL_SET;

    const result = validateEnvironment(env);

    expect(result.warnings).toEqual([
      "VEHICLE_STATUS_URL nicht gesetzt – Fahrzeugstatus-Endpoint (ohne: kein SoC, kein Akku-Schutz)",
    ]);
    expect(log).toHaveBeenCalledWith(
      "warning",
      "system",
      "⚠️ VEHICLE_STATUS_URL nicht gesetzt – Fahrzeugstatus-Endpoint (ohne: kein SoC, kein Akku-Schutz)",
    );
  });

  it("should mention defaults for optional vars", () => {
    const { PORT: _unused, ...env } = ALL_SET;

    const result = validateEnvironment(env);

    expect(result.messages).toEqual([{ level: "info", message: "PORT nicht gesetzt (Default: 3000) – HTTP-Server-Port" }]);
    expect(result.warnings).toHaveLength(0);
  });
});
