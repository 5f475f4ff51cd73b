import { describe, it, expect } from "vitest";
import { DEFAULT_CONTROLLER_PARAMS } from "@shared/schema";
import { loadConfig } from "../core/config";
import { ValidationError } from "../core/errors";

const HOSTS = {
  GRID_METER_HOST: "10.0.0.5",
  PV_INVERTER_HOST: "10.0.0.6",
  WALLBOX_HOST: "10.0.0.7",
};

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ValidationError");
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(HOSTS);

    expect(config.port).toBe(3000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.scheduler).toEqual({
      tickIntervalMs: 1000,
      gridSampleEvery: 10,
      controlPeriod: 300,
      vehiclePollPeriod: 300,
      batteryCheckPeriod: 60,
      maxGridSamples: 30,
    });
    expect(config.controller).toEqual(DEFAULT_CONTROLLER_PARAMS);
    expect(config.batteryProtection).toEqual({ enabled: false, socLimit: 80, maxAgeSec: 900 });
    expect(config.initialMode).toBe("pv_surplus");
    expect(config.logLevel).toBe("info");
    expect(config.demoMode).toBe(false);
  });

  it("maps device settings", () => {
    const config = loadConfig({
      ...HOSTS,
      GRID_METER_HOST: " 10.0.0.5 ",
      PV_INVERTER_PORT: "502",
      VEHICLE_STATUS_URL: "http://vehicle.local/battery",
      VEHICLE_STATUS_TOKEN: "test-token",
    });

    expect(config.devices).toEqual({
      gridMeterHost: "10.0.0.5",
      pvInverterHost: "10.0.0.6",
      pvInverterPort: 502,
      pvInverterUnit: 71,
      wallboxHost: "10.0.0.7",
      wallboxModbusPort: 502,
      wallboxModbusUnit: 1,
      timeoutMs: 3000,
      vehicleStatusUrl: "http://vehicle.local/battery",
      vehicleStatusToken: "test-token",
      vehicleTimeoutMs: 15000,
    });
  });

  it("derives the sample window length from the control period", () => {
    expect(loadConfig({ ...HOSTS, CONTROL_PERIOD: "60", GRID_SAMPLE_EVERY: "7" }).scheduler.maxGridSamples).toBe(8);
    expect(loadConfig({ ...HOSTS, CONTROL_PERIOD: "3", GRID_SAMPLE_EVERY: "5" }).scheduler.maxGridSamples).toBe(1);
    expect(loadConfig({ ...HOSTS, MAX_GRID_SAMPLES: "5" }).scheduler.maxGridSamples).toBe(5);
  });

  it("requires the device hosts outside demo mode", () => {
    const error = captureValidationError(() => loadConfig({ PV_INVERTER_HOST: "10.0.0.6" }));

    expect(error.issues).toEqual([
      "GRID_METER_HOST: erforderlich ohne DEMO_AUTOSTART",
      "WALLBOX_HOST: erforderlich ohne DEMO_AUTOSTART",
    ]);
  });

  it("runs without hosts in demo mode", () => {
    const config = loadConfig({ DEMO_AUTOSTART: "true" });

    expect(config.demoMode).toBe(true);
    expect(config.devices.gridMeterHost).toBeUndefined();
  });

  it("rejects inconsistent controller thresholds", () => {
    const error = captureValidationError(() => loadConfig({ ...HOSTS, THRES_3TO1: "6" }));

    expect(error.message).toContain("Ungültige Regler-Parameter");
    expect(error.issues).toEqual(["thres3to1: thres3to1 muss kleiner als thres1to3 sein"]);
  });

  it("parses boolean flags", () => {
    expect(loadConfig({ ...HOSTS, SOC_PROTECTION_ENABLED: "1" }).batteryProtection.enabled).toBe(true);
    expect(loadConfig({ ...HOSTS, SOC_PROTECTION_ENABLED: "false" }).batteryProtection.enabled).toBe(false);

    const error = captureValidationError(() => loadConfig({ ...HOSTS, SOC_PROTECTION_ENABLED: "yes" }));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^SOC_PROTECTION_ENABLED: /);
  });

  it("rejects unknown modes and invalid numbers", () => {
    expect(() => loadConfig({ ...HOSTS, INITIAL_MODE: "turbo" })).toThrow(ValidationError);
    expect(() => loadConfig({ ...HOSTS, CONTROL_PERIOD: "0" })).toThrow(ValidationError);
    expect(() => loadConfig({ ...HOSTS, SOC_PROTECTION_LIMIT: "120" })).toThrow(ValidationError);
    expect(() => loadConfig({ ...HOSTS, VEHICLE_STATUS_URL: "not a url" })).toThrow(ValidationError);
  });
});
