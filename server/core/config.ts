import { z } from "zod";
import {
  controllerParamsSchema,
  logLevelSchema,
  operatingModeSchema,
  DEFAULT_CONTROLLER_PARAMS,
  type ControllerParams,
  type LogLevel,
  type OperatingMode,
} from "@shared/schema";
import { ValidationError } from "./errors";

const envBoolean = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => (v === undefined ? defaultValue : v === "true" || v === "1"));

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),

  GRID_METER_HOST: optionalString,
  PV_INVERTER_HOST: optionalString,
  PV_INVERTER_PORT: positiveInt(1502),
  PV_INVERTER_UNIT: z.coerce.number().int().min(0).max(255).default(71),
  WALLBOX_HOST: optionalString,
  WALLBOX_MODBUS_PORT: positiveInt(502),
  WALLBOX_MODBUS_UNIT: z.coerce.number().int().min(0).max(255).default(1),
  DEVICE_TIMEOUT_MS: positiveInt(3000),
  VEHICLE_STATUS_URL: optionalString.pipe(z.string().url().optional()),
  VEHICLE_STATUS_TOKEN: optionalString,
  VEHICLE_TIMEOUT_MS: positiveInt(15000),

  TICK_INTERVAL_MS: positiveInt(1000),
  GRID_SAMPLE_EVERY: positiveInt(10),
  CONTROL_PERIOD: positiveInt(300),
  VEHICLE_POLL_PERIOD: positiveInt(300),
  BATTERY_CHECK_PERIOD: positiveInt(60),
  MAX_GRID_SAMPLES: z.coerce.number().int().positive().optional(),

  THRES_1TO3_START: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.thres1to3Start),
  THRES_1TO3: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.thres1to3),
  THRES_3TO1: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.thres3to1),
  THRES_START: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.thresStart),
  THRES_STOP: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.thresStop),
  MIN_CURRENT: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.minCurrent),
  MAX_CURRENT: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.maxCurrent),
  DELTA_P: z.coerce.number().default(DEFAULT_CONTROLLER_PARAMS.deltaP),

  SOC_PROTECTION_ENABLED: envBoolean(false),
  SOC_PROTECTION_LIMIT: z.coerce.number().min(0).max(100).default(80),
  SOC_PROTECTION_MAX_AGE_SEC: positiveInt(900),

  INITIAL_MODE: operatingModeSchema.default("pv_surplus"),
  LOG_LEVEL: logLevelSchema.default("info"),
  DEMO_AUTOSTART: envBoolean(false),
});

export interface SchedulerConfig {
  tickIntervalMs: number;
  gridSampleEvery: number;
  controlPeriod: number;
  vehiclePollPeriod: number;
  batteryCheckPeriod: number;
  maxGridSamples: number;
}

export interface BatteryProtectionConfig {
  enabled: boolean;
  socLimit: number;
  maxAgeSec: number;
}

export interface DeviceConfig {
  gridMeterHost?: string;
  pvInverterHost?: string;
  pvInverterPort: number;
  pvInverterUnit: number;
  wallboxHost?: string;
  wallboxModbusPort: number;
  wallboxModbusUnit: number;
  timeoutMs: number;
  vehicleStatusUrl?: string;
  vehicleStatusToken?: string;
  vehicleTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  devices: DeviceConfig;
  scheduler: SchedulerConfig;
  controller: ControllerParams;
  batteryProtection: BatteryProtectionConfig;
  initialMode: OperatingMode;
  logLevel: LogLevel;
  demoMode: boolean;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Liest die Konfiguration aus den Environment-Variablen.
 * Wirft ValidationError mit allen fehlerhaften Schlüsseln.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Ungültige Konfiguration: ${issues.join("; ")}`, issues);
  }
  const e = parsed.data;

  const controller = controllerParamsSchema.safeParse({
    thres1to3Start: e.THRES_1TO3_START,
    thres1to3: e.THRES_1TO3,
    thres3to1: e.THRES_3TO1,
    thresStart: e.THRES_START,
    thresStop: e.THRES_STOP,
    minCurrent: e.MIN_CURRENT,
    maxCurrent: e.MAX_CURRENT,
    deltaP: e.DELTA_P,
  });
  if (!controller.success) {
    const issues = formatIssues(controller.error);
    throw new ValidationError(`Ungültige Regler-Parameter: ${issues.join("; ")}`, issues);
  }

  if (!e.DEMO_AUTOSTART) {
    const missingHosts = (["GRID_METER_HOST", "PV_INVERTER_HOST", "WALLBOX_HOST"] as const).filter(
      (key) => !e[key],
    );
    if (missingHosts.length > 0) {
      const issues = missingHosts.map((key) => `${key}: erforderlich ohne DEMO_AUTOSTART`);
      throw new ValidationError(`Ungültige Konfiguration: ${issues.join("; ")}`, issues);
    }
  }

  return {
    port: e.PORT,
    host: e.HOST,
    devices: {
      gridMeterHost: e.GRID_METER_HOST,
      pvInverterHost: e.PV_INVERTER_HOST,
      pvInverterPort: e.PV_INVERTER_PORT,
      pvInverterUnit: e.PV_INVERTER_UNIT,
      wallboxHost: e.WALLBOX_HOST,
      wallboxModbusPort: e.WALLBOX_MODBUS_PORT,
      wallboxModbusUnit: e.WALLBOX_MODBUS_UNIT,
      timeoutMs: e.DEVICE_TIMEOUT_MS,
      vehicleStatusUrl: e.VEHICLE_STATUS_URL,
      vehicleStatusToken: e.VEHICLE_STATUS_TOKEN,
      vehicleTimeoutMs: e.VEHICLE_TIMEOUT_MS,
    },
    scheduler: {
      tickIntervalMs: e.TICK_INTERVAL_MS,
      gridSampleEvery: e.GRID_SAMPLE_EVERY,
      controlPeriod: e.CONTROL_PERIOD,
      vehiclePollPeriod: e.VEHICLE_POLL_PERIOD,
      batteryCheckPeriod: e.BATTERY_CHECK_PERIOD,
      // Standard: so viele Samples wie in eine Control-Periode passen (~30)
      maxGridSamples: e.MAX_GRID_SAMPLES ?? Math.max(1, Math.floor(e.CONTROL_PERIOD / e.GRID_SAMPLE_EVERY)),
    },
    controller: controller.data,
    batteryProtection: {
      enabled: e.SOC_PROTECTION_ENABLED,
      socLimit: e.SOC_PROTECTION_LIMIT,
      maxAgeSec: e.SOC_PROTECTION_MAX_AGE_SEC,
    },
    initialMode: e.INITIAL_MODE,
    logLevel: e.LOG_LEVEL,
    demoMode: e.DEMO_AUTOSTART,
  };
}
