import { z } from "zod";

// Log-Level (aufsteigend nach Priorität)
export const logLevelSchema = z.enum(["trace", "debug", "info", "warning", "error"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logCategorySchema = z.enum([
  "system",
  "control",
  "grid",
  "pv",
  "wallbox",
  "charger",
  "vehicle",
  "protection",
  "api",
  "demo",
]);
export type LogCategory = z.infer<typeof logCategorySchema>;

export const logEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  level: logLevelSchema,
  category: logCategorySchema,
  message: z.string(),
  details: z.string().optional(),
});
export type LogEntry = z.infer<typeof logEntrySchema>;

export const logSettingsSchema = z.object({
  level: logLevelSchema,
});
export type LogSettings = z.infer<typeof logSettingsSchema>;

// === Betriebsmodus ===

export const operatingModeSchema = z.enum(["pv_surplus", "monitor_only"]);
export type OperatingMode = z.infer<typeof operatingModeSchema>;

export const modeRequestSchema = z.object({
  mode: operatingModeSchema,
});

export const socProtectionRequestSchema = z.object({
  enabled: z.boolean(),
});

// === Regelung ===

export const phaseCountSchema = z.union([z.literal(1), z.literal(3)]);
export type PhaseCount = z.infer<typeof phaseCountSchema>;

/**
 * Schwellwerte und Grenzen des Überschuss-Reglers (kW bzw. A).
 * Invarianten: thres3to1 < thres1to3 <= thres1to3Start, minCurrent <= maxCurrent,
 * thresStop < thresStart.
 */
export const controllerParamsSchema = z
  .object({
    thres1to3Start: z.number().positive(),
    thres1to3: z.number().positive(),
    thres3to1: z.number().nonnegative(),
    thresStart: z.number().nonnegative(),
    thresStop: z.number().nonnegative(),
    minCurrent: z.number().int().min(1),
    maxCurrent: z.number().int().min(1).max(32),
    deltaP: z.number().nonnegative(),
  })
  .refine((p) => p.thres3to1 < p.thres1to3, {
    message: "thres3to1 muss kleiner als thres1to3 sein",
    path: ["thres3to1"],
  })
  .refine((p) => p.thres1to3 <= p.thres1to3Start, {
    message: "thres1to3 darf thres1to3Start nicht überschreiten",
    path: ["thres1to3"],
  })
  .refine((p) => p.minCurrent <= p.maxCurrent, {
    message: "minCurrent darf maxCurrent nicht überschreiten",
    path: ["minCurrent"],
  })
  .refine((p) => p.thresStop < p.thresStart, {
    message: "thresStop muss kleiner als thresStart sein",
    path: ["thresStop"],
  });
export type ControllerParams = z.infer<typeof controllerParamsSchema>;

export const DEFAULT_CONTROLLER_PARAMS: ControllerParams = {
  thres1to3Start: 7.0,
  thres1to3: 5.8,
  thres3to1: 3.5,
  thresStart: 2.0,
  thresStop: 1.0,
  minCurrent: 10,
  maxCurrent: 16,
  deltaP: 0.0,
};

export interface ControlDecision {
  phase: PhaseCount;
  current: number;
  availableKw: number;
}

// === Geräte ===

export const carStateSchema = z.enum(["Idle", "Charging", "Waiting", "Finished", "Error", "Unknown"]);
export type CarState = z.infer<typeof carStateSchema>;

export interface ChargerStatus {
  carState: CarState;
  phaseMode: PhaseCount | null;
  ampereAllowed: number | null;
}

/**
 * Batteriestatus aus der Fahrzeug-Cloud (Kamereon-ähnliche Attribute).
 */
export const vehicleBatteryStatusSchema = z.object({
  batteryLevel: z.number().nullable().optional(),
  batteryAutonomy: z.number().nullable().optional(),
  plugStatus: z.number().nullable().optional(),
  chargingStatus: z.number().nullable().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
});

export interface VehicleStatus {
  soc: number | null;
  autonomyKm: number | null;
  plugStatus: number | null;
  chargingStatus: number | null;
  timestamp: string;
}

// === Gemeinsamer Status (flach, wird 1:1 von /api/status ausgeliefert) ===

export interface SharedStatus {
  timestamp: string | null;
  pvKw: number | null;
  pvStringsKw: Record<string, number> | null;
  gridKw: number | null;
  wallboxKw: number | null;
  gridKwAvg: number | null;
  wallboxKwAvg: number | null;
  /** Regelwert der letzten Control-Periode */
  pAvailableKw: number | null;
  /** Live-Wert aus Momentanwerten (nur Anzeige) */
  pAvailableNow: number | null;
  phase: PhaseCount | null;
  current: number | null;
  carState: CarState | null;
  mode: OperatingMode;
  decisionPhase: PhaseCount | null;
  decisionCurrent: number | null;
  lastControlAt: string | null;
  carSoc: number | null;
  carAutonomyKm: number | null;
  carPlugStatus: number | null;
  carChargingStatus: number | null;
  carStatusTimestamp: string | null;
  carStatusLastAttempt: string | null;
  carStatusValid: boolean;
  socProtection: boolean;
  socProtectionStop: boolean | null;
  socProtectionSoc: number | null;
}

export type StatusPatch = Partial<Omit<SharedStatus, "mode" | "socProtection">>;
