import type { ChargerStatus, PhaseCount, VehicleStatus } from "@shared/schema";

/**
 * Geräte-Schnittstellen des Supervisors. Jede Implementierung setzt ihr eigenes
 * Timeout durch, damit ein hängendes Gerät den Loop nicht unbegrenzt blockiert.
 */

/** Stromzähler: > 0 Netzbezug, < 0 Einspeisung. Wirft ReadError. */
export interface GridMeterReader {
  readPowerKw(): Promise<number>;
}

/** PV-Wechselrichter. Wirft ReadError. */
export interface PVReader {
  readTotalPowerKw(): Promise<number>;
  readStringPowersKw?(): Promise<Record<string, number>>;
}

/** Wallbox-Messwerte. Unplausible Werte werden auf 0 gesetzt statt durchgereicht. */
export interface WallboxReader {
  readPowerKw(): Promise<number>;
}

/** Steuerung der Wallbox. Setter werfen CommandError. */
export interface ChargerClient {
  getStatus(): Promise<ChargerStatus>;
  setPhaseMode(phase: PhaseCount): Promise<void>;
  setAmpere(ampere: number): Promise<void>;
  setChargingEnabled(enabled: boolean): Promise<void>;
}

/** Fahrzeug-Cloud. Langsam (mehrere Sekunden), selten abfragen. Wirft VehicleError. */
export interface VehicleStatusClient {
  readStatus(): Promise<VehicleStatus>;
}

/**
 * Optionale Fähigkeit: entweder verfügbar oder mit Begründung nicht verfügbar.
 */
export type Capability<T> =
  | { kind: "available"; client: T }
  | { kind: "unavailable"; reason: string };

export function available<T>(client: T): Capability<T> {
  return { kind: "available", client };
}

export function unavailable<T>(reason: string): Capability<T> {
  return { kind: "unavailable", reason };
}

export interface DeviceSet {
  gridMeter: GridMeterReader;
  pvInverter: PVReader;
  wallbox: WallboxReader;
  charger: Capability<ChargerClient>;
  vehicle: Capability<VehicleStatusClient>;
  /** Verbindungen schließen (Modbus etc.) beim Shutdown */
  close(): Promise<void>;
}
