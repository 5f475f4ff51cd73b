import type { ChargerStatus, PhaseCount, VehicleStatus } from "@shared/schema";
import { log } from "../core/logger";
import { available, type DeviceSet } from "../devices/types";

/**
 * Simulierte Anlage für den Demo-Modus
 *
 * Ein Prozess, keine Netzwerk-Ports:
 * - PV-Erzeugung als Tageskurve (Sonnenaufgang 6 Uhr, Untergang 20 Uhr) mit leichtem Rauschen
 * - Hausverbrauch als Grundlast mit Schwankung
 * - go-e-artige Wallbox, die den Ladebefehlen folgt
 * - Fahrzeug, dessen SoC beim Laden steigt
 *
 * Netzleistung = Haus + Wallbox - PV (> 0 Bezug, < 0 Einspeisung)
 */
export interface SimulatedSiteOptions {
  peakPvKw?: number;
  houseBaseKw?: number;
  batteryCapacityKwh?: number;
  initialSoc?: number;
  /** Fahrzeug beim Start angesteckt */
  plugged?: boolean;
  now?: () => Date;
  random?: () => number;
}

const VOLTAGE = 230;
const SUNRISE_HOUR = 6;
const SUNSET_HOUR = 20;

export class SimulatedSite {
  private readonly peakPvKw: number;
  private readonly houseBaseKw: number;
  private readonly batteryCapacityKwh: number;
  private readonly now: () => Date;
  private readonly random: () => number;

  private readonly plugged: boolean;
  private soc: number;
  private phaseMode: PhaseCount = 1;
  private ampere = 6;
  private chargingEnabled = false;
  private lastUpdate: number;

  constructor(options: SimulatedSiteOptions = {}) {
    this.peakPvKw = options.peakPvKw ?? 9.5;
    this.houseBaseKw = options.houseBaseKw ?? 0.45;
    this.batteryCapacityKwh = options.batteryCapacityKwh ?? 52;
    this.soc = options.initialSoc ?? 45;
    this.plugged = options.plugged ?? true;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.lastUpdate = this.now().getTime();
  }

  /**
   * PV-Leistung zur Tageszeit (Halbsinus zwischen Auf- und Untergang)
   */
  pvKw(): number {
    const date = this.now();
    const hour = date.getHours() + date.getMinutes() / 60;
    if (hour <= SUNRISE_HOUR || hour >= SUNSET_HOUR) {
      return 0;
    }
    const position = (hour - SUNRISE_HOUR) / (SUNSET_HOUR - SUNRISE_HOUR);
    // ±5 % Wolken-Rauschen
    const noise = 0.95 + this.random() * 0.1;
    return round3(this.peakPvKw * Math.sin(Math.PI * position) * noise);
  }

  houseKw(): number {
    return round3(this.houseBaseKw + this.random() * 0.3);
  }

  isCharging(): boolean {
    return this.plugged && this.chargingEnabled && this.ampere > 0 && this.soc < 100;
  }

  wallboxKw(): number {
    this.integrate();
    return this.isCharging() ? round3((this.phaseMode * VOLTAGE * this.ampere) / 1000) : 0;
  }

  chargerStatus(): ChargerStatus {
    this.integrate();
    let carState: ChargerStatus["carState"];
    if (!this.plugged) carState = "Idle";
    else if (this.isCharging()) carState = "Charging";
    else if (this.soc >= 100) carState = "Finished";
    else carState = "Waiting";
    return { carState, phaseMode: this.phaseMode, ampereAllowed: this.ampere };
  }

  vehicleStatus(): VehicleStatus {
    this.integrate();
    return {
      soc: Math.round(this.soc),
      autonomyKm: Math.round(this.soc * 4),
      plugStatus: this.plugged ? 1 : 0,
      chargingStatus: this.isCharging() ? 1 : 0,
      timestamp: this.now().toISOString(),
    };
  }

  /**
   * Geräte-Schnittstellen auf diese Anlage.
   */
  devices(): DeviceSet {
    return {
      gridMeter: {
        readPowerKw: async () => {
          const pv = this.pvKw();
          return round3(this.houseKw() + this.wallboxKw() - pv);
        },
      },
      pvInverter: {
        readTotalPowerKw: async () => this.pvKw(),
      },
      wallbox: {
        readPowerKw: async () => this.wallboxKw(),
      },
      charger: available({
        getStatus: async () => this.chargerStatus(),
        setPhaseMode: async (phase: PhaseCount) => {
          this.integrate();
          this.phaseMode = phase;
          log("debug", "demo", `Simulierte Wallbox: ${phase}-phasig`);
        },
        setAmpere: async (ampere: number) => {
          this.integrate();
          this.ampere = ampere;
          log("debug", "demo", `Simulierte Wallbox: ${ampere}A`);
        },
        setChargingEnabled: async (enabled: boolean) => {
          this.integrate();
          this.chargingEnabled = enabled;
          log("debug", "demo", `Simulierte Wallbox: Laden ${enabled ? "freigegeben" : "gesperrt"}`);
        },
      }),
      vehicle: available({
        readStatus: async () => this.vehicleStatus(),
      }),
      close: async () => {},
    };
  }

  /**
   * Lädt den Fahrzeug-Akku für die seit dem letzten Aufruf vergangene Zeit.
   */
  private integrate(): void {
    const nowMs = this.now().getTime();
    const elapsedHours = Math.max(0, nowMs - this.lastUpdate) / 3_600_000;
    this.lastUpdate = nowMs;
    if (!this.isCharging() || elapsedHours === 0) {
      return;
    }
    const chargedKwh = ((this.phaseMode * VOLTAGE * this.ampere) / 1000) * elapsedHours;
    this.soc = Math.min(100, this.soc + (chargedKwh / this.batteryCapacityKwh) * 100);
  }
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
