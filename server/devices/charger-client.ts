import type { CarState, ChargerStatus, PhaseCount } from "@shared/schema";
import { log } from "../core/logger";
import { CommandError, errorMessage } from "../core/errors";
import type { ChargerClient } from "./types";

/** go-e "car": 1 bereit/kein Fahrzeug, 2 lädt, 3 wartet auf Fahrzeug, 4 fertig, 5 Fehler */
const CAR_STATES: Record<number, CarState> = {
  1: "Idle",
  2: "Charging",
  3: "Waiting",
  4: "Finished",
  5: "Error",
};

function toInteger(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
  }
  return null;
}

/**
 * Rohes /api/status → normierter Status. Unbekannte Werte werden zu Unknown/null.
 */
export function normalizeGoEStatus(raw: unknown): ChargerStatus {
  if (typeof raw !== "object" || raw === null) {
    return { carState: "Unknown", phaseMode: null, ampereAllowed: null };
  }

  const car = "car" in raw ? toInteger(raw.car) : null;
  const psm = "psm" in raw ? toInteger(raw.psm) : null;
  const amp = "amp" in raw ? toInteger(raw.amp) : null;

  let phaseMode: PhaseCount | null = null;
  if (psm === 1) phaseMode = 1;
  else if (psm === 2) phaseMode = 3;

  return {
    carState: (car !== null ? CAR_STATES[car] : undefined) ?? "Unknown",
    phaseMode,
    ampereAllowed: amp !== null && amp >= 0 ? amp : null,
  };
}

/**
 * go-e Charger, lokale HTTP API v2.
 */
export class GoEChargerClient implements ChargerClient {
  private readonly baseUrl: string;

  constructor(
    host: string,
    private readonly timeoutMs: number,
  ) {
    this.baseUrl = `http://${host}`;
  }

  async getStatus(): Promise<ChargerStatus> {
    const url = `${this.baseUrl}/api/status`;
    try {
      const response = await fetch(url, { method: "GET", signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      const status = normalizeGoEStatus(await response.json());
      log("trace", "charger", "go-e Status", JSON.stringify(status));
      return status;
    } catch (error) {
      throw new CommandError(`GET ${url} fehlgeschlagen: ${errorMessage(error)}`, "charger", { cause: error });
    }
  }

  async setPhaseMode(phase: PhaseCount): Promise<void> {
    // go-e: psm=1 einphasig, psm=2 dreiphasig
    await this.set({ psm: phase === 1 ? 1 : 2 });
  }

  async setAmpere(ampere: number): Promise<void> {
    if (!Number.isInteger(ampere) || ampere < 0) {
      throw new CommandError(`Ungültiger Ladestrom: ${ampere}`, "charger");
    }
    await this.set({ amp: ampere });
  }

  async setChargingEnabled(enabled: boolean): Promise<void> {
    // frc=2 Laden erzwingen, frc=1 Laden sperren
    await this.set({ frc: enabled ? 2 : 1 });
  }

  private async set(params: Record<string, number>): Promise<void> {
    const query = new URLSearchParams(Object.entries(params).map(([key, value]): [string, string] => [key, String(value)]));
    const url = `${this.baseUrl}/api/set?${query.toString()}`;
    log("debug", "charger", `Sende Befehl an go-e`, query.toString());
    try {
      const response = await fetch(url, { method: "GET", signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
    } catch (error) {
      throw new CommandError(`GET ${url} fehlgeschlagen: ${errorMessage(error)}`, "charger", { cause: error });
    }
  }
}
