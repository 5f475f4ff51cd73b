import { vehicleBatteryStatusSchema, type VehicleStatus } from "@shared/schema";
import { log } from "../core/logger";
import { VehicleError, errorMessage } from "../core/errors";
import type { VehicleStatusClient } from "./types";

/**
 * Batteriestatus-JSON → VehicleStatus. Ohne Zeitstempel in der Antwort gilt der Abrufzeitpunkt.
 */
export function parseVehicleStatus(body: unknown, fetchedAt: Date): VehicleStatus {
  const parsed = vehicleBatteryStatusSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new VehicleError(`Ungültiger Fahrzeugstatus: ${issues}`, "vehicle");
  }
  const data = parsed.data;
  return {
    soc: data.batteryLevel ?? null,
    autonomyKm: data.batteryAutonomy ?? null,
    plugStatus: data.plugStatus ?? null,
    chargingStatus: data.chargingStatus ?? null,
    timestamp: data.timestamp ?? fetchedAt.toISOString(),
  };
}

/**
 * Fahrzeug-Cloud über einen HTTP-Endpunkt, der den Batteriestatus als JSON liefert.
 * Antwortzeiten von mehreren Sekunden sind normal.
 */
export class HttpVehicleStatusClient implements VehicleStatusClient {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly token?: string,
  ) {}

  async readStatus(): Promise<VehicleStatus> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let body: unknown;
    try {
      const response = await fetch(this.url, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw new VehicleError(`Fahrzeugstatus nicht abrufbar: ${errorMessage(error)}`, "vehicle", { cause: error });
    }

    const status = parseVehicleStatus(body, new Date());
    log("debug", "vehicle", `Fahrzeugstatus: SoC=${status.soc ?? "?"}%, Reichweite=${status.autonomyKm ?? "?"} km`);
    return status;
  }
}
